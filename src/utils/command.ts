/**
 * External command helpers shared by units
 */

import { execFile } from "node:child_process";

/** Default bound on any external command a unit runs */
export const DEFAULT_COMMAND_TIMEOUT = 3000;

/** Error thrown when an external command fails or times out */
export class CommandError extends Error {
  constructor(
    readonly command: string,
    message: string,
    readonly timedOut = false,
  ) {
    super(`Command failed: ${command}: ${message}`);
    this.name = "CommandError";
  }
}

/**
 * Run `file` with `args` and return stdout.
 * Rejects with CommandError on non-zero exit or when `timeoutMs` elapses.
 */
export function executeCommand(
  file: string,
  args: readonly string[] = [],
  timeoutMs = DEFAULT_COMMAND_TIMEOUT,
): Promise<string> {
  const command = [file, ...args].join(" ");

  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { timeout: timeoutMs, encoding: "utf8", killSignal: "SIGKILL" },
      (error, stdout, stderr) => {
        if (error) {
          const timedOut = error.killed === true && error.signal === "SIGKILL";
          const detail = timedOut
            ? `timed out after ${timeoutMs}ms`
            : stderr.trim() || error.message;
          reject(new CommandError(command, detail, timedOut));
          return;
        }
        resolve(stdout);
      },
    );
  });
}

/**
 * Check if a command exists on the system.
 * @param command - The command name to check
 */
export async function commandExists(command: string): Promise<boolean> {
  try {
    await executeCommand("which", [command]);
    return true;
  } catch {
    return false;
  }
}
