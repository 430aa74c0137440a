/**
 * Operator logging. Everything goes to stderr: stdout belongs to the bar host.
 */

import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/** Anything with a string `write`, like process.stderr */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Emit debug messages */
  verbose?: boolean;
  /** Destination (default: process.stderr) */
  sink?: LogSink;
  /** Colorize level tags (default: picocolors' terminal detection) */
  colors?: boolean;
  /** Clock used for timestamps */
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Render an unknown thrown value, keeping the stack of real errors
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? process.stderr;
  const now = options.now ?? (() => new Date());
  const colors = options.colors === undefined
    ? pc
    : pc.createColors(options.colors);
  const threshold = options.verbose ? LEVEL_ORDER.debug : LEVEL_ORDER.info;

  const tags: Record<LogLevel, string> = {
    debug: colors.gray("DEBUG"),
    info: colors.cyan("INFO"),
    warn: colors.yellow("WARN"),
    error: colors.red("ERROR"),
  };

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink.write(`${colors.dim(now().toISOString())} ${tags[level]} ${message}\n`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) => {
      write(
        "error",
        error === undefined ? message : `${message}\n${describeError(error)}`,
      );
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
