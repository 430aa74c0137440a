#!/usr/bin/env tsx
/**
 * tilebar - status line generator for i3bar and swaybar
 *
 * Polls a set of units (memory, CPU, time, disk, network, battery, GPU),
 * writes one status line per change on stdout and reacts to clicks read
 * from stdin.
 *
 * Usage:
 *   tilebar [options]
 *   tilebar units
 *
 * Options:
 *   -c, --config <path>       Config file (or use TILEBAR_CONFIG env)
 *   --padding <n>             Spaces around each element (default: 1)
 *   --line-interval <ms>      Milliseconds between line flushes (default: 100)
 *   --read-timeout <ms>       Milliseconds before a read counts as failed
 *   -v, --verbose             Log debug output to stderr
 *   -h, --help                Show this help
 *   -V, --version             Show version
 */

import { Command, InvalidArgumentError } from "commander";
import { ConfigError, loadConfig, validateConfig } from "./src/config/config.ts";
import { listUnitTypes } from "./src/services/units/mod.ts";
import { startBar } from "./src/ui/bar.ts";
import { describeError } from "./src/utils/logger.ts";

const VERSION = "0.1.0";

interface RootOptions {
  config?: string;
  padding?: number;
  lineInterval?: number;
  readTimeout?: number;
  verbose?: boolean;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Not a non-negative number.");
  }
  return parsed;
}

async function runBar(options: RootOptions): Promise<void> {
  const config = loadConfig(options);
  validateConfig(config);

  // the host closing the pipe is a normal way to end
  process.stdout.on("error", (error: Error) => {
    if ("code" in error && error.code === "EPIPE") {
      process.exit(0);
    }
    process.stderr.write(`${describeError(error)}\n`);
    process.exit(1);
  });

  const session = await startBar(config);

  const shutdown = (signal: string) => {
    session.logger.info(`Received ${signal}, stopping`);
    session.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        session.logger.error("Shutdown failed", error);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

const program = new Command()
  .name("tilebar")
  .version(VERSION)
  .description("Status line generator for i3bar and swaybar")
  .option("-c, --config <path>", "Config file (or use TILEBAR_CONFIG env)")
  .option("--padding <n>", "Spaces around each element", parseNumber)
  .option(
    "--line-interval <ms>",
    "Milliseconds between line flushes",
    parseNumber,
  )
  .option(
    "--read-timeout <ms>",
    "Milliseconds before a unit read counts as failed",
    parseNumber,
  )
  .option("-v, --verbose", "Log debug output to stderr")
  .addHelpText(
    "after",
    `
Examples:
  Basic usage              tilebar
  Custom configuration     tilebar --config ~/.config/tilebar/laptop.json
  In sway's config         bar { status_command tilebar }`,
  )
  .action(async (options: RootOptions) => {
    await runBar(options);
  });

program
  .command("units")
  .description("List the built-in unit types")
  .action(() => {
    for (const { type, description } of listUnitTypes()) {
      process.stdout.write(`${type.padEnd(6)} ${description}\n`);
    }
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof ConfigError) {
    process.stderr.write(`tilebar: ${error.message}\n`);
    process.exit(1);
  }
  throw error;
}
