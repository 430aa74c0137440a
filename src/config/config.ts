/**
 * Configuration management for tilebar
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { MAX_TIMER_DELAY } from "../services/engine/wakeup.ts";
import type { ChunkAttributes } from "../types/unit.ts";
import {
  type ConfigFile,
  configFileSchema,
  type UnitConfig,
} from "./schema.ts";

export interface Config {
  padding: number;
  lineInterval: number;
  readTimeout: number;
  verbose: boolean;
  chunk: ChunkAttributes;
  units: UnitConfig[];
  /** File the configuration was read from, null when none was used */
  configPath: string | null;
}

export interface CLIOptions {
  config?: string;
  padding?: number;
  lineInterval?: number;
  readTimeout?: number;
  verbose?: boolean;
}

/** Environment lookup; process.env in production */
export type Env = Record<string, string | undefined>;

/** Error raised for an unreadable or invalid configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_UNITS: UnitConfig[] = [
  { type: "mem", interval: 3000 },
  { type: "cpu", interval: 1000 },
  { type: "time", interval: 700 },
];

/**
 * $XDG_CONFIG_HOME/tilebar/config.json, or ~/.config/tilebar/config.json
 */
export function defaultConfigPath(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(env.HOME || homedir(), ".config");
  return join(base, "tilebar", "config.json");
}

/**
 * Read and validate a configuration file
 */
export function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${path}: ${reason}`);
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(
      `Invalid config file ${path}:\n  ${issues.join("\n  ")}`,
    );
  }
  return result.data;
}

function envNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${key} must be a number, got "${value}"`);
  }
  return parsed;
}

function envFlag(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

/**
 * Load configuration from CLI options, environment and config file.
 * CLI options override environment variables, which override the file.
 */
export function loadConfig(options: CLIOptions, env: Env = process.env): Config {
  // An explicitly named file must exist; the default one is optional
  const explicitPath = options.config || env.TILEBAR_CONFIG;
  const configPath = explicitPath || defaultConfigPath(env);

  let file: ConfigFile = {};
  let usedPath: string | null = null;
  if (explicitPath || existsSync(configPath)) {
    file = readConfigFile(configPath);
    usedPath = configPath;
  }

  return {
    padding: options.padding ?? envNumber(env, "TILEBAR_PADDING") ??
      file.padding ?? 1,
    lineInterval: options.lineInterval ??
      envNumber(env, "TILEBAR_LINE_INTERVAL") ?? file.lineInterval ?? 100,
    readTimeout: options.readTimeout ??
      envNumber(env, "TILEBAR_READ_TIMEOUT") ?? file.readTimeout ?? 5000,
    verbose: options.verbose ?? envFlag(env, "TILEBAR_VERBOSE") ??
      file.verbose ?? false,
    chunk: file.chunk ?? {},
    units: file.units ?? DEFAULT_UNITS,
    configPath: usedPath,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Config): void {
  if (!Number.isInteger(config.padding) || config.padding < 0) {
    throw new ConfigError("Padding must be a non-negative integer");
  }
  if (config.lineInterval <= 0) {
    throw new ConfigError("Line interval must be positive");
  }
  if (config.lineInterval > MAX_TIMER_DELAY) {
    throw new ConfigError(`Line interval must be at most ${MAX_TIMER_DELAY}ms`);
  }
  if (config.readTimeout <= 0) {
    throw new ConfigError("Read timeout must be positive");
  }
  if (config.readTimeout > MAX_TIMER_DELAY) {
    throw new ConfigError(`Read timeout must be at most ${MAX_TIMER_DELAY}ms`);
  }
  if (config.units.length === 0) {
    throw new ConfigError("At least one unit is required");
  }
  for (const unit of config.units) {
    if (
      unit.interval !== undefined &&
      (unit.interval <= 0 || unit.interval > MAX_TIMER_DELAY)
    ) {
      throw new ConfigError(
        `Interval of unit "${unit.name ?? unit.type}" must be positive and at most ${MAX_TIMER_DELAY}ms`,
      );
    }
  }
}
