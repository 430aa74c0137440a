import { readFile } from "node:fs/promises";
import type {
  ClickEvent,
  ReadingSet,
  ReadingValue,
  Unit,
  UnitOptions,
} from "../../types/unit.ts";
import { DEFAULT_COMMAND_TIMEOUT, executeCommand } from "../../utils/command.ts";
import { palette } from "../../utils/markup.ts";
import { ChunkOverrides } from "../engine/overrides.ts";

/**
 * Abstract base class for units.
 * Provides naming, overrides, click feedback and I/O helpers.
 */
export abstract class BaseUnit implements Unit {
  abstract readonly kind: string;

  readonly requestedName?: string;
  readonly pollInterval: number;
  readonly requires: readonly string[];
  readonly overrides = new ChunkOverrides();
  failure: string | null = null;

  private resolvedName?: string;

  /**
   * @param options - name, interval and extra requirements from configuration
   * @param defaults - the unit kind's own interval and required executables
   */
  constructor(
    options: UnitOptions = {},
    defaults: { pollInterval: number; requires?: string[] } = {
      pollInterval: 1000,
    },
  ) {
    this.requestedName = options.name;
    this.pollInterval = options.pollInterval ?? defaults.pollInterval;
    this.requires = [...(defaults.requires ?? []), ...(options.requires ?? [])];
  }

  get name(): string {
    return this.resolvedName ?? this.requestedName ?? this.kind;
  }

  set name(value: string) {
    this.resolvedName = value;
  }

  abstract read(): Promise<ReadingSet>;

  abstract format(readings: ReadingSet): string | null;

  /**
   * Default click feedback: a red border on the next chunk
   */
  handleClick(_click: ClickEvent): void {
    this.overrides.setTransient({ border: palette.red });
  }

  /** Read a text file, e.g. under /proc or /sys */
  protected async readText(path: string): Promise<string> {
    return await readFile(path, "utf8");
  }

  /** Run an external command with a bounded runtime */
  protected async run(
    file: string,
    args: readonly string[] = [],
    timeoutMs = DEFAULT_COMMAND_TIMEOUT,
  ): Promise<string> {
    return await executeCommand(file, args, timeoutMs);
  }

  /**
   * Number of samples covering `windowMs` at this unit's poll interval
   */
  protected windowLength(windowMs: number, minimum = 1): number {
    return Math.max(minimum, Math.round(windowMs / this.pollInterval));
  }
}

/** Numeric reading, or `fallback` when absent or not a number */
export function readNumber(
  readings: ReadingSet,
  key: string,
  fallback = 0,
): number {
  const value: ReadingValue | undefined = readings[key];
  return typeof value === "number" ? value : fallback;
}

export function readString(
  readings: ReadingSet,
  key: string,
  fallback = "",
): string {
  const value: ReadingValue | undefined = readings[key];
  return typeof value === "string" ? value : fallback;
}

/** Whether the boolean flag `key` is set */
export function readFlag(readings: ReadingSet, key: string): boolean {
  return readings[key] === true;
}

/**
 * Fixed-length sample history with a running view of the oldest and newest
 */
export class SampleWindow<T> {
  private items: T[] = [];

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }

  get first(): T | undefined {
    return this.items[0];
  }

  get last(): T | undefined {
    return this.items[this.items.length - 1];
  }

  values(): readonly T[] {
    return this.items;
  }
}
