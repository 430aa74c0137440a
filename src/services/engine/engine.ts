/**
 * Status engine: schedules every unit on its own cadence, keeps the latest
 * chunk of each and writes the aggregated line to the host.
 */

import type {
  ChunkAttributes,
  ReadingSet,
  Unit,
  UnitState,
} from "../../types/unit.ts";
import type { Logger } from "../../utils/logger.ts";
import { silentLogger } from "../../utils/logger.ts";
import {
  failedText,
  globalFailureChunk,
  loadingText,
  selfReportedText,
  serializeChunk,
  type SerializeOptions,
} from "./chunk.ts";
import { ClickRouter, type ClickTarget } from "./click-router.ts";
import { assignNames, findDuplicateName, NameRegistry } from "./names.ts";
import { encodeHeader, encodeLine } from "./protocol.ts";
import { MAX_TIMER_DELAY, Wakeup } from "./wakeup.ts";

/** Where status lines go (process.stdout in production) */
export interface LineSink {
  write(chunk: string): unknown;
}

export interface EngineOptions {
  /** Spaces on each side of every chunk's text (default: 1) */
  padding?: number;
  /** Milliseconds between line flushes (default: 100) */
  lineInterval?: number;
  /** Milliseconds between repeats of the global failure line (default: 1000) */
  failureInterval?: number;
  /** Milliseconds a unit's read may take before it counts as failed (default: 5000) */
  readTimeout?: number;
  /** Call-site chunk attribute overrides */
  globals?: ChunkAttributes;
  /** Status line destination (default: process.stdout) */
  output?: LineSink;
  /** Click event source; null disables click routing (default: process.stdin) */
  input?: AsyncIterable<string | Uint8Array> | null;
  logger?: Logger;
  /** Name registry for units without an explicit name */
  names?: NameRegistry;
}

export type EngineMode = "created" | "running" | "global-failure" | "stopped";

/** Error used when a unit's read does not settle in time */
export class ReadTimeoutError extends Error {
  constructor(unitName: string, timeoutMs: number) {
    super(`Read of unit "${unitName}" timed out after ${timeoutMs}ms`);
    this.name = "ReadTimeoutError";
  }
}

function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  unitName: string,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(
      () => reject(new ReadTimeoutError(unitName, timeoutMs)),
      Math.min(timeoutMs, MAX_TIMER_DELAY),
    );
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export class StatusEngine {
  readonly units: readonly Unit[];
  /** Name held by two units, which puts the engine in global failure mode */
  readonly duplicateName: string | null;

  private readonly outputs = new Map<string, string>();
  private readonly states = new Map<string, UnitState>();
  private readonly targets = new Map<string, ClickTarget>();
  /** Reads still running, possibly past their timeout */
  private readonly pendingReads = new Map<string, Promise<ReadingSet>>();
  private readonly serializeOptions: SerializeOptions;
  private readonly lineInterval: number;
  private readonly failureInterval: number;
  private readonly readTimeout: number;
  private readonly output: LineSink;
  private readonly input: AsyncIterable<string | Uint8Array> | null;
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private readonly flushTimer = new Wakeup();
  private tasks: Promise<void>[] = [];
  private lastLine: string | null = null;
  private currentMode: EngineMode = "created";

  constructor(units: Unit[], options: EngineOptions = {}) {
    this.units = units;
    this.serializeOptions = {
      padding: options.padding ?? 1,
      globals: options.globals ?? {},
    };
    this.lineInterval = options.lineInterval ?? 100;
    this.failureInterval = options.failureInterval ?? 1000;
    this.readTimeout = options.readTimeout ?? 5000;
    this.output = options.output ?? process.stdout;
    this.input = options.input === undefined ? process.stdin : options.input;
    this.logger = options.logger ?? silentLogger;

    assignNames(units, options.names ?? new NameRegistry());
    this.duplicateName = findDuplicateName(units);
    if (this.duplicateName !== null) {
      return;
    }

    for (const unit of units) {
      this.targets.set(unit.name, { unit, wakeup: new Wakeup() });
      this.states.set(unit.name, "idle");
      this.outputs.set(
        unit.name,
        serializeChunk(unit, loadingText(unit.name), this.serializeOptions),
      );
    }
  }

  get mode(): EngineMode {
    return this.currentMode;
  }

  /** Scheduling state of the named unit */
  stateOf(name: string): UnitState | undefined {
    return this.states.get(name);
  }

  /** Latest serialized chunk of every unit, in declaration order */
  snapshot(): string[] {
    return this.units.map((unit) => this.outputs.get(unit.name) ?? "");
  }

  /** The line the next flush would write */
  renderLine(): string {
    return encodeLine(this.snapshot());
  }

  /**
   * Write the header and start scheduling. In global failure mode only the
   * failure line is written, repeatedly; no unit runs and no click is read.
   */
  start(): void {
    if (this.currentMode !== "created") {
      throw new Error(`Engine cannot start from mode "${this.currentMode}"`);
    }

    this.output.write(encodeHeader());

    if (this.duplicateName !== null) {
      this.currentMode = "global-failure";
      this.logger.error(`Duplicate unit name "${this.duplicateName}"`);
      this.tasks.push(this.failureLoop(this.duplicateName));
      return;
    }

    this.currentMode = "running";
    this.logger.info(
      `Starting ${this.units.length} unit(s): ${
        this.units.map((unit) => unit.name).join(", ")
      }`,
    );

    for (const unit of this.units) {
      this.tasks.push(this.unitLoop(unit));
    }
    this.tasks.push(this.lineLoop());

    if (this.input) {
      // not joined by stop(): it may be parked on an idle input stream
      const router = new ClickRouter(this.targets, this.logger);
      router.run(this.input, this.controller.signal).then(
        () => this.logger.debug("Click input closed"),
        (error: unknown) => this.logger.error("Click router stopped", error),
      );
    }
  }

  /**
   * Stop every task and release unit resources.
   */
  async stop(): Promise<void> {
    if (this.currentMode === "stopped") return;
    this.currentMode = "stopped";
    this.controller.abort();
    await Promise.all(this.tasks);
    this.tasks = [];

    const results = await Promise.allSettled(
      this.units.map(async (unit) => await unit.dispose?.()),
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error(
          `Disposing unit "${this.units[index]?.name}" failed`,
          result.reason,
        );
      }
    });
  }

  /**
   * Run one read-format-publish cycle of the named unit.
   * Failures are published as the unit's chunk, never thrown.
   * @returns the published chunk ("" when suppressed)
   */
  async refresh(name: string): Promise<string> {
    const target = this.targets.get(name);
    if (!target) {
      throw new Error(`Unknown unit "${name}"`);
    }
    return await this.runCycle(target.unit);
  }

  /**
   * Write the current line unless it equals the last one written.
   * @returns whether a line was written
   */
  flush(): boolean {
    const line = this.renderLine();
    if (line === this.lastLine) {
      return false;
    }
    this.output.write(line);
    this.lastLine = line;
    return true;
  }

  private async runCycle(unit: Unit): Promise<string> {
    let chunk: string;

    try {
      this.states.set(unit.name, "reading");
      const readings = await withTimeout(
        this.currentRead(unit),
        this.readTimeout,
        unit.name,
      );

      let text: string | null;
      if (unit.failure !== null) {
        text = selfReportedText(unit.failure);
      } else {
        this.states.set(unit.name, "formatting");
        text = unit.format(readings);
      }

      this.states.set(unit.name, "publishing");
      chunk = serializeChunk(unit, text, this.serializeOptions);
    } catch (error) {
      this.states.set(unit.name, "failed");
      this.logger.error(`Unit "${unit.name}" failed`, error);
      chunk = serializeChunk(
        unit,
        failedText(unit.name),
        this.serializeOptions,
      );
    }

    this.outputs.set(unit.name, chunk);
    this.states.set(unit.name, "idle");
    return chunk;
  }

  /**
   * The unit's read still in flight, or a new one. A read that outlived its
   * timeout is awaited again rather than overlapped.
   */
  private currentRead(unit: Unit): Promise<ReadingSet> {
    const pending = this.pendingReads.get(unit.name);
    if (pending) {
      this.logger.debug(`Read of unit "${unit.name}" still pending`);
      return pending;
    }

    const read = unit.read();
    this.pendingReads.set(unit.name, read);
    const settle = () => {
      this.pendingReads.delete(unit.name);
    };
    read.then(settle, settle);
    return read;
  }

  private async unitLoop(unit: Unit): Promise<void> {
    const signal = this.controller.signal;
    const target = this.targets.get(unit.name);
    if (!target) return;

    while (!signal.aborted) {
      await this.runCycle(unit);
      const reason = await target.wakeup.wait(unit.pollInterval, signal);
      if (reason === "aborted") break;
    }
  }

  private async lineLoop(): Promise<void> {
    const signal = this.controller.signal;

    // first line goes out one interval in, after reads that settle at once
    for (;;) {
      const reason = await this.flushTimer.wait(this.lineInterval, signal);
      if (reason === "aborted") break;
      this.flush();
    }
  }

  private async failureLoop(duplicate: string): Promise<void> {
    const signal = this.controller.signal;
    const line = encodeLine([globalFailureChunk(duplicate)]);

    while (!signal.aborted) {
      this.output.write(line);
      await this.flushTimer.wait(this.failureInterval, signal);
    }
  }
}
