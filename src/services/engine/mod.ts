/**
 * Status engine for i3bar-compatible hosts.
 *
 * Runs every unit on its own cadence, serializes its latest output into a
 * chunk, writes the aggregated line to stdout and routes click events read
 * from stdin back to the clicked unit.
 *
 * @example
 * ```typescript
 * import { StatusEngine } from "./services/engine/mod.ts";
 * import { createUnits } from "./services/units/mod.ts";
 *
 * const engine = new StatusEngine(await createUnits([{ type: "time" }]));
 * engine.start();
 * process.once("SIGTERM", () => void engine.stop());
 * ```
 */

export {
  type EngineMode,
  type EngineOptions,
  type LineSink,
  ReadTimeoutError,
  StatusEngine,
} from "./engine.ts";
export {
  CHUNK_DEFAULTS,
  failedText,
  globalFailureChunk,
  loadingText,
  serializeChunk,
  type SerializeOptions,
} from "./chunk.ts";
export {
  ClickRouter,
  type ClickTarget,
  parseClick,
  readClicks,
  type RoutedClick,
} from "./click-router.ts";
export { ClickScanner, MAX_OBJECT_LENGTH } from "./click-scanner.ts";
export { assignNames, findDuplicateName, NameRegistry } from "./names.ts";
export { ChunkOverrides } from "./overrides.ts";
export { encodeHeader, encodeLine, HEADER } from "./protocol.ts";
export { MAX_TIMER_DELAY, type WakeReason, Wakeup } from "./wakeup.ts";
