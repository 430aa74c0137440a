/**
 * Built-in status units.
 *
 * Each unit reads one source (a /proc or /sys file, or an external command),
 * turns it into a set of readings and formats them as Pango markup. Units
 * that need an executable missing from PATH are replaced by a placeholder
 * that reports the missing dependency.
 *
 * @example
 * ```typescript
 * import { createUnits } from "./services/units/mod.ts";
 *
 * const units = await createUnits([
 *   { type: "cpu", interval: 1000 },
 *   { type: "net", interface: "eth0" },
 * ]);
 * ```
 */

export { createUnit, createUnits, listUnitTypes, UNIT_TYPES } from "./factory.ts";
export {
  type ExecutableLookup,
  guardDependencies,
  MissingDependencyUnit,
} from "./missing-dependency.ts";

// Base class for custom units
export { BaseUnit, SampleWindow } from "./base.ts";

// Built-in units
export { MemoryUnit } from "./mem.ts";
export { CpuUnit } from "./cpu.ts";
export { TimeUnit } from "./time.ts";
export { DiskUnit } from "./disk.ts";
export { NetUnit } from "./net.ts";
export { BatteryUnit } from "./bat.ts";
export { GpuUnit } from "./gpu.ts";
export { WifiUnit } from "./wifi.ts";
export { IpUnit } from "./ip.ts";
