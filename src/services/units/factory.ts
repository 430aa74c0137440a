import type { UnitConfig, UnitType } from "../../config/schema.ts";
import type { Unit, UnitOptions } from "../../types/unit.ts";
import { BatteryUnit } from "./bat.ts";
import { CpuUnit } from "./cpu.ts";
import { DiskUnit } from "./disk.ts";
import { GpuUnit } from "./gpu.ts";
import { IpUnit } from "./ip.ts";
import { MemoryUnit } from "./mem.ts";
import { type ExecutableLookup, guardDependencies } from "./missing-dependency.ts";
import { NetUnit } from "./net.ts";
import { TimeUnit } from "./time.ts";
import { WifiUnit } from "./wifi.ts";

export const UNIT_TYPES: readonly UnitType[] = [
  "mem",
  "cpu",
  "time",
  "disk",
  "net",
  "bat",
  "gpu",
  "wifi",
  "ip",
];

const DESCRIPTIONS: Record<UnitType, string> = {
  mem: "Memory in use, from /proc/meminfo",
  cpu: "CPU load and temperature, from /proc/stat and thermal zones",
  time: "Date and time; click for uptime and load averages",
  disk: "Block device activity; click for filesystem usage",
  net: "Interface throughput; click for bytes transferred",
  bat: "Battery charge and time remaining",
  gpu: "NVIDIA GPU memory, load and temperature via nvidia-smi",
  wifi: "Wireless network and link quality via iw; click hides the SSID",
  ip: "Public IP address from an echo service",
};

function commonOptions(config: UnitConfig): UnitOptions {
  return {
    name: config.name,
    pollInterval: config.interval,
    requires: config.requires,
  };
}

/**
 * Build a unit from its configuration entry
 */
export function createUnit(config: UnitConfig): Unit {
  const options = commonOptions(config);
  switch (config.type) {
    case "mem":
      return new MemoryUnit(options);
    case "cpu":
      return new CpuUnit(options);
    case "time":
      return new TimeUnit(options);
    case "disk":
      return new DiskUnit({ ...options, disk: config.disk, path: config.path });
    case "net":
      return new NetUnit({ ...options, interface: config.interface });
    case "bat":
      return new BatteryUnit({ ...options, battery: config.battery });
    case "gpu":
      return new GpuUnit(options);
    case "wifi":
      return new WifiUnit({ ...options, interface: config.interface });
    case "ip":
      return new IpUnit({ ...options, url: config.url });
  }
}

export interface CreateUnitsOptions {
  /** Executable lookup used for required dependencies */
  exists?: ExecutableLookup;
}

/**
 * Build all configured units, replacing those with a missing executable
 * by their placeholder.
 */
export async function createUnits(
  configs: readonly UnitConfig[],
  options: CreateUnitsOptions = {},
): Promise<Unit[]> {
  const units: Unit[] = [];
  for (const config of configs) {
    units.push(await guardDependencies(createUnit(config), options.exists));
  }
  return units;
}

/**
 * List the built-in unit types with a short description.
 */
export function listUnitTypes(): { type: UnitType; description: string }[] {
  return UNIT_TYPES.map((type) => ({ type, description: DESCRIPTIONS[type] }));
}
