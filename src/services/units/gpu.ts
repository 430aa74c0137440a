import type { ReadingSet, UnitOptions } from "../../types/unit.ts";
import {
  colorify,
  getColor,
  palette,
  temperatureString,
} from "../../utils/markup.ts";
import { BaseUnit, readFlag, readNumber } from "./base.ts";

/**
 * GPU information for a single device
 */
export interface GpuInfo {
  index: number;
  name: string;
  utilization: number;
  memoryUsed: number;
  memoryTotal: number;
  temperature: number;
}

const QUERY_ARGS = [
  "--query-gpu=index,name,utilization.gpu,memory.used,memory.total,temperature.gpu",
  "--format=csv,noheader,nounits",
];

/**
 * NVIDIA GPU unit using nvidia-smi.
 * Sums memory over all devices, averages load and shows the hottest one.
 *
 * Readings:
 * - `gpu_count`: number of devices
 * - `mem_mib`, `mem_total_mib`, `mem_pct`: memory used
 * - `load_pct`: average utilization
 * - `temp_c`: highest temperature
 * - `err_no_gpu`: nvidia-smi listed no device
 */
export class GpuUnit extends BaseUnit {
  readonly kind = "gpu";

  constructor(options: UnitOptions = {}) {
    super(options, { pollInterval: 5000, requires: ["nvidia-smi"] });
  }

  async read(): Promise<ReadingSet> {
    return this.parseOutput(await this.run("nvidia-smi", QUERY_ARGS));
  }

  parseDevices(stdout: string): GpuInfo[] {
    const gpus: GpuInfo[] = [];

    for (const line of stdout.trim().split("\n")) {
      const parts = line.split(",").map((s) => s.trim());
      if (parts.length < 6) continue;
      gpus.push({
        index: parseInt(parts[0] ?? "", 10) || 0,
        name: parts[1] ?? "",
        utilization: parseInt(parts[2] ?? "", 10) || 0,
        memoryUsed: parseInt(parts[3] ?? "", 10) || 0,
        memoryTotal: parseInt(parts[4] ?? "", 10) || 0,
        temperature: parseInt(parts[5] ?? "", 10) || 0,
      });
    }

    return gpus;
  }

  parseOutput(stdout: string): ReadingSet {
    const gpus = this.parseDevices(stdout);
    if (gpus.length === 0) {
      return { err_no_gpu: true };
    }

    const memUsed = gpus.reduce((sum, g) => sum + g.memoryUsed, 0);
    const memTotal = gpus.reduce((sum, g) => sum + g.memoryTotal, 0);
    const load = gpus.reduce((sum, g) => sum + g.utilization, 0) / gpus.length;

    return {
      gpu_count: gpus.length,
      mem_mib: memUsed,
      mem_total_mib: memTotal,
      mem_pct: memTotal > 0 ? Math.round((memUsed / memTotal) * 100) : 0,
      load_pct: Math.round(load),
      temp_c: Math.max(...gpus.map((g) => g.temperature)),
    };
  }

  format(readings: ReadingSet): string {
    if (readFlag(readings, "err_no_gpu")) {
      return `gpu [${colorify("no device", palette.red)}]`;
    }

    const mem = readNumber(readings, "mem_mib");
    const memPct = readNumber(readings, "mem_pct");
    const load = readNumber(readings, "load_pct");

    return `gpu [mem used ${
      colorify(String(mem).padStart(5), getColor(memPct))
    } MiB (${colorify(String(memPct).padStart(3), getColor(memPct))}%)] [load ${
      colorify(String(load).padStart(3), getColor(load))
    }%] [temp ${temperatureString(readNumber(readings, "temp_c"))} C]`;
  }
}
