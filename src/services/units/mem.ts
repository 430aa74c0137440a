import type { ReadingSet, UnitOptions } from "../../types/unit.ts";
import {
  colorify,
  formatFixed,
  getColor,
  palette,
} from "../../utils/markup.ts";
import { BaseUnit, readFlag, readNumber } from "./base.ts";

/**
 * Memory unit using /proc/meminfo.
 * Shows memory in use (total minus available), in GiB and percent.
 *
 * Readings:
 * - `used_kib`: used memory, KiB
 * - `used_frac`: fraction of memory used
 * - `err_bad_format`: meminfo lacked MemTotal
 */
export class MemoryUnit extends BaseUnit {
  readonly kind = "mem";

  constructor(options: UnitOptions = {}) {
    super(options, { pollInterval: 3000 });
  }

  async read(): Promise<ReadingSet> {
    return this.parseMeminfo(await this.readText("/proc/meminfo"));
  }

  parseMeminfo(text: string): ReadingSet {
    const memInfo: Record<string, number> = {};

    // "Key:        12345 kB"
    for (const line of text.split("\n")) {
      const match = line.match(/^(\w+):\s+(\d+)/);
      if (match?.[1] && match[2]) {
        memInfo[match[1]] = parseInt(match[2], 10);
      }
    }

    const totalKib = memInfo["MemTotal"] ?? 0;
    if (totalKib <= 0) {
      return { err_bad_format: true };
    }
    const availableKib = memInfo["MemAvailable"] ?? memInfo["MemFree"] ?? 0;
    const usedKib = totalKib - availableKib;

    return {
      used_kib: usedKib,
      used_frac: usedKib / totalKib,
    };
  }

  format(readings: ReadingSet): string {
    if (readFlag(readings, "err_bad_format")) {
      return `mem [${colorify("unreadable", palette.red)}]`;
    }

    const percent = readNumber(readings, "used_frac") * 100;
    const usedGib = readNumber(readings, "used_kib") / (1 << 20);
    const color = getColor(percent);

    return `mem [used ${colorify(formatFixed(usedGib, 4, 1), color)} GiB (${
      colorify(formatFixed(percent, 3, 0), color)
    }%)]`;
  }
}
