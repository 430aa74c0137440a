import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { ClickEvent, ReadingSet, UnitOptions } from "../../types/unit.ts";
import {
  colorify,
  formatFixed,
  getColor,
  palette,
  temperatureString,
} from "../../utils/markup.ts";
import { BaseUnit, readFlag, readNumber, SampleWindow } from "./base.ts";

/** Jiffies from the aggregate line of /proc/stat */
export interface CpuTimes {
  total: number;
  user: number;
  kernel: number;
}

const THERMAL_ROOT = "/sys/class/thermal";

/**
 * CPU unit using /proc/stat and the thermal zones.
 * Load is averaged over roughly two seconds; clicking toggles between the
 * aggregate load and the user/kernel breakdown.
 *
 * Readings:
 * - `p_user`, `p_kernel`: fraction of CPU time in userland / kernel
 * - `temp_c`: average thermal zone temperature
 * - `err_loading`: first sample, no delta yet
 * - `err_no_temp`: no thermal zone could be read
 */
export class CpuUnit extends BaseUnit {
  readonly kind = "cpu";

  private showBreakdown = false;
  private lastTimes?: CpuTimes;
  private deltas: SampleWindow<CpuTimes>;

  constructor(options: UnitOptions = {}) {
    super(options, { pollInterval: 1000 });
    this.deltas = new SampleWindow(this.windowLength(2000));
  }

  async read(): Promise<ReadingSet> {
    const times = this.parseStat(await this.readText("/proc/stat"));
    const readings = this.record(times);

    const temp = await this.readTemperature();
    if (temp === null) {
      readings.err_no_temp = true;
    } else {
      readings.temp_c = temp;
    }
    return readings;
  }

  /**
   * Parse the aggregate `cpu` line.
   * cpu  user nice system idle iowait irq softirq steal ...
   */
  parseStat(text: string): CpuTimes {
    const line = text.split("\n").find((l) => l.startsWith("cpu ")) ?? "";
    const parts = line.split(/\s+/).slice(1, 9).map((n) => parseInt(n, 10) || 0);

    return {
      total: parts.reduce((a, b) => a + b, 0),
      user: (parts[0] ?? 0) + (parts[1] ?? 0),
      kernel: parts[2] ?? 0,
    };
  }

  /**
   * Add a sample and return the smoothed usage fractions.
   */
  record(times: CpuTimes): ReadingSet {
    const previous = this.lastTimes;
    this.lastTimes = times;
    if (!previous) {
      return { err_loading: true };
    }

    this.deltas.push({
      total: times.total - previous.total,
      user: times.user - previous.user,
      kernel: times.kernel - previous.kernel,
    });

    let total = 0;
    let user = 0;
    let kernel = 0;
    for (const delta of this.deltas.values()) {
      total += delta.total;
      user += delta.user;
      kernel += delta.kernel;
    }

    return {
      p_user: total > 0 ? user / total : 0,
      p_kernel: total > 0 ? kernel / total : 0,
    };
  }

  /** Average of all thermal zones in degrees C, null when none reads */
  private async readTemperature(): Promise<number | null> {
    let zones: string[];
    try {
      zones = (await readdir(THERMAL_ROOT))
        .filter((entry) => entry.startsWith("thermal_zone"));
    } catch {
      return null;
    }

    const temps: number[] = [];
    for (const zone of zones) {
      try {
        const value = parseFloat(
          await this.readText(join(THERMAL_ROOT, zone, "temp")),
        );
        if (!Number.isNaN(value)) {
          temps.push(value / 1000);
        }
      } catch {
        // zone without a readable sensor
        continue;
      }
    }

    if (temps.length === 0) return null;
    return temps.reduce((a, b) => a + b, 0) / temps.length;
  }

  format(readings: ReadingSet): string {
    if (readFlag(readings, "err_loading")) {
      return `cpu [${colorify("loading", palette.violet)}]`;
    }

    const user = readNumber(readings, "p_user") * 100;
    const kernel = readNumber(readings, "p_kernel") * 100;

    const load = this.showBreakdown
      ? `u ${colorify(formatFixed(user, 3, 0), getColor(user))}% k ${
        colorify(formatFixed(kernel, 3, 0), getColor(kernel))
      }%`
      : `load ${
        colorify(`${formatFixed(user + kernel, 3, 0)}%`, getColor(user + kernel))
      }`;

    const temp = readFlag(readings, "err_no_temp")
      ? colorify("unk", palette.orange)
      : `${temperatureString(readNumber(readings, "temp_c"))} C`;

    return `cpu [${load}] [temp ${temp}]`;
  }

  handleClick(_click: ClickEvent): void {
    this.showBreakdown = !this.showBreakdown;
  }
}
