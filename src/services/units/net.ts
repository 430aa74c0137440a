import type { ClickEvent, ReadingSet, UnitOptions } from "../../types/unit.ts";
import {
  colorify,
  formatFixed,
  palette,
} from "../../utils/markup.ts";
import { BaseUnit, readFlag, readNumber, SampleWindow } from "./base.ts";

export interface NetSample {
  rxBytes: number;
  txBytes: number;
  /** Milliseconds */
  time: number;
}

export interface NetUnitOptions extends UnitOptions {
  /** Interface name as found under /sys/class/net */
  interface: string;
}

/**
 * Scale a byte count or rate to the largest binary prefix it exceeds.
 * @returns the scaled value and its colored suffix
 */
export function scaleBytes(value: number, per = "/s"): [number, string] {
  const steps: [number, string][] = [
    [30, colorify(`G${per}`, palette.violet)],
    [20, colorify(`M${per}`, palette.white)],
    [10, `K${per}`],
  ];
  for (const [shift, suffix] of steps) {
    const unit = 2 ** shift;
    if (value > unit) {
      return [value / unit, suffix];
    }
  }
  return [value, colorify(`B${per}`, palette.grey)];
}

/**
 * Network unit using /sys/class/net statistics.
 * Shows upload and download rates averaged over roughly two seconds;
 * clicking switches to bytes transferred since boot.
 *
 * Readings:
 * - `bps_down`, `bps_up`: bytes per second
 * - `rx_total`, `tx_total`: cumulative byte counters
 * - `err_if_gone`: the interface does not exist
 * - `err_if_down`: the interface is down
 * - `err_if_loading`: not enough samples for a rate yet
 */
export class NetUnit extends BaseUnit {
  readonly kind = "net";

  readonly interface: string;
  private readonly samples: SampleWindow<NetSample>;
  private showTotals = false;

  constructor(options: NetUnitOptions) {
    super(options, { pollInterval: 1000 });
    this.interface = options.interface;
    this.samples = new SampleWindow(this.windowLength(2000, 2));
  }

  async read(): Promise<ReadingSet> {
    const base = `/sys/class/net/${this.interface}`;

    let operstate: string;
    try {
      operstate = await this.readText(`${base}/operstate`);
    } catch {
      this.samples.clear();
      return { err_if_gone: true };
    }
    if (operstate.includes("down")) {
      this.samples.clear();
      return { err_if_down: true };
    }

    const [rx, tx] = await Promise.all([
      this.readText(`${base}/statistics/rx_bytes`),
      this.readText(`${base}/statistics/tx_bytes`),
    ]);
    return this.record({
      rxBytes: parseInt(rx, 10) || 0,
      txBytes: parseInt(tx, 10) || 0,
      time: Date.now(),
    });
  }

  /** Add a sample and compute rates across the window */
  record(sample: NetSample): ReadingSet {
    this.samples.push(sample);
    const totals = { rx_total: sample.rxBytes, tx_total: sample.txBytes };

    const first = this.samples.first;
    const elapsed = first ? (sample.time - first.time) / 1000 : 0;
    if (!first || this.samples.size < 2 || elapsed <= 0) {
      return { err_if_loading: true, ...totals };
    }

    return {
      bps_down: Math.max(0, sample.rxBytes - first.rxBytes) / elapsed,
      bps_up: Math.max(0, sample.txBytes - first.txBytes) / elapsed,
      ...totals,
    };
  }

  format(readings: ReadingSet): string {
    const prefix = `net ${this.interface} `;

    if (readFlag(readings, "err_if_gone")) {
      return prefix + colorify("gone", palette.red);
    }
    if (readFlag(readings, "err_if_down")) {
      return prefix + colorify("down", palette.orange);
    }

    if (this.showTotals) {
      const [down, downSuffix] = scaleBytes(readNumber(readings, "rx_total"), "");
      const [up, upSuffix] = scaleBytes(readNumber(readings, "tx_total"), "");
      return prefix +
        `[u ${formatFixed(up, 6, 1)} ${upSuffix}] [d ${
          formatFixed(down, 6, 1)
        } ${downSuffix}] total`;
    }

    if (readFlag(readings, "err_if_loading")) {
      return prefix + colorify("loading", palette.violet);
    }

    const [down, downSuffix] = scaleBytes(readNumber(readings, "bps_down"));
    const [up, upSuffix] = scaleBytes(readNumber(readings, "bps_up"));
    return prefix +
      `[u ${formatFixed(up, 6, 1)} ${upSuffix}] [d ${
        formatFixed(down, 6, 1)
      } ${downSuffix}]`;
  }

  handleClick(_click: ClickEvent): void {
    this.showTotals = !this.showTotals;
  }
}
