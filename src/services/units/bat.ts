import type { ClickEvent, ReadingSet, UnitOptions } from "../../types/unit.ts";
import {
  colorify,
  formatFixed,
  getColor,
  palette,
} from "../../utils/markup.ts";
import {
  BaseUnit,
  readFlag,
  readNumber,
  readString,
  SampleWindow,
} from "./base.ts";

export type BatteryStatus = "chr" | "dis" | "ful" | "bal" | "unk";

export type Uevent = Record<string, string | number>;

export interface BatteryUnitOptions extends UnitOptions {
  /** Numeric battery id, as in BAT0 (default: 0) */
  battery?: number;
}

const STATUS_COLORS: Record<BatteryStatus, string> = {
  chr: palette.green,
  dis: palette.orange,
  ful: palette.blue,
  bal: palette.cyan,
  unk: palette.violet,
};

function isBatteryStatus(value: string): value is BatteryStatus {
  return value in STATUS_COLORS;
}

/**
 * Parse a power supply uevent file into lowercase keys without the
 * POWER_SUPPLY_ prefix; integer values become numbers.
 */
export function parseUevent(text: string): Uevent {
  const out: Uevent = {};
  for (const line of text.split("\n")) {
    const eq = line.indexOf("=");
    if (eq < 0) continue;
    const key = line.slice(0, eq).trim().replace(/^POWER_SUPPLY_/, "")
      .toLowerCase();
    const value = line.slice(eq + 1).trim();
    out[key] = /^-?\d+$/.test(value) ? parseInt(value, 10) : value.toLowerCase();
  }
  return out;
}

/** `HH:MM` of a remaining time in seconds, `--:--` when indefinite */
export function formatRemaining(seconds: number): string {
  if (seconds < 0 || !Number.isFinite(seconds)) return "--:--";
  const rounded = Math.round(seconds);
  const hours = Math.floor(rounded / 3600);
  const minutes = Math.floor(rounded / 60) % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

/**
 * Battery unit using /sys/class/power_supply/BAT<n>/uevent.
 * The charge or discharge rate is smoothed over roughly ten seconds and the
 * smoothing restarts whenever the status changes. Clicking shows the charge
 * relative to design capacity instead of current full capacity.
 *
 * Readings:
 * - `charged_f`: fraction of current full capacity
 * - `charged_f_design`: fraction of design capacity
 * - `status`: one of chr, dis, ful, bal, unk
 * - `sec_rem`: seconds until empty or full, -1 when indefinite
 * - `err_no_bat`: the battery is absent
 * - `err_bad_format`: uevent lacks energy and charge figures
 */
export class BatteryUnit extends BaseUnit {
  readonly kind = "bat";

  readonly battery: number;
  private readonly rates: SampleWindow<number>;
  private status?: BatteryStatus;
  private showDesign = false;

  constructor(options: BatteryUnitOptions = {}) {
    super(options, { pollInterval: 5000 });
    this.battery = options.battery ?? 0;
    this.rates = new SampleWindow(this.windowLength(10000));
  }

  async read(): Promise<ReadingSet> {
    let text: string;
    try {
      text = await this.readText(
        `/sys/class/power_supply/BAT${this.battery}/uevent`,
      );
    } catch {
      return { err_no_bat: true };
    }
    return this.compute(parseUevent(text));
  }

  /**
   * Derive readings from a parsed uevent. Energy figures (µWh, µW) are
   * used when present, charge figures (µAh, µA) otherwise.
   */
  compute(uevent: Uevent): ReadingSet {
    if (uevent.present === 0) {
      return { err_no_bat: true };
    }

    const prefix = "energy_now" in uevent ? "energy" : "charge";
    const now = uevent[`${prefix}_now`];
    const full = uevent[`${prefix}_full`];
    const design = uevent[`${prefix}_full_design`];
    const rate = prefix === "energy" ? uevent.power_now : uevent.current_now;
    if (
      typeof now !== "number" || typeof full !== "number" ||
      typeof design !== "number" || typeof rate !== "number" ||
      full <= 0 || design <= 0
    ) {
      return { err_bad_format: true };
    }

    const raw = typeof uevent.status === "string" ? uevent.status : "unknown";
    let status: BatteryStatus = raw === "charging"
      ? "chr"
      : raw === "discharging"
      ? "dis"
      : raw === "full"
      ? "ful"
      : raw === "not charging"
      ? "bal"
      : "unk";

    if (status !== this.status) {
      this.rates.clear();
      this.status = status;
    }
    this.rates.push(Math.abs(rate));
    const values = this.rates.values();
    const average = values.reduce((a, b) => a + b, 0) / values.length;

    if (average === 0 && (status === "chr" || status === "dis")) {
      status = "bal";
    }

    let secRemaining = -1;
    if (status === "chr") {
      secRemaining = ((full - now) / average) * 3600;
    } else if (status === "dis") {
      secRemaining = (now / average) * 3600;
    }

    return {
      charged_f: now / full,
      charged_f_design: now / design,
      status,
      sec_rem: secRemaining,
    };
  }

  format(readings: ReadingSet): string {
    const prefix = `bat${this.battery}`;

    if (readFlag(readings, "err_no_bat")) {
      return `${prefix} [${colorify("no bat", palette.red)}]`;
    }
    if (readFlag(readings, "err_bad_format")) {
      return `${prefix} [${colorify("unknown format", palette.orange)}]`;
    }

    const percent = 100 *
      readNumber(readings, this.showDesign ? "charged_f_design" : "charged_f");
    const percentText = colorify(
      formatFixed(percent, 3, 0),
      getColor(percent, undefined, undefined, true),
    );

    const rawStatus = readString(readings, "status", "unk");
    const status = isBatteryStatus(rawStatus) ? rawStatus : "unk";
    const statusText = colorify(status, STATUS_COLORS[status]);

    const [open, close] = this.showDesign ? ["&lt;", "&gt;"] : ["[", "]"];
    const remaining = formatRemaining(readNumber(readings, "sec_rem", -1));

    return `bat ${open}${percentText}%${close} [${remaining} rem, ${statusText}]`;
  }

  handleClick(_click: ClickEvent): void {
    this.showDesign = !this.showDesign;
  }
}
