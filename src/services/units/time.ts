import { availableParallelism } from "node:os";
import type { ClickEvent, ReadingSet, UnitOptions } from "../../types/unit.ts";
import { colorizeNumber, formatDuration } from "../../utils/markup.ts";
import { BaseUnit, readNumber } from "./base.ts";

const DAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

/** `Www Mmm DD YYYY - HH:MM` in local time */
export function formatClock(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${DAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${
    pad(date.getDate())
  } ${date.getFullYear()} - ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export interface TimeUnitOptions extends UnitOptions {
  /** Clock source */
  now?: () => Date;
  /** Core count used to scale load average colors */
  cores?: number;
}

/**
 * Time unit. Shows the date and time; clicking switches to uptime and load
 * average, read from /proc only while that view is active.
 *
 * Readings:
 * - `date`: formatted local date and time
 * - `uptime_s`: seconds since boot (uptime view)
 * - `load1`, `load5`, `load15`: load averages (uptime view)
 */
export class TimeUnit extends BaseUnit {
  readonly kind = "time";

  private showUptime = false;
  private readonly now: () => Date;
  private readonly loadBreakpoints: number[];

  constructor(options: TimeUnitOptions = {}) {
    super(options, { pollInterval: 1000 });
    this.now = options.now ?? (() => new Date());
    const cores = options.cores ?? availableParallelism();
    this.loadBreakpoints = [0.1, 0.25, 0.5, 0.75].map((f) => f * cores);
  }

  async read(): Promise<ReadingSet> {
    if (!this.showUptime) {
      return { date: formatClock(this.now()) };
    }

    const [uptime, loadavg] = await Promise.all([
      this.readText("/proc/uptime"),
      this.readText("/proc/loadavg"),
    ]);
    return this.parseUptime(uptime, loadavg);
  }

  parseUptime(uptime: string, loadavg: string): ReadingSet {
    const [load1, load5, load15] = loadavg.trim().split(/\s+/).map(parseFloat);
    return {
      uptime_s: parseFloat(uptime.trim().split(/\s+/)[0] ?? "0") || 0,
      load1: load1 || 0,
      load5: load5 || 0,
      load15: load15 || 0,
    };
  }

  format(readings: ReadingSet): string {
    if (typeof readings.date === "string") {
      return readings.date;
    }

    const loads = ["load1", "load5", "load15"].map((key) =>
      colorizeNumber(readNumber(readings, key), 4, 2, this.loadBreakpoints)
    );
    return `uptime [${formatDuration(readNumber(readings, "uptime_s"))}] load [${
      loads.join("/")
    }]`;
  }

  handleClick(_click: ClickEvent): void {
    this.showUptime = !this.showUptime;
  }
}
