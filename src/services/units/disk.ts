import { readdir } from "node:fs/promises";
import type { ClickEvent, ReadingSet, UnitOptions } from "../../types/unit.ts";
import {
  colorify,
  escapeMarkup,
  getColor,
  palette,
} from "../../utils/markup.ts";
import { BaseUnit, readFlag, readNumber, readString } from "./base.ts";

const BARS = [" ", "▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"];
/** Bytes per second at which each bar step starts */
const THRESHOLDS = [1, 1 << 10, 1 << 12, 1 << 14, 1 << 16, 1 << 18, 1 << 20, 1 << 22];

/** Bar glyph for a throughput in bytes per second */
export function activityBar(bytesPerSecond: number): string {
  const index = THRESHOLDS.filter((t) => t <= bytesPerSecond).length;
  return BARS[index] ?? " ";
}

/** Space figures parsed from `df -B1` */
export interface DiskSpace {
  filesystem: string;
  totalBytes: number;
  usedBytes: number;
  availableBytes: number;
  usagePercent: number;
}

export interface DiskUnitOptions extends UnitOptions {
  /** Block device as named under /dev, e.g. "sda" or "nvme0n1p2" */
  disk: string;
  /** Mount point whose space usage the click view shows (default: "/") */
  path?: string;
}

export interface IoSample {
  readBytes: number;
  writtenBytes: number;
  time: number;
}

/**
 * Disk unit. Shows read/write activity of a block device as bar glyphs,
 * from /sys/class/block/<disk>/stat; clicking switches to `df` space usage.
 * A missing device is reported as the unit's own failure until it returns.
 *
 * Readings:
 * - `bps_read`, `bps_write`: bytes per second
 * - `space_used`, `space_total`, `space_pct`: space view, bytes and percent
 * - `err_loading`: first sample, no rate yet
 * - `err_no_disk`: the device does not exist
 * - `err_no_space`: space view only, `df` failed or is missing
 */
export class DiskUnit extends BaseUnit {
  readonly kind = "disk";

  readonly disk: string;
  private readonly path: string;
  private sectorSize = 0;
  private last?: IoSample;
  private showSpace = false;

  constructor(options: DiskUnitOptions) {
    super(options, { pollInterval: 1000 });
    this.disk = options.disk;
    this.path = options.path ?? "/";
  }

  async read(): Promise<ReadingSet> {
    if (this.sectorSize === 0) {
      this.sectorSize = await this.findSectorSize();
    }
    if (this.sectorSize === 0) {
      this.failure = `no disk ${this.disk}`;
      this.last = undefined;
      return { err_no_disk: true };
    }

    let stat: string;
    try {
      stat = await this.readText(`/sys/class/block/${this.disk}/stat`);
    } catch {
      this.sectorSize = 0;
      this.failure = `no disk ${this.disk}`;
      this.last = undefined;
      return { err_no_disk: true };
    }
    this.failure = null;

    const readings = this.record(this.parseStat(stat, Date.now()));
    if (this.showSpace) {
      Object.assign(readings, await this.readSpace());
    }
    return readings;
  }

  /** Space view readings; a failing df only affects this view */
  private async readSpace(): Promise<ReadingSet> {
    let stdout: string;
    try {
      stdout = await this.run("df", ["-B1", this.path]);
    } catch {
      return { err_no_space: true };
    }
    const space = this.parseDf(stdout);
    return {
      space_used: space.usedBytes,
      space_total: space.totalBytes,
      space_pct: space.usagePercent,
      space_fs: space.filesystem,
    };
  }

  /**
   * Parse a block device stat line into cumulative bytes.
   * Field 3 is sectors read, field 7 sectors written.
   */
  parseStat(
    text: string,
    time: number,
    sectorSize = this.sectorSize,
  ): IoSample {
    const fields = text.trim().split(/\s+/).map((n) => parseInt(n, 10) || 0);
    return {
      readBytes: (fields[2] ?? 0) * sectorSize,
      writtenBytes: (fields[6] ?? 0) * sectorSize,
      time,
    };
  }

  /**
   * Parse `df -B1 <path>` output
   * Filesystem 1B-blocks Used Available Use% Mounted
   */
  parseDf(stdout: string): DiskSpace {
    const lines = stdout.trim().split("\n");
    const parts = (lines[lines.length - 1] ?? "").split(/\s+/);
    const totalBytes = parseInt(parts[1] ?? "", 10) || 0;
    const usedBytes = parseInt(parts[2] ?? "", 10) || 0;

    return {
      filesystem: parts[0] ?? "",
      totalBytes,
      usedBytes,
      availableBytes: parseInt(parts[3] ?? "", 10) || 0,
      usagePercent: totalBytes > 0
        ? Math.round((usedBytes / totalBytes) * 100)
        : 0,
    };
  }

  /** Turn a cumulative sample into rates since the previous one */
  record(sample: IoSample): ReadingSet {
    const previous = this.last;
    this.last = sample;
    const elapsed = previous ? (sample.time - previous.time) / 1000 : 0;
    if (!previous || elapsed <= 0) {
      return { err_loading: true };
    }

    return {
      bps_read: Math.max(0, sample.readBytes - previous.readBytes) / elapsed,
      bps_write: Math.max(0, sample.writtenBytes - previous.writtenBytes) /
        elapsed,
    };
  }

  /**
   * Sector size of the device holding this disk or partition: the longest
   * entry of /sys/block that prefixes the disk name.
   */
  private async findSectorSize(): Promise<number> {
    let devices: string[];
    try {
      devices = await readdir("/sys/block");
    } catch {
      return 0;
    }

    const best = devices
      .filter((device) => this.disk.startsWith(device))
      .sort((a, b) => b.length - a.length)[0];
    if (!best) return 0;

    try {
      const text = await this.readText(
        `/sys/block/${best}/queue/hw_sector_size`,
      );
      return parseInt(text, 10) || 0;
    } catch {
      return 0;
    }
  }

  format(readings: ReadingSet): string {
    const context = (body: string) => `disk [${this.disk} ${body}]`;

    if (readFlag(readings, "err_no_disk")) {
      return context(colorify("absent", palette.brown));
    }
    if (readFlag(readings, "err_loading")) {
      return context(colorify("loading", palette.violet));
    }

    if (readFlag(readings, "err_no_space")) {
      return context(colorify("df unavailable", palette.red));
    }
    if (readings.space_total !== undefined) {
      const gib = (bytes: number) => (bytes / (1 << 30)).toFixed(1);
      const percent = readNumber(readings, "space_pct");
      return context(
        `${escapeMarkup(readString(readings, "space_fs"))} ${
          gib(readNumber(readings, "space_used"))
        }/${gib(readNumber(readings, "space_total"))} GiB (${
          colorify(`${percent}%`, getColor(percent))
        })`,
      );
    }

    return context(
      colorify(activityBar(readNumber(readings, "bps_read")), palette.blue) +
        colorify(activityBar(readNumber(readings, "bps_write")), palette.orange),
    );
  }

  handleClick(_click: ClickEvent): void {
    this.showSpace = !this.showSpace;
  }
}
