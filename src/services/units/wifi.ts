import type { ClickEvent, ReadingSet, UnitOptions } from "../../types/unit.ts";
import { CommandError } from "../../utils/command.ts";
import {
  colorify,
  escapeMarkup,
  formatFixed,
  getColor,
  palette,
} from "../../utils/markup.ts";
import { BaseUnit, readFlag, readNumber, readString } from "./base.ts";

export interface WifiUnitOptions extends UnitOptions {
  /** Wireless interface name, e.g. wlan0 */
  interface: string;
}

/** Signal strengths mapped to 0 and 1 quality */
const FLOOR_DBM = -80;
const CEILING_DBM = -30;

/** SSID from `iw dev <if> link`, null when not connected */
export function parseLink(text: string): string | null {
  const match = /^\s*SSID: ([^\n]+)$/m.exec(text);
  return match?.[1]?.trim() || null;
}

/** Signal in dBm from `iw dev <if> station dump`, null without a station */
export function parseStation(text: string): number | null {
  const match = /^\s*signal:\s*(-?\d+)/m.exec(text);
  return match?.[1] ? parseInt(match[1], 10) : null;
}

/** Fraction of the way from -80 dBm to -30 dBm, clamped to [0, 1] */
export function signalQuality(dbm: number): number {
  const quality = (dbm - FLOOR_DBM) / (CEILING_DBM - FLOOR_DBM);
  return Math.min(1, Math.max(0, quality));
}

/**
 * Wireless unit using `iw`. Shows the connected network and link quality;
 * clicking hides or shows the SSID.
 *
 * Readings:
 * - `ssid`: name of the connected network
 * - `quality`: link quality from 0 to 1
 * - `err_down`: the interface does not exist
 * - `err_disconnected`: no network connection
 */
export class WifiUnit extends BaseUnit {
  readonly kind = "wifi";

  readonly interface: string;
  private showSsid = true;

  constructor(options: WifiUnitOptions) {
    super(options, { pollInterval: 1000, requires: ["iw"] });
    this.interface = options.interface;
  }

  async read(): Promise<ReadingSet> {
    let link: string;
    try {
      link = await this.run("iw", ["dev", this.interface, "link"]);
    } catch (error) {
      if (error instanceof CommandError && error.message.includes("No such device")) {
        return { err_down: true };
      }
      throw error;
    }

    const station = await this.run("iw", [
      "dev",
      this.interface,
      "station",
      "dump",
    ]);
    return this.parseOutput(link, station);
  }

  parseOutput(link: string, station: string): ReadingSet {
    const ssid = parseLink(link);
    const signal = parseStation(station);
    if (ssid === null || signal === null) {
      return { err_disconnected: true };
    }
    return { ssid, quality: signalQuality(signal) };
  }

  format(readings: ReadingSet): string {
    const context = (body: string) => `wlan ${this.interface} [${body}]`;

    if (readFlag(readings, "err_down")) {
      return context(colorify("down", palette.red));
    }
    if (readFlag(readings, "err_disconnected")) {
      return context(colorify("---", palette.violet));
    }

    const quality = 100 * readNumber(readings, "quality");
    const ssid = escapeMarkup(this.showSsid ? readString(readings, "ssid") : "<>");
    return `wlan ${this.interface} [${ssid}] [${
      colorify(formatFixed(quality, 3, 0), getColor(quality, undefined, undefined, true))
    }%]`;
  }

  handleClick(_click: ClickEvent): void {
    this.showSsid = !this.showSsid;
  }
}
