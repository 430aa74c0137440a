import type { ReadingSet, UnitOptions } from "../../types/unit.ts";
import { DEFAULT_COMMAND_TIMEOUT } from "../../utils/command.ts";
import { colorify, palette } from "../../utils/markup.ts";
import { BaseUnit, readFlag, readString } from "./base.ts";

export const DEFAULT_IP_URL = "http://ipecho.net/plain";

export interface IpUnitOptions extends UnitOptions {
  /** Service answering with the caller's address as plain text */
  url?: string;
}

/**
 * Public IP address unit, as reported by an echo service.
 *
 * Readings:
 * - `ip`: the publicly visible address
 * - `err_failed_read`: the lookup failed or returned something else
 */
export class IpUnit extends BaseUnit {
  readonly kind = "ip";

  readonly url: string;

  constructor(options: IpUnitOptions = {}) {
    super(options, { pollInterval: 60_000 });
    this.url = options.url ?? DEFAULT_IP_URL;
  }

  async read(): Promise<ReadingSet> {
    let body: string;
    try {
      const response = await fetch(this.url, {
        headers: { "Accept": "text/plain" },
        signal: AbortSignal.timeout(DEFAULT_COMMAND_TIMEOUT),
      });
      if (!response.ok) {
        return { err_failed_read: true };
      }
      body = await response.text();
    } catch {
      return { err_failed_read: true };
    }
    return this.parseResponse(body);
  }

  /** Accept a bare IPv4 or IPv6 address only */
  parseResponse(body: string): ReadingSet {
    const ip = body.trim();
    if (!/^[0-9a-fA-F.:]+$/.test(ip) || !/[.:]/.test(ip)) {
      return { err_failed_read: true };
    }
    return { ip };
  }

  format(readings: ReadingSet): string {
    if (readFlag(readings, "err_failed_read")) {
      return colorify("failed to read ip", palette.red);
    }
    return readString(readings, "ip");
  }
}
