/**
 * Chunk serializer: turns a unit's display text into one bar element.
 */

import type { ChunkAttributes, Unit } from "../../types/unit.ts";
import { colorify, palette } from "../../utils/markup.ts";

/** Attributes every chunk starts from */
export const CHUNK_DEFAULTS: Readonly<ChunkAttributes> = {
  markup: "pango",
  border: palette.darkGrey,
  // padding stands in for the host's separators
  separator: false,
  separator_block_width: 0,
};

export interface SerializeOptions {
  /** Spaces added on each side of `full_text` */
  padding: number;
  /** Call-site overrides applied on top of the defaults */
  globals?: ChunkAttributes;
}

/**
 * Serialize `text` as the unit's element.
 *
 * Precedence, highest first: transient overrides, permanent overrides,
 * globals, defaults. Transient overrides are cleared on every call, so a
 * click highlight lasts exactly one cycle.
 *
 * @returns the element's JSON, or "" when `text` is null or empty
 */
export function serializeChunk(
  unit: Pick<Unit, "name" | "overrides">,
  text: string | null,
  options: SerializeOptions,
): string {
  const { transient, permanent } = unit.overrides;

  if (text === null || text === "") {
    unit.overrides.clearTransient();
    return "";
  }

  const chunk: ChunkAttributes = {
    full_text: text,
    ...CHUNK_DEFAULTS,
    name: unit.name,
    ...options.globals,
    ...permanent,
    ...transient,
  };
  unit.overrides.clearTransient();

  const pad = " ".repeat(Math.max(0, options.padding));
  chunk.full_text = `${pad}${String(chunk.full_text)}${pad}`;

  return JSON.stringify(chunk);
}

/** Placeholder shown until a unit's first cycle completes */
export function loadingText(name: string): string {
  return colorify(`unit "${name}" loading`, palette.violet);
}

/** Shown for the cycle in which a unit threw or timed out */
export function failedText(name: string): string {
  return colorify(`unit "${name}" failed`, palette.brown);
}

/** Shown while a unit reports its own failure */
export function selfReportedText(message: string): string {
  return colorify(message, palette.brown);
}

/**
 * The only element emitted in global failure mode
 */
export function globalFailureChunk(duplicate: string): string {
  return JSON.stringify({
    full_text: colorify(
      `GLOBAL FAILURE: duplicate unit name ${duplicate}`,
      "#FF0000",
    ),
    markup: "pango",
  });
}
