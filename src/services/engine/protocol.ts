/**
 * i3bar protocol framing on stdout.
 *
 * The header declares click support and opens a JSON array that is never
 * closed; every status line is one element of it followed by a comma.
 */

export interface ProtocolHeader {
  version: 1;
  click_events: boolean;
}

export const HEADER: ProtocolHeader = { version: 1, click_events: true };

/** Header line plus the opening bracket of the infinite array */
export function encodeHeader(header: ProtocolHeader = HEADER): string {
  return `${JSON.stringify(header)}\n[\n`;
}

/**
 * Encode one status line from already serialized chunks.
 * Empty chunks (suppressed units) are left out.
 */
export function encodeLine(chunks: readonly string[]): string {
  return `[${chunks.filter((chunk) => chunk !== "").join(",")}],\n`;
}
