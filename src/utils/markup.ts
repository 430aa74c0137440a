/**
 * Pango markup helpers and the base16 "tomorrow" palette
 */

export const palette = {
  nearBlack: "#1D1F21",
  darkerGrey: "#282A2E",
  darkGrey: "#373B41",
  grey: "#969896",
  lightGrey: "#B4B7B4",
  lighterGrey: "#C5C8C6",
  nearWhite: "#E0E0E0",
  white: "#FFFFFF",
  red: "#CC6666",
  orange: "#DE935F",
  yellow: "#F0C674",
  green: "#B5BD68",
  cyan: "#8ABEB7",
  blue: "#81A2BE",
  violet: "#B294BB",
  brown: "#A3685A",
} as const;

/** Colors used for low-to-high scales */
const SCALE = [
  palette.blue,
  palette.green,
  palette.yellow,
  palette.orange,
  palette.red,
] as const;

const DEFAULT_BREAKPOINTS = [20, 40, 60, 80];

/**
 * Wrap text in a pango span with the given attributes.
 * Attributes with an undefined value are left out.
 */
export function pangofy(
  text: string,
  attributes: Record<string, string | undefined>,
): string {
  const attrs = Object.entries(attributes)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `${key}='${value}'`);

  const open = attrs.length > 0 ? `<span ${attrs.join(" ")}>` : "<span>";
  return `${open}${text}</span>`;
}

export function colorify(text: string, color: string): string {
  return pangofy(text, { color });
}

/**
 * Escape text so pango does not read it as markup
 */
export function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/'/g, "&apos;")
    .replace(/"/g, "&quot;");
}

/**
 * Pick a color for `value` by its position among increasing breakpoints.
 * A value equal to a breakpoint takes the color above it.
 * @param reverse - use the scale high-to-low (for "more is better" values)
 */
export function getColor(
  value: number,
  breakpoints: readonly number[] = DEFAULT_BREAKPOINTS,
  colors: readonly string[] = SCALE,
  reverse = false,
): string {
  const scale = reverse ? [...colors].reverse() : colors;
  const index = breakpoints.filter((bp) => bp <= value).length;
  return scale[Math.min(index, scale.length - 1)] ?? palette.grey;
}

/**
 * Fixed-point number right-aligned in `width` characters
 */
export function formatFixed(
  value: number,
  width: number,
  precision: number,
): string {
  return value.toFixed(precision).padStart(width);
}

export function colorizeNumber(
  value: number,
  width: number,
  precision: number,
  breakpoints: readonly number[],
): string {
  return colorify(
    formatFixed(value, width, precision),
    getColor(value, breakpoints),
  );
}

/**
 * Temperature in degrees C, white on red once it reaches 100
 */
export function temperatureString(temp: number): string {
  const text = formatFixed(temp, 3, 0);
  if (temp < 100) {
    return colorify(text, getColor(temp, [30, 50, 70, 90]));
  }
  return pangofy(text, { color: "#FFFFFF", background: "#FF0000" });
}

/**
 * Format a duration in seconds as `HH:MM`, prefixed with days when needed
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86400);
  const hours = Math.floor((total % 86400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const hhmm = `${String(hours).padStart(2, "0")}:${
    String(minutes).padStart(2, "0")
  }`;
  return days > 0 ? `${days}d ${hhmm}` : hhmm;
}
