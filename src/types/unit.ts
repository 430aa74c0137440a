/**
 * Unit types for the status line.
 * A unit is one independently polled producer of a status bar element.
 */

/**
 * A single reading value produced by a unit's read half
 */
export type ReadingValue = number | string | boolean;

/**
 * Readings produced by `Unit.read`.
 * Keys prefixed with `err_` are boolean flags; when one is set the other
 * keys are not guaranteed to exist.
 */
export type ReadingSet = Record<string, ReadingValue>;

/**
 * Formatting attributes of a bar element (border, separator, markup...)
 */
export type ChunkValue = string | number | boolean;
export type ChunkAttributes = Record<string, ChunkValue>;

/**
 * Scheduling state of a unit task
 */
export type UnitState =
  | "idle"
  | "reading"
  | "formatting"
  | "publishing"
  | "failed";

/**
 * A click event sent by the bar host, minus the `name` used for routing
 */
export interface ClickEvent {
  /** Instance of the clicked element, if the unit set one */
  instance?: string;
  /** Mouse button: 1 left, 2 middle, 3 right, 4/5 scroll */
  button?: number;
  /** Modifier keys held during the click */
  modifiers?: string[];
  /** Absolute pointer position */
  x?: number;
  y?: number;
  /** Pointer position relative to the element */
  relative_x?: number;
  relative_y?: number;
  /** Size of the clicked element */
  width?: number;
  height?: number;
  /** Any other host-defined fields */
  [key: string]: unknown;
}

/**
 * Transient and permanent chunk attribute overrides of a unit.
 */
export interface OverrideStore {
  /** Attributes for the next chunk only */
  readonly transient: ChunkAttributes;
  /** Attributes for every chunk until replaced */
  readonly permanent: ChunkAttributes;
  setTransient(attributes: ChunkAttributes): void;
  setPermanent(attributes: ChunkAttributes): void;
  clearTransient(): void;
  clearPermanent(): void;
}

/**
 * Interface that status line units must implement
 */
export interface Unit {
  /** Type-derived name used when no explicit name is given */
  readonly kind: string;
  /** Explicit name from configuration, taken verbatim */
  readonly requestedName?: string;
  /** Resolved name, unique among registered units */
  name: string;
  /** Target time between read/format cycles in milliseconds */
  readonly pollInterval: number;
  /** Executables that must be on PATH for this unit to work */
  readonly requires: readonly string[];
  /** Chunk attribute overrides */
  readonly overrides: OverrideStore;
  /** Self-reported persistent failure message, null when healthy */
  readonly failure: string | null;
  /** Take a reading */
  read(): Promise<ReadingSet>;
  /** Turn readings into display text; null or "" hides the element */
  format(readings: ReadingSet): string | null;
  /** React to a click on this unit's element */
  handleClick(click: ClickEvent): void;
  /** Release held resources */
  dispose?(): void | Promise<void>;
}

/**
 * Options every unit accepts at construction
 */
export interface UnitOptions {
  /** Explicit name; defaults to the unit kind */
  name?: string;
  /** Poll interval in milliseconds */
  pollInterval?: number;
  /** Executables required in addition to the unit's own */
  requires?: string[];
}
