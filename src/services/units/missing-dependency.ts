import type {
  ClickEvent,
  OverrideStore,
  ReadingSet,
  Unit,
} from "../../types/unit.ts";
import { commandExists } from "../../utils/command.ts";
import { colorify, palette } from "../../utils/markup.ts";

/**
 * Stand-in for a unit whose required executable is missing.
 * It keeps the wrapped unit's identity and cadence but never calls its
 * read or format; its chunk is always `<name> [<dependency> not found]`.
 */
export class MissingDependencyUnit implements Unit {
  readonly failure = null;

  constructor(
    private readonly inner: Unit,
    readonly dependency: string,
  ) {}

  get kind(): string {
    return this.inner.kind;
  }

  get requestedName(): string | undefined {
    return this.inner.requestedName;
  }

  get name(): string {
    return this.inner.name;
  }

  set name(value: string) {
    this.inner.name = value;
  }

  get pollInterval(): number {
    return this.inner.pollInterval;
  }

  get requires(): readonly string[] {
    return this.inner.requires;
  }

  get overrides(): OverrideStore {
    return this.inner.overrides;
  }

  async read(): Promise<ReadingSet> {
    return await Promise.resolve({});
  }

  format(_readings: ReadingSet): string {
    return `${this.name} [${
      colorify(`${this.dependency} not found`, palette.red)
    }]`;
  }

  handleClick(_click: ClickEvent): void {
    this.overrides.setTransient({ border: palette.red });
  }
}

/** Lookup used to decide whether an executable is available */
export type ExecutableLookup = (command: string) => Promise<boolean>;

/**
 * Check the unit's required executables once; returns the unit itself, or
 * a MissingDependencyUnit for the first executable that is missing.
 */
export async function guardDependencies(
  unit: Unit,
  exists: ExecutableLookup = commandExists,
): Promise<Unit> {
  for (const dependency of unit.requires) {
    if (!(await exists(dependency))) {
      return new MissingDependencyUnit(unit, dependency);
    }
  }
  return unit;
}
