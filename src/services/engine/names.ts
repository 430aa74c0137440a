import type { Unit } from "../../types/unit.ts";

/**
 * Assigns unit names.
 * Explicit names are kept verbatim. Auto-named units take their kind, with
 * `_1`, `_2`, ... appended for the second and later units of the same kind.
 */
export class NameRegistry {
  private counts = new Map<string, number>();

  resolve(explicit: string | undefined, kind: string): string {
    if (explicit !== undefined) {
      return explicit;
    }

    const index = this.counts.get(kind) ?? 0;
    this.counts.set(kind, index + 1);
    return index === 0 ? kind : `${kind}_${index}`;
  }

  reset(): void {
    this.counts.clear();
  }
}

/**
 * Resolve the name of every unit, in declaration order.
 */
export function assignNames(
  units: readonly Unit[],
  registry: NameRegistry = new NameRegistry(),
): void {
  for (const unit of units) {
    unit.name = registry.resolve(unit.requestedName, unit.kind);
  }
}

/**
 * First name held by more than one unit, or null when all are unique
 */
export function findDuplicateName(units: readonly Unit[]): string | null {
  const seen = new Set<string>();
  for (const unit of units) {
    if (seen.has(unit.name)) {
      return unit.name;
    }
    seen.add(unit.name);
  }
  return null;
}
