import type {
  ChunkAttributes,
  OverrideStore,
} from "../../types/unit.ts";

/**
 * Per-unit chunk attribute overrides.
 * Transient attributes are consumed by the next serialized chunk.
 */
export class ChunkOverrides implements OverrideStore {
  readonly transient: ChunkAttributes = {};
  readonly permanent: ChunkAttributes = {};

  setTransient(attributes: ChunkAttributes): void {
    Object.assign(this.transient, attributes);
  }

  setPermanent(attributes: ChunkAttributes): void {
    Object.assign(this.permanent, attributes);
  }

  clearTransient(): void {
    clear(this.transient);
  }

  clearPermanent(): void {
    clear(this.permanent);
  }
}

function clear(attributes: ChunkAttributes): void {
  for (const key of Object.keys(attributes)) {
    delete attributes[key];
  }
}
