/**
 * @warden/store — In-memory RecordStore implementation.
 *
 * Suitable for tests, the demo and single-process nodes. All state is
 * lost on process exit.
 */

import type { Identity } from "@warden/types";
import type {
  RecordChange,
  RecordStore,
  StoreRecord,
  VersionedRecord,
} from "./types.js";
import { StoreError } from "./types.js";

interface Slot<V> {
  version: number;
  value: V;
}

export class InMemoryRecordStore<V extends StoreRecord> implements RecordStore<V> {
  private readonly _slots = new Map<Identity, Slot<V>>();

  get(id: Identity): VersionedRecord<V> | undefined {
    const slot = this._slots.get(id);
    if (slot === undefined) {
      return undefined;
    }
    return { id, version: slot.version, value: structuredClone(slot.value) };
  }

  version(id: Identity): number {
    return this._slots.get(id)?.version ?? 0;
  }

  apply(
    expected: ReadonlyMap<Identity, number>,
    changes: readonly RecordChange<V>[],
  ): void {
    // Validate everything before the first write
    for (const [id, version] of expected) {
      const current = this.version(id);
      if (current !== version) {
        throw new StoreError(
          "CONCURRENCY_CONFLICT",
          `Record ${id} is at version ${current}, expected ${version}`,
        );
      }
    }
    for (const change of changes) {
      if (!expected.has(change.id)) {
        throw new StoreError(
          "UNKNOWN_RECORD",
          `Write to ${change.id} has no expected version`,
        );
      }
    }

    for (const change of changes) {
      this._slots.set(change.id, {
        version: this.version(change.id) + 1,
        value: structuredClone(change.value),
      });
    }
  }

  get size(): number {
    return this._slots.size;
  }
}
