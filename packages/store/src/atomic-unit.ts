/**
 * @warden/store — AtomicUnit.
 *
 * One all-or-nothing unit of work. Records are read into a private working
 * set; protocol code mutates those working copies in place and marks them
 * dirty. Nothing is visible outside the unit until commit() succeeds.
 *
 * Commit rules (fail-closed — all must pass):
 * 1. The unit is still open
 * 2. Every tracked obligation is settled
 * 3. Every record read or written is still at the version the unit saw
 *
 * A failed commit aborts the unit. Once records are applied the unit is
 * committed; journal subscribers cannot undo that.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource, Identity } from "@warden/types";
import { hashIdentity } from "./hashing.js";
import type { InMemoryJournal } from "./journal.js";
import type {
  CommitResult,
  Obligation,
  RecordChange,
  RecordStore,
  StoreRecord,
  UnitStatus,
} from "./types.js";
import { StoreError } from "./types.js";

export class AtomicUnit<V extends StoreRecord> {
  readonly id: string;
  readonly sender: Identity;

  private readonly _records: RecordStore<V>;
  private readonly _journal: InMemoryJournal | undefined;
  private _status: UnitStatus = "open";

  /** Version of every record this unit has looked at (0 = absent) */
  private readonly _seen = new Map<Identity, number>();
  private readonly _working = new Map<Identity, V>();
  private readonly _dirty = new Set<Identity>();
  private readonly _events: DomainEvent[] = [];
  private readonly _obligations = new Set<Obligation>();
  private _sequence = 0;

  constructor(
    records: RecordStore<V>,
    journal: InMemoryJournal | undefined,
    sender: Identity,
  ) {
    this.id = randomUUID();
    this.sender = sender;
    this._records = records;
    this._journal = journal;
  }

  get status(): UnitStatus {
    return this._status;
  }

  // ─── Records ────────────────────────────────────────────────────────

  /**
   * Read a record into the working set. Repeated reads return the same
   * working copy, so mutations made through one reference are seen by all.
   */
  read(id: Identity): V | undefined {
    this.assertOpen();

    const working = this._working.get(id);
    if (working !== undefined || this._seen.has(id)) {
      return working;
    }

    const stored = this._records.get(id);
    this._seen.set(id, stored?.version ?? 0);
    if (stored !== undefined) {
      this._working.set(id, stored.value);
    }
    return stored?.value;
  }

  has(id: Identity): boolean {
    return this.read(id) !== undefined;
  }

  /**
   * Stage a new or replacement record.
   */
  put(id: Identity, value: V): void {
    this.assertOpen();
    if (!this._seen.has(id)) {
      this._seen.set(id, this._records.version(id));
    }
    this._working.set(id, value);
    this._dirty.add(id);
  }

  /**
   * Mark a working copy as modified in place.
   */
  touch(id: Identity): void {
    this.assertOpen();
    if (!this._working.has(id)) {
      throw new StoreError(
        "UNKNOWN_RECORD",
        `Record ${id} was not read in this unit`,
        this.id,
      );
    }
    this._dirty.add(id);
  }

  /**
   * Allocate a new identity, unique to this unit and position.
   */
  freshId(): Identity {
    this.assertOpen();
    this._sequence += 1;
    return hashIdentity({
      domain: "warden/object",
      unit: this.id,
      sequence: this._sequence,
    });
  }

  // ─── Events ─────────────────────────────────────────────────────────

  emit(
    type: string,
    source: EventSource,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    this.assertOpen();
    this._events.push({
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor: this.sender,
        correlationId: this.id,
        source,
      },
      payload,
    });
  }

  get pendingEvents(): readonly DomainEvent[] {
    return [...this._events];
  }

  // ─── Obligations ────────────────────────────────────────────────────

  track(obligation: Obligation): void {
    this.assertOpen();
    this._obligations.add(obligation);
  }

  unsettled(): readonly Obligation[] {
    return [...this._obligations].filter((o) => !o.settled);
  }

  // ─── Completion ─────────────────────────────────────────────────────

  commit(): CommitResult {
    this.assertOpen();

    const unsettled = this.unsettled();
    if (unsettled.length > 0) {
      this.abort();
      throw new StoreError(
        "UNRESOLVED_OBLIGATION",
        `Unit cannot commit with ${unsettled.length} unsettled obligation(s): ${unsettled.map((o) => o.describe()).join("; ")}`,
        this.id,
      );
    }

    const changes: RecordChange<V>[] = [];
    for (const id of this._dirty) {
      const value = this._working.get(id);
      if (value !== undefined) {
        changes.push({ id, value });
      }
    }

    try {
      this._records.apply(this._seen, changes);
    } catch (err: unknown) {
      this.abort();
      throw err;
    }

    this._status = "committed";
    const entries = this._journal !== undefined && this._events.length > 0
      ? this._journal.append(this.id, this._events)
      : [];
    this._release();

    return {
      unitId: this.id,
      sender: this.sender,
      written: changes.length,
      entries,
    };
  }

  abort(): void {
    if (this._status !== "open") {
      return;
    }
    this._status = "aborted";
    this._release();
  }

  assertOpen(): void {
    if (this._status !== "open") {
      throw new StoreError(
        "UNIT_CLOSED",
        `Unit ${this.id} is ${this._status}`,
        this.id,
      );
    }
  }

  private _release(): void {
    this._seen.clear();
    this._working.clear();
    this._dirty.clear();
    this._events.length = 0;
    this._obligations.clear();
  }
}
