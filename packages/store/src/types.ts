/**
 * @warden/store — Core types.
 *
 * Defines the record store, journal and atomic-unit contracts that the
 * protocol runs against.
 *
 * Design principles:
 * - Every record carries a monotonically increasing version
 * - A unit's reads and writes are checked against those versions at commit
 * - A commit applies every write or none
 * - Events reach the journal only through a committed unit
 */

import type { DomainEvent, Identity } from "@warden/types";

// =============================================================================
// Records
// =============================================================================

/**
 * Base shape of every stored record. `kind` discriminates record unions.
 */
export interface StoreRecord {
  readonly kind: string;
}

/**
 * A record as held by the store.
 */
export interface VersionedRecord<V extends StoreRecord> {
  readonly id: Identity;
  /** 1-based; 0 is reserved for "absent" */
  readonly version: number;
  readonly value: V;
}

/**
 * A staged write produced by a unit.
 */
export interface RecordChange<V extends StoreRecord> {
  readonly id: Identity;
  readonly value: V;
}

/**
 * Versioned record storage.
 *
 * Invariants:
 * - get() hands out private copies; mutating them never touches the store
 * - apply() is all-or-nothing
 */
export interface RecordStore<V extends StoreRecord> {
  get(id: Identity): VersionedRecord<V> | undefined;

  /** Current version of a record, 0 when absent. */
  version(id: Identity): number;

  /**
   * Apply staged changes.
   *
   * @param expected - Version each touched record had when the unit read it
   * @param changes - Records to write
   * @throws StoreError CONCURRENCY_CONFLICT if any version moved
   */
  apply(
    expected: ReadonlyMap<Identity, number>,
    changes: readonly RecordChange<V>[],
  ): void;

  readonly size: number;
}

// =============================================================================
// Obligations
// =============================================================================

/**
 * Something created inside a unit that must be settled before the unit
 * may commit (e.g., a pending transfer request or a balance in transit).
 */
export interface Obligation {
  readonly settled: boolean;
  describe(): string;
}

// =============================================================================
// Journal
// =============================================================================

/**
 * An event as persisted in the journal.
 */
export interface JournalEntry {
  readonly event: DomainEvent;

  /** Unit that emitted the event */
  readonly unitId: string;

  /** Position across the whole journal (1-based, gapless) */
  readonly position: number;

  /** When this entry was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  readonly previousHash: string;
  readonly hash: string;
}

export interface ReadJournalOptions {
  /** Start reading from this position (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;

  /** Maximum number of entries to read. Default: unlimited */
  readonly maxCount?: number | undefined;
}

export type JournalHandler = (entry: JournalEntry) => void;

export type JournalHandlerErrorReporter = (err: unknown, entry: JournalEntry) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface JournalIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Units
// =============================================================================

export type UnitStatus = "open" | "committed" | "aborted";

/**
 * Summary of a committed unit.
 */
export interface CommitResult {
  readonly unitId: string;
  readonly sender: Identity;
  readonly written: number;
  readonly entries: readonly JournalEntry[];
}

/**
 * Result of running a function inside a unit that committed.
 */
export interface UnitOutcome<T> {
  readonly result: T;
  readonly commit: CommitResult;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "UNIT_CLOSED"
  | "UNRESOLVED_OBLIGATION"
  | "UNKNOWN_RECORD"
  | "ASYNC_UNIT";

/**
 * Structured error from the store.
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public readonly unitId: string | undefined;

  constructor(code: StoreErrorCode, message: string, unitId?: string) {
    super(message);
    this.name = "StoreError";
    this.code = code;
    this.unitId = unitId;
  }
}
