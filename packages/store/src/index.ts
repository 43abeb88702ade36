/**
 * @warden/store — In-process atomic-unit environment.
 *
 * Provides the execution guarantees the Warden protocol assumes:
 * - Versioned records with optimistic conflict detection
 * - All-or-nothing units: commit applies every write, abort applies none
 * - Obligations that block commit until settled
 * - A SHA-256 hash-chained journal of committed events
 */

export { Environment, SYSTEM_SENDER } from "./environment.js";
export type { EnvironmentOptions } from "./environment.js";
export { AtomicUnit } from "./atomic-unit.js";
export { InMemoryRecordStore } from "./record-store.js";
export { InMemoryJournal } from "./journal.js";
export type { JournalOptions } from "./journal.js";
export { computeEntryHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { UnhashedEntry } from "./hash-chain.js";
export { hashIdentity, sha256Hex } from "./hashing.js";

export type {
  StoreRecord,
  VersionedRecord,
  RecordChange,
  RecordStore,
  Obligation,
  JournalEntry,
  ReadJournalOptions,
  JournalHandler,
  JournalHandlerErrorReporter,
  Subscription,
  IntegrityError,
  JournalIntegrityResult,
  UnitStatus,
  CommitResult,
  UnitOutcome,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";
