/**
 * @warden/store — In-memory journal.
 *
 * Append-only, hash-chained log of the events emitted by committed units.
 * Only AtomicUnit.commit() appends; there is no update or delete.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Synchronous subscription dispatch, in position order
 * - A failing subscriber is reported, never propagated to the appender
 * - No durability guarantees
 */

import type { DomainEvent } from "@warden/types";
import { computeEntryHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  JournalEntry,
  JournalHandler,
  JournalHandlerErrorReporter,
  JournalIntegrityResult,
  ReadJournalOptions,
  Subscription,
} from "./types.js";

export interface JournalOptions {
  /** Receives subscriber failures. Default: console.error */
  readonly onHandlerError?: JournalHandlerErrorReporter | undefined;
}

export class InMemoryJournal {
  private readonly _entries: JournalEntry[] = [];
  private readonly _subscribers = new Set<JournalHandler>();
  private readonly _onHandlerError: JournalHandlerErrorReporter;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: JournalOptions) {
    this._onHandlerError = options?.onHandlerError ?? reportToConsole;
  }

  /**
   * Append the events of one committed unit.
   */
  append(unitId: string, events: readonly DomainEvent[]): readonly JournalEntry[] {
    const appendedAt = new Date().toISOString();
    const appended: JournalEntry[] = [];

    for (const event of events) {
      const base = {
        event,
        unitId,
        position: this._entries.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const entry: JournalEntry = {
        ...base,
        previousHash,
        hash: computeEntryHash(base, previousHash),
      };

      this._lastHash = entry.hash;
      this._entries.push(entry);
      appended.push(entry);
    }

    this._dispatch(appended);
    return appended;
  }

  readAll(options?: ReadJournalOptions): readonly JournalEntry[] {
    const fromPosition = options?.fromPosition ?? 1;
    const result = this._entries.filter((e) => e.position >= fromPosition);
    const maxCount = options?.maxCount;
    return maxCount !== undefined && maxCount >= 0
      ? result.slice(0, maxCount)
      : result;
  }

  readUnit(unitId: string): readonly JournalEntry[] {
    return this._entries.filter((e) => e.unitId === unitId);
  }

  subscribe(handler: JournalHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  verify(): JournalIntegrityResult {
    return verifyHashChain(this._entries);
  }

  private _dispatch(entries: readonly JournalEntry[]): void {
    for (const entry of entries) {
      for (const handler of this._subscribers) {
        try {
          handler(entry);
        } catch (err: unknown) {
          this._onHandlerError(err, entry);
        }
      }
    }
  }

  get length(): number {
    return this._entries.length;
  }

  get lastHash(): string {
    return this._lastHash;
  }
}

function reportToConsole(err: unknown, entry: JournalEntry): void {
  console.error(`Journal subscriber failed at position ${entry.position}:`, err);
}
