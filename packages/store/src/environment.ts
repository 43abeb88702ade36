/**
 * @warden/store — Environment.
 *
 * In-process stand-in for the execution environment the protocol assumes:
 * a versioned record store, a journal, and all-or-nothing units.
 */

import type { Identity } from "@warden/types";
import { AtomicUnit } from "./atomic-unit.js";
import { InMemoryJournal } from "./journal.js";
import { InMemoryRecordStore } from "./record-store.js";
import type { JournalHandlerErrorReporter, StoreRecord, UnitOutcome } from "./types.js";
import { StoreError } from "./types.js";

/** Sender used for read-only views. */
export const SYSTEM_SENDER: Identity = `0x${"0".repeat(64)}`;

export interface EnvironmentOptions {
  /** Append committed events to the journal. Default: true */
  readonly journaling?: boolean | undefined;
  /** Receives journal subscriber failures; they never fail a commit */
  readonly onSubscriberError?: JournalHandlerErrorReporter | undefined;
}

export class Environment<V extends StoreRecord> {
  readonly records: InMemoryRecordStore<V> = new InMemoryRecordStore<V>();
  readonly journal: InMemoryJournal;
  private readonly _journaling: boolean;

  constructor(options?: EnvironmentOptions) {
    this._journaling = options?.journaling !== false;
    this.journal = new InMemoryJournal({ onHandlerError: options?.onSubscriberError });
  }

  begin(sender: Identity): AtomicUnit<V> {
    return new AtomicUnit<V>(
      this.records,
      this._journaling ? this.journal : undefined,
      sender,
    );
  }

  /**
   * Run `fn` inside a fresh unit and commit it.
   * Any error aborts the unit and is rethrown unchanged.
   */
  execute<T>(sender: Identity, fn: (unit: AtomicUnit<V>) => T): UnitOutcome<T> {
    const unit = this.begin(sender);
    try {
      const result = fn(unit);
      if (result instanceof Promise) {
        throw new StoreError(
          "ASYNC_UNIT",
          "Atomic units are synchronous; the unit function returned a promise",
          unit.id,
        );
      }
      return { result, commit: unit.commit() };
    } catch (err: unknown) {
      unit.abort();
      throw err;
    }
  }

  /**
   * Run `fn` against a unit that is always aborted afterwards.
   */
  view<T>(fn: (unit: AtomicUnit<V>) => T): T {
    const unit = this.begin(SYSTEM_SENDER);
    try {
      return fn(unit);
    } finally {
      unit.abort();
    }
  }
}
