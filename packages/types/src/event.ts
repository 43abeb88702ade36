/**
 * Event Types
 *
 * Every committed change in Warden is described by one or more
 * DomainEvents, appended to the journal when its atomic unit commits.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events of an aborted unit are never journaled
 * - Amounts in payloads are decimal strings
 */

/**
 * Which part of the protocol emitted an event.
 */
export type EventSource =
  | "namespace"
  | "vault"
  | "rule"
  | "transfer"
  | "authority";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Sender of the atomic unit that emitted the event */
  readonly actor: string;

  /** ID of the atomic unit (groups every event of one unit) */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`
 * (e.g., "transfer.requested", "supply.minted").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
