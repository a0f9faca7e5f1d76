/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change in Covenant is captured as an event in a single log.
 *
 * Rules:
 * - Events are immutable after commit
 * - Every event carries metadata (who, which command, what caused it)
 * - Events are replayable: same log → same state
 * - No UPDATE, no DELETE. Corrections are compensating events
 */

/**
 * Metadata supplied by the caller with every candidate event.
 */
export interface EventMetadata {
  /** Who or what proposed this event */
  readonly actor: string;

  /** Idempotency key of the command that produced this event */
  readonly commandId: string;

  /** ID of the committed event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across commands */
  readonly correlationId?: string;
}

/**
 * A domain event body. Discriminated by `type`; domains narrow this
 * to a tagged union of their known event kinds.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "law.activated") */
  readonly type: string;

  /** Event-specific payload */
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * A proposed, not-yet-committed event.
 * Owned by the caller until it is committed or rejected.
 */
export type CandidateEvent<TEvent extends DomainEvent = DomainEvent> = TEvent & {
  readonly metadata: EventMetadata;
};

/**
 * An event as it exists in the log once committed.
 *
 * `position` is the sole ordering key: 0-based, unique and gapless.
 * `hash` chains each event to its predecessor for tamper evidence.
 */
export type CommittedEvent<TEvent extends DomainEvent = DomainEvent> = TEvent & {
  /** Position in the log (0-based, gapless) */
  readonly position: number;

  /** Unique event ID (time-ordered) */
  readonly id: string;

  /** ISO 8601 commit timestamp, non-decreasing along the log */
  readonly timestamp: string;

  readonly metadata: EventMetadata;

  /** SHA-256 over the canonical event content + previousHash */
  readonly hash: string;

  /** Hash of the event at position - 1, or "genesis" */
  readonly previousHash: string;
};
