/**
 * @covenant/event-store: Core types.
 *
 * Defines the storage port, commit outcomes and errors for the
 * append-only governance log.
 *
 * Design principles:
 * - Events are immutable after commit
 * - The log is append-only (no UPDATE, no DELETE)
 * - Every event has a 0-based, gapless position
 * - Exactly one writer at a time commits (validate-then-append is atomic)
 * - Readers see a consistent prefix and never wait on writers
 */

import type { CommittedEvent, DomainEvent } from "@covenant/types";
import type { Violation } from "./invariants.js";

// =============================================================================
// Event Log (storage port)
// =============================================================================

/**
 * Durable, ordered storage for committed events.
 *
 * Implementations only persist what the store hands them; ordering,
 * validation and hashing happen before `write` is called.
 *
 * Invariants:
 * - `write(record)` is only called with `record.position === length`
 * - A record becomes visible to `at`/`slice` only after `write` returns
 * - A failed `write` leaves no trace
 */
export interface EventLog<TEvent extends DomainEvent = DomainEvent> {
  /** Number of committed events (= next position to assign) */
  readonly length: number;

  /** The event at `position`, or undefined past the end */
  at(position: number): CommittedEvent<TEvent> | undefined;

  /** Events in `[from, to)`, in position order */
  slice(from: number, to: number): readonly CommittedEvent<TEvent>[];

  /**
   * Durably persist one record.
   *
   * @throws EventStoreError("CONTENTION") when exclusive access is
   *   temporarily unavailable (safe to retry)
   * @throws EventStoreError("STORAGE_FAILURE") on any other I/O failure
   */
  write(record: CommittedEvent<TEvent>): void;

  /** Release resources. Further writes throw STORE_CLOSED. */
  close(): void;
}

// =============================================================================
// Append Outcomes
// =============================================================================

export interface CommittedOutcome<TEvent extends DomainEvent> {
  readonly status: "committed";
  readonly event: CommittedEvent<TEvent>;
}

export interface RejectedOutcome {
  readonly status: "rejected";
  readonly violation: Violation;
}

export interface RetryExhaustedOutcome {
  readonly status: "retry_exhausted";
  readonly attempts: number;
  readonly error: unknown;
}

export interface FatalOutcome {
  readonly status: "fatal";
  readonly error: unknown;
}

/**
 * Result of `proposeEvent`. Callers always receive exactly one of these.
 *
 * - committed: durably recorded, visible to later reads
 * - rejected: violated an invariant; never retried, nothing recorded
 * - retry_exhausted: contention outlasted the retry budget; may be retried later
 * - fatal: non-transient storage failure; nothing recorded
 */
export type AppendOutcome<TEvent extends DomainEvent> =
  | CommittedOutcome<TEvent>
  | RejectedOutcome
  | RetryExhaustedOutcome
  | FatalOutcome;

export type AppendStatus = AppendOutcome<DomainEvent>["status"];

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback invoked after an event is committed.
 */
export type CommitHandler<TEvent extends DomainEvent> = (
  event: CommittedEvent<TEvent>,
) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Number of events whose chain link verified before the first break */
  readonly verifiedCount: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for EventStore operations.
 */
export type EventStoreErrorCode =
  | "CONTENTION"
  | "STORAGE_FAILURE"
  | "CORRUPT_LOG"
  | "INVALID_POSITION"
  | "STORE_CLOSED";

/**
 * Error thrown by event logs and the store.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly position?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EventStoreError";
  }
}

/**
 * Thrown when a fold meets an event it cannot handle.
 * This is a defect: unknown kinds are rejected before they are committed.
 */
export class ProjectionError extends Error {
  constructor(
    public readonly projection: string,
    public readonly eventType: string,
    public readonly position: number,
  ) {
    super(
      `Projection "${projection}" cannot fold event type "${eventType}" at position ${position}`,
    );
    this.name = "ProjectionError";
  }

  /**
   * For the `default` branch of an exhaustive switch over event types,
   * where TypeScript has narrowed the event to `never`.
   */
  static unhandled(projection: string, event: CommittedEvent): ProjectionError {
    return new ProjectionError(projection, event.type, event.position);
  }
}
