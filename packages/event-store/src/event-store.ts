/**
 * @covenant/event-store: The governance event store.
 *
 * Commit protocol (one proposal at a time, in arrival order):
 *   1. Shape check and domain decode
 *   2. Kernel invariants: unseen commandId, known causationId
 *   3. Domain validator against the head state
 *   4. Assign position, timestamp, id and hash-chain link
 *   5. Fold into the next, frozen head state (a fold failure aborts the commit)
 *   6. Persist through the EventLog, retrying transient contention
 *   7. Publish: advance head, indexes and subscribers
 *
 * Nothing becomes visible before step 7, and a failure at any earlier
 * step leaves the log and every derived state exactly as they were.
 */

import { performance } from "node:perf_hooks";
import pino from "pino";
import type { Logger } from "pino";
import type { CandidateEvent, CommittedEvent, DomainEvent } from "@covenant/types";
import { isCandidateEvent } from "@covenant/types";
import type { Clock } from "./clock.js";
import { maxTimestamp, SystemClock } from "./clock.js";
import { deepFreeze } from "./freeze.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type { IdSource } from "./ids.js";
import { UuidV7IdSource } from "./ids.js";
import type { Decoder, Validator, Violation } from "./invariants.js";
import type { MetricLabels, ObservabilitySink } from "./observability.js";
import { NoopSink } from "./observability.js";
import type { Projection } from "./projection.js";
import { ReplayEngine } from "./projection.js";
import type { RetryPolicy } from "./retry.js";
import { DEFAULT_RETRY_POLICY, sleep, validateRetryPolicy, withRetry } from "./retry.js";
import { AppendSerializer } from "./serializer.js";
import type { SnapshotStore } from "./snapshot-store.js";
import type {
  AppendOutcome,
  CommitHandler,
  EventLog,
  EventStoreIntegrityResult,
  FatalOutcome,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

// =============================================================================
// Metric names
// =============================================================================

export const APPEND_TOTAL = "covenant_append_total";
export const APPEND_DURATION_MS = "covenant_append_duration_ms";
export const APPEND_RETRIES_TOTAL = "covenant_append_retries_total";

// =============================================================================
// Options
// =============================================================================

export interface EventStoreOptions<TEvent extends DomainEvent, TState> {
  /** Durable storage */
  readonly log: EventLog<TEvent>;
  /** The head-state projection validators run against */
  readonly projection: Projection<TEvent, TState>;
  /** Parse an untyped candidate into the domain's event union */
  readonly decode: Decoder<TEvent>;
  /** Domain invariants */
  readonly validate: Validator<TEvent, TState>;
  /** Default: SystemClock */
  readonly clock?: Clock;
  /** Default: UUIDv7 */
  readonly ids?: IdSource;
  /** Default: DEFAULT_RETRY_POLICY */
  readonly retry?: RetryPolicy;
  /** Backoff sleep (injectable for testing) */
  readonly sleep?: (ms: number) => Promise<void>;
  /** Default: NoopSink */
  readonly sink?: ObservabilitySink;
  /** Default: silent */
  readonly logger?: Logger;
  /** Optional snapshot cache for replay */
  readonly snapshots?: SnapshotStore;
  /** Default: 100 */
  readonly snapshotInterval?: number;
}

// =============================================================================
// Cursor
// =============================================================================

/**
 * A bounded, restartable view over committed events.
 *
 * The upper bound is fixed when the cursor is created: events committed
 * afterwards are not included, however long iteration takes.
 */
export class EventCursor<TEvent extends DomainEvent>
  implements Iterable<CommittedEvent<TEvent>>
{
  constructor(
    private readonly _log: EventLog<TEvent>,
    readonly from: number,
    readonly to: number,
  ) {}

  /** Number of events the cursor will yield */
  get length(): number {
    return this.to - this.from;
  }

  *[Symbol.iterator](): Iterator<CommittedEvent<TEvent>> {
    for (let position = this.from; position < this.to; position++) {
      const event = this._log.at(position);
      if (event === undefined) {
        throw new EventStoreError("INVALID_POSITION", `Missing event at position ${position}`, position);
      }
      yield event;
    }
  }

  toArray(): readonly CommittedEvent<TEvent>[] {
    return this._log.slice(this.from, this.to);
  }
}

// =============================================================================
// Event Store
// =============================================================================

function closedOutcome(): FatalOutcome {
  return { status: "fatal", error: new EventStoreError("STORE_CLOSED", "Event store is closed") };
}

export class EventStore<TEvent extends DomainEvent, TState> {
  private readonly _log: EventLog<TEvent>;
  private readonly _projection: Projection<TEvent, TState>;
  private readonly _decode: Decoder<TEvent>;
  private readonly _validate: Validator<TEvent, TState>;
  private readonly _clock: Clock;
  private readonly _ids: IdSource;
  private readonly _retry: RetryPolicy;
  private readonly _sleep: (ms: number) => Promise<void>;
  private readonly _sink: ObservabilitySink;
  private readonly _logger: Logger;
  private readonly _replay: ReplayEngine<TEvent>;
  private readonly _serializer = new AppendSerializer();
  private readonly _handlers = new Set<CommitHandler<TEvent>>();

  /** commandId → committed position */
  private readonly _commands = new Map<string, number>();
  /** event id → committed position */
  private readonly _eventIds = new Map<string, number>();

  private _head: TState;
  private _lastTimestamp: string | undefined;
  private _closed = false;

  /**
   * Open a store over an existing (possibly empty) log.
   * The head state and indexes are rebuilt from the log.
   */
  constructor(options: EventStoreOptions<TEvent, TState>) {
    this._log = options.log;
    this._projection = options.projection;
    this._decode = options.decode;
    this._validate = options.validate;
    this._clock = options.clock ?? new SystemClock();
    this._ids = options.ids ?? new UuidV7IdSource();
    this._retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this._sleep = options.sleep ?? sleep;
    this._sink = options.sink ?? new NoopSink();
    this._logger = options.logger ?? pino({ level: "silent" });

    validateRetryPolicy(this._retry);

    this._replay = new ReplayEngine(this._log, {
      snapshots: options.snapshots,
      snapshotInterval: options.snapshotInterval,
      logger: this._logger,
    });

    for (const event of this._log.slice(0, this._log.length)) {
      this._index(event);
    }
    this._head = this._replay.stateAt(this._projection, this._log.length);

    this._logger.info(
      { projection: this._projection.name, length: this._log.length },
      "Event store opened",
    );
  }

  // ─── Write path ─────────────────────────────────────────────────────

  /**
   * Validate a candidate against the current head and, if admitted,
   * commit it durably at the next position.
   *
   * Never throws: every failure is reported through the outcome.
   */
  async proposeEvent(candidate: CandidateEvent): Promise<AppendOutcome<TEvent>> {
    const started = performance.now();
    const outcome = this._closed
      ? closedOutcome()
      : await this._serializer.run(() => this._commit(candidate));
    this._report(outcome, performance.now() - started);
    return outcome;
  }

  // ─── Read path ──────────────────────────────────────────────────────

  /** Number of committed events (= the next position to assign) */
  get length(): number {
    return this._log.length;
  }

  /** The head state at the moment of the call (deep-frozen) */
  get state(): TState {
    return this._head;
  }

  /**
   * Committed events in `[from, to)`. `to` defaults to the current
   * length; both bounds are fixed when the cursor is created.
   */
  read(from = 0, to?: number): EventCursor<TEvent> {
    const length = this._log.length;
    const end = to ?? length;
    if (!Number.isInteger(from) || !Number.isInteger(end) || from < 0 || from > end || end > length) {
      throw new EventStoreError(
        "INVALID_POSITION",
        `Invalid read range [${from}, ${end}) for a log of length ${length}`,
      );
    }
    return new EventCursor(this._log, from, end);
  }

  /**
   * The store's own projection at the head, or at `asOfPosition`.
   */
  query(): TState;
  /**
   * Any projection over the committed log, at the head or at `asOfPosition`.
   */
  query<TView>(projection: Projection<TEvent, TView>, asOfPosition?: number): TView;
  query<TView>(projection?: Projection<TEvent, TView>, asOfPosition?: number): TState | TView {
    const position = asOfPosition ?? this._log.length;
    if (projection === undefined) {
      return position === this._log.length
        ? this._head
        : this._replay.stateAt(this._projection, position);
    }
    return this._replay.stateAt(projection, position);
  }

  /** Fold `[from, to)` onto `initial` (or onto the state at `from`) */
  replay<TView>(
    projection: Projection<TEvent, TView>,
    from: number,
    to: number,
    initial?: TView,
  ): TView {
    return this._replay.replay(projection, from, to, initial);
  }

  /** Recompute a projection from position 0 without snapshots */
  rebuild<TView>(projection: Projection<TEvent, TView>, position?: number): TView {
    return this._replay.rebuild(projection, position);
  }

  /** Recheck positions and the hash chain of the whole log */
  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log.slice(0, this._log.length));
  }

  /**
   * Be told about each commit after it becomes visible.
   * Handler failures are logged and never affect the commit.
   */
  onCommit(handler: CommitHandler<TEvent>): Subscription {
    this._handlers.add(handler);
    return {
      unsubscribe: () => {
        this._handlers.delete(handler);
      },
    };
  }

  /**
   * Let queued proposals finish, then close the log.
   * Later proposals return a fatal STORE_CLOSED outcome.
   */
  async close(): Promise<void> {
    this._closed = true;
    await this._serializer.drain();
    this._log.close();
    this._logger.info({ length: this._log.length }, "Event store closed");
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _commit(candidate: CandidateEvent): Promise<AppendOutcome<TEvent>> {
    try {
      return await this._admitAndPersist(candidate);
    } catch (err: unknown) {
      // Validators and folds are pure; reaching here is a defect in one of them
      this._logger.error({ err, type: candidate.type }, "Commit aborted by unexpected error");
      return { status: "fatal", error: err };
    }
  }

  private async _admitAndPersist(candidate: CandidateEvent): Promise<AppendOutcome<TEvent>> {
    if (!isCandidateEvent(candidate)) {
      return this._reject({ kind: "malformed", reason: "Candidate is not a well-formed event" });
    }

    const decoded = this._decode(candidate);
    if (!decoded.ok) {
      return this._reject(decoded.violation);
    }
    const admitted = decoded.candidate;
    const { metadata } = admitted;

    const committedAt = this._commands.get(metadata.commandId);
    if (committedAt !== undefined) {
      return this._reject({
        kind: "duplicate",
        reason: `Command ${metadata.commandId} was already committed`,
        details: { commandId: metadata.commandId, position: committedAt },
      });
    }

    if (metadata.causationId !== undefined && !this._eventIds.has(metadata.causationId)) {
      return this._reject({
        kind: "unknown_reference",
        reason: `Causing event ${metadata.causationId} does not exist`,
        details: { causationId: metadata.causationId },
      });
    }

    const position = this._log.length;
    const now = this._lastTimestamp === undefined
      ? this._clock.now()
      : maxTimestamp(this._clock.now(), this._lastTimestamp);

    const verdict = this._validate(admitted, this._head, { now, position });
    if (!verdict.ok) {
      return this._reject(verdict.violation);
    }

    const record = this._seal(admitted, position, now);
    const nextHead = deepFreeze(this._projection.fold(this._head, record));

    const result = await withRetry(() => this._log.write(record), this._retry, {
      sleep: this._sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        this._logger.warn({ position, attempt, delayMs, err: error }, "Append contended; retrying");
        this._emit(() => this._sink.increment(APPEND_RETRIES_TOTAL));
      },
    });

    if (!result.ok) {
      if (result.reason === "exhausted") {
        this._logger.error(
          { position, attempts: result.attempts, err: result.lastError },
          "Append retries exhausted",
        );
        return { status: "retry_exhausted", attempts: result.attempts, error: result.lastError };
      }
      this._logger.error({ position, err: result.error }, "Append failed");
      return { status: "fatal", error: result.error };
    }

    this._publish(record, nextHead);
    return { status: "committed", event: record };
  }

  /**
   * Stamp a decoded candidate with its log coordinates and freeze it.
   */
  private _seal(
    candidate: CandidateEvent<TEvent>,
    position: number,
    timestamp: string,
  ): CommittedEvent<TEvent> {
    const previousHash = this._log.at(position - 1)?.hash ?? GENESIS_HASH;
    const content = structuredClone({
      ...candidate,
      position,
      id: this._ids.next(),
      timestamp,
    });
    return deepFreeze({
      ...content,
      hash: computeEventHash(content, previousHash),
      previousHash,
    });
  }

  private _publish(record: CommittedEvent<TEvent>, nextHead: TState): void {
    this._head = nextHead;
    this._index(record);
    this._replay.observe(this._projection, record.position + 1, nextHead);

    this._logger.debug(
      { position: record.position, type: record.type, id: record.id },
      "Event committed",
    );

    for (const handler of this._handlers) {
      try {
        handler(record);
      } catch (err: unknown) {
        this._logger.warn({ err, position: record.position }, "Commit handler failed");
      }
    }
  }

  private _index(event: CommittedEvent<TEvent>): void {
    this._commands.set(event.metadata.commandId, event.position);
    this._eventIds.set(event.id, event.position);
    this._lastTimestamp = event.timestamp;
  }

  private _reject(violation: Violation): AppendOutcome<TEvent> {
    this._logger.info(
      { kind: violation.kind, reason: violation.reason, details: violation.details },
      "Event rejected",
    );
    return { status: "rejected", violation };
  }

  private _report(outcome: AppendOutcome<TEvent>, durationMs: number): void {
    const labels: MetricLabels = { outcome: outcome.status };
    this._emit(() => {
      this._sink.increment(APPEND_TOTAL, labels);
      this._sink.timing(APPEND_DURATION_MS, durationMs, labels);
    });
  }

  private _emit(report: () => void): void {
    try {
      report();
    } catch (err: unknown) {
      this._logger.warn({ err }, "Observability sink failed");
    }
  }
}
