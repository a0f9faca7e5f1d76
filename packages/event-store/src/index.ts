/**
 * @covenant/event-store: Append-only, invariant-checked event log.
 *
 * Provides:
 * - EventStore: serialized validate-then-append with retry and metrics
 * - EventLog port with in-memory and durable JSONL implementations
 * - Projections, replay and snapshot caching
 * - Hash chain for tamper evidence
 * - Injectable clock, ID source and observability sink
 *
 * @packageDocumentation
 */

// Core types
export type {
  EventLog,
  CommittedOutcome,
  RejectedOutcome,
  RetryExhaustedOutcome,
  FatalOutcome,
  AppendOutcome,
  AppendStatus,
  CommitHandler,
  Subscription,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError, ProjectionError } from "./types.js";

// Store
export type { EventStoreOptions } from "./event-store.js";
export {
  EventStore,
  EventCursor,
  APPEND_TOTAL,
  APPEND_DURATION_MS,
  APPEND_RETRIES_TOTAL,
} from "./event-store.js";

// Invariants
export type {
  ViolationKind,
  Violation,
  Verdict,
  ValidationContext,
  Validator,
  DecodeResult,
  Decoder,
} from "./invariants.js";
export { ok, violation, composeValidators } from "./invariants.js";

// Projections
export type { Projection, ReplayEngineOptions } from "./projection.js";
export { ReplayEngine } from "./projection.js";

// Logs
export { InMemoryEventLog } from "./in-memory-log.js";
export { JsonlEventLog } from "./jsonl-log.js";
export type { JsonlEventLogOptions } from "./jsonl-log.js";

// Hash chain
export type { HashableEvent } from "./hash-chain.js";
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Retry & serialization
export type { RetryPolicy, RetryResult, RetryHooks } from "./retry.js";
export {
  DEFAULT_RETRY_POLICY,
  withRetry,
  computeDelay,
  validateRetryPolicy,
  isTransientStorageError,
  sleep,
} from "./retry.js";
export { AppendSerializer } from "./serializer.js";

// Time & IDs
export type { Clock } from "./clock.js";
export {
  SystemClock,
  ManualClock,
  MonotonicClock,
  MS_PER_DAY,
  maxTimestamp,
  addDays,
} from "./clock.js";
export type { IdSource } from "./ids.js";
export { UuidV7IdSource, SequentialIdSource, uuidv7 } from "./ids.js";

// Observability
export type { MetricLabels, ObservabilitySink } from "./observability.js";
export { NoopSink, MetricsCollector } from "./observability.js";

// Snapshot store
export type {
  StoredSnapshot,
  SaveSnapshotOptions,
  SnapshotStore,
} from "./snapshot-store.js";
export {
  InMemorySnapshotStore,
  FileSnapshotStore,
  computeSnapshotHash,
  verifySnapshotIntegrity,
} from "./snapshot-store.js";

export { deepFreeze } from "./freeze.js";
