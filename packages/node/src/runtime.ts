/**
 * @covenant/node: Runtime assembly.
 *
 * Wires a durable governance store from configuration: JSONL log,
 * snapshot cache, metrics collector and a child logger per component.
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  FileSnapshotStore,
  InMemorySnapshotStore,
  JsonlEventLog,
  MetricsCollector,
  MonotonicClock,
} from "@covenant/event-store";
import type { Clock, EventStoreIntegrityResult, IdSource, SnapshotStore } from "@covenant/event-store";
import type { GovernanceEvent, GovernanceStore, RiskLevel } from "@covenant/governance";
import {
  activeDelegations,
  createGovernanceStore,
  freedomHealth,
  isGovernanceEvent,
  lawsDueForReview,
} from "@covenant/governance";
import type { AppConfig } from "./config.js";
import { retryPolicyFromConfig, safetyPolicyFromConfig } from "./config.js";

export interface RuntimeOptions {
  /** Default: silent */
  readonly logger?: Logger;
  /** Default: wall clock, made monotonic */
  readonly clock?: Clock;
  readonly ids?: IdSource;
  /** Backoff sleep (injectable for testing) */
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface Runtime {
  readonly config: AppConfig;
  readonly store: GovernanceStore;
  readonly metrics: MetricsCollector;
  readonly snapshots: SnapshotStore;
  readonly clock: Clock;
  readonly logger: Logger;
  close(): Promise<void>;
}

/**
 * Open the configured log and rebuild the governance state from it.
 *
 * @throws EventStoreError("CORRUPT_LOG") if the log fails validation on load
 */
export function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Runtime {
  const logger = options.logger ?? pino({ level: "silent" });
  const clock = options.clock ?? new MonotonicClock();
  const metrics = new MetricsCollector();

  const snapshots: SnapshotStore =
    config.COVENANT_SNAPSHOT_DIR !== undefined
      ? new FileSnapshotStore(config.COVENANT_SNAPSHOT_DIR)
      : new InMemorySnapshotStore();

  const log = new JsonlEventLog<GovernanceEvent>({
    filePath: config.COVENANT_LOG_FILE,
    isEvent: isGovernanceEvent,
    staleLockMs: config.LOCK_STALE_MS,
    logger: logger.child({ component: "jsonl-log" }),
  });

  const store = createGovernanceStore({
    log,
    clock,
    ids: options.ids,
    retry: retryPolicyFromConfig(config),
    sleep: options.sleep,
    sink: metrics,
    logger: logger.child({ component: "event-store" }),
    snapshots,
    snapshotInterval: config.SNAPSHOT_INTERVAL,
    policy: safetyPolicyFromConfig(config),
  });

  return {
    config,
    store,
    metrics,
    snapshots,
    clock,
    logger,
    close: () => store.close(),
  };
}

// =============================================================================
// Summary
// =============================================================================

export interface ReplaySummary {
  readonly length: number;
  readonly integrity: EventStoreIntegrityResult;
  readonly workspaces: number;
  readonly activeDelegations: number;
  readonly laws: number;
  readonly lawsDueForReview: readonly string[];
  readonly riskLevel: RiskLevel;
  readonly riskReasons: readonly string[];
}

/**
 * What the log holds right now, checked end to end.
 */
export function summarize(runtime: Runtime): ReplaySummary {
  const { store } = runtime;
  const state = store.state;
  const now = runtime.clock.now();
  const health = freedomHealth(state, now, safetyPolicyFromConfig(runtime.config));
  return {
    length: store.length,
    integrity: store.verifyIntegrity(),
    workspaces: Object.keys(state.workspaces).length,
    activeDelegations: activeDelegations(state, now).length,
    laws: Object.keys(state.laws).length,
    lawsDueForReview: lawsDueForReview(state, now).map((law) => law.lawId),
    riskLevel: health.riskLevel,
    riskReasons: health.reasons,
  };
}
