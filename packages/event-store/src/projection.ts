/**
 * @covenant/event-store: Projections and replay.
 *
 * A projection is a pure, deterministic, total fold over committed
 * events. Derived state is never stored as truth: any state can be
 * recomputed from position 0, and snapshots only shorten that walk.
 *
 *   state(0) = projection.initial()
 *   state(n) = projection.fold(state(n - 1), event[n - 1])
 *
 * Folds must return new state values and leave their input untouched.
 * Every state the engine hands out is deep-frozen, so a fold that
 * mutates its input fails loudly instead of corrupting cached states.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CommittedEvent, DomainEvent } from "@covenant/types";
import { deepFreeze } from "./freeze.js";
import type { SnapshotStore, StoredSnapshot } from "./snapshot-store.js";
import { verifySnapshotIntegrity } from "./snapshot-store.js";
import type { EventLog } from "./types.js";
import { EventStoreError } from "./types.js";

export interface Projection<TEvent extends DomainEvent, TState> {
  /** Stable name, used as the snapshot key */
  readonly name: string;
  initial(): TState;
  fold(state: TState, event: CommittedEvent<TEvent>): TState;
  /**
   * Recognise a state read back from a snapshot. Projections without
   * this guard are never snapshotted.
   */
  isState?(value: unknown): value is TState;
}

export interface ReplayEngineOptions {
  /** Snapshot cache. Default: none */
  readonly snapshots?: SnapshotStore | undefined;
  /** Save a snapshot every N positions (0 disables). Default: 100 */
  readonly snapshotInterval?: number | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Folds ranges of the log into projection state.
 */
export class ReplayEngine<TEvent extends DomainEvent> {
  private readonly _snapshots: SnapshotStore | undefined;
  private readonly _interval: number;
  private readonly _logger: Logger;

  constructor(
    private readonly _log: EventLog<TEvent>,
    options: ReplayEngineOptions = {},
  ) {
    this._snapshots = options.snapshots;
    this._interval = options.snapshotInterval ?? 100;
    this._logger = options.logger ?? pino({ level: "silent" });

    if (!Number.isInteger(this._interval) || this._interval < 0) {
      throw new RangeError(`snapshotInterval must be a non-negative integer, got ${this._interval}`);
    }
  }

  /**
   * Fold events `[from, to)` onto `initial`.
   *
   * Without `initial`, the state at `from` is computed first, so
   * `replay(p, n, m, replay(p, 0, n))` equals `replay(p, 0, m)`.
   */
  replay<TState>(
    projection: Projection<TEvent, TState>,
    from: number,
    to: number,
    initial?: TState,
  ): TState {
    this._checkRange(from, to);
    const start = initial !== undefined ? initial : this.stateAt(projection, from);
    return deepFreeze(this._foldRange(projection, start, from, to));
  }

  /**
   * State after folding events `[0, position)`, starting from the
   * nearest snapshot that verifies against this log.
   */
  stateAt<TState>(projection: Projection<TEvent, TState>, position: number): TState {
    this._checkRange(0, position);

    let from = 0;
    let state = projection.initial();

    const snapshot = this._snapshotsFor(projection)?.loadAtOrBefore(projection.name, position);
    if (snapshot !== undefined) {
      const restored = snapshot.state;
      const problem = this._problemWith(snapshot);
      if (problem === undefined && projection.isState !== undefined && projection.isState(restored)) {
        from = snapshot.position;
        state = restored;
      } else {
        this._logger.warn(
          { projection: projection.name, position: snapshot.position, reason: problem ?? "unrecognised state" },
          "Discarding snapshot",
        );
      }
    }

    return deepFreeze(this._foldRange(projection, state, from, position, true));
  }

  /**
   * Recompute from position 0, ignoring all snapshots.
   */
  rebuild<TState>(projection: Projection<TEvent, TState>, position: number = this._log.length): TState {
    this._checkRange(0, position);
    return deepFreeze(this._foldRange(projection, projection.initial(), 0, position));
  }

  /**
   * Record a state the caller computed at `position` (e.g. the store's
   * head after a commit), saving a snapshot on interval boundaries.
   */
  observe<TState>(projection: Projection<TEvent, TState>, position: number, state: TState): void {
    this._maybeSnapshot(projection, position, state);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _foldRange<TState>(
    projection: Projection<TEvent, TState>,
    initial: TState,
    from: number,
    to: number,
    snapshotAlongTheWay = false,
  ): TState {
    let state = initial;
    for (const event of this._log.slice(from, to)) {
      state = projection.fold(state, event);
      if (snapshotAlongTheWay) {
        this._maybeSnapshot(projection, event.position + 1, state);
      }
    }
    return state;
  }

  private _maybeSnapshot<TState>(
    projection: Projection<TEvent, TState>,
    position: number,
    state: TState,
  ): void {
    const snapshots = this._snapshotsFor(projection);
    if (snapshots === undefined || this._interval === 0) return;
    if (position === 0 || position % this._interval !== 0) return;

    const eventHash = this._log.at(position - 1)?.hash;
    if (eventHash === undefined) return;

    const existing = snapshots.loadAtOrBefore(projection.name, position);
    if (
      existing?.position === position &&
      this._problemWith(existing) === undefined &&
      projection.isState?.(existing.state) === true
    ) {
      return;
    }

    snapshots.save({ projection: projection.name, position, eventHash, state });
    this._logger.debug({ projection: projection.name, position }, "Snapshot saved");
  }

  /**
   * Why a snapshot cannot stand in for folding this log up to its
   * position, or undefined if it can.
   */
  private _problemWith(snapshot: StoredSnapshot): string | undefined {
    if (snapshot.position === 0 || this._log.at(snapshot.position - 1)?.hash !== snapshot.eventHash) {
      return "taken from a different log";
    }
    if (!verifySnapshotIntegrity(snapshot)) {
      return "failed integrity check";
    }
    return undefined;
  }

  private _snapshotsFor<TState>(projection: Projection<TEvent, TState>): SnapshotStore | undefined {
    return projection.isState !== undefined ? this._snapshots : undefined;
  }

  private _checkRange(from: number, to: number): void {
    const length = this._log.length;
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || from > to || to > length) {
      throw new EventStoreError(
        "INVALID_POSITION",
        `Invalid replay range [${from}, ${to}) for a log of length ${length}`,
      );
    }
  }
}
