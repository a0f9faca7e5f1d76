/**
 * @covenant/event-store: Snapshot cache.
 *
 * A snapshot is the state of one projection after folding events
 * `[0, position)`. It is a cache, never truth: deleting every snapshot
 * only makes the next replay longer.
 *
 * Each snapshot carries two hashes:
 * - `stateHash`: SHA-256 of the canonical state, detecting edits
 * - `eventHash`: hash-chain link of the last folded event, binding the
 *   snapshot to the exact log prefix it was folded from
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

/**
 * SHA-256 of the canonical JSON form of a state.
 */
export function computeSnapshotHash(state: unknown): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

export interface SaveSnapshotOptions {
  readonly projection: string;
  /** Number of events folded into `state` */
  readonly position: number;
  /** `hash` of the event at `position - 1` */
  readonly eventHash: string;
  readonly state: unknown;
}

export interface StoredSnapshot extends SaveSnapshotOptions {
  readonly stateHash: string;
  readonly createdAt: string;
}

/**
 * Whether a snapshot's stateHash matches its state.
 */
export function verifySnapshotIntegrity(snapshot: StoredSnapshot): boolean {
  return snapshot.stateHash !== "" && snapshot.stateHash === computeSnapshotHash(snapshot.state);
}

function seal(options: SaveSnapshotOptions): StoredSnapshot {
  return {
    projection: options.projection,
    position: options.position,
    eventHash: options.eventHash,
    state: options.state,
    stateHash: computeSnapshotHash(options.state),
    createdAt: new Date().toISOString(),
  };
}

function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.projection === "string" &&
    typeof v.position === "number" &&
    typeof v.eventHash === "string" &&
    "state" in v &&
    typeof v.stateHash === "string" &&
    typeof v.createdAt === "string"
  );
}

export interface SnapshotStore {
  /** Store a snapshot, replacing any at the same projection and position */
  save(options: SaveSnapshotOptions): void;

  /** The highest-position snapshot whose position is <= `position` */
  loadAtOrBefore(projection: string, position: number): StoredSnapshot | undefined;
}

/** Largest key in `positions` not past `limit` */
function nearest(positions: Iterable<number>, limit: number): number | undefined {
  let best: number | undefined;
  for (const position of positions) {
    if (position <= limit && (best === undefined || position > best)) {
      best = position;
    }
  }
  return best;
}

// =============================================================================
// In memory
// =============================================================================

export class InMemorySnapshotStore implements SnapshotStore {
  private readonly _byProjection = new Map<string, Map<number, StoredSnapshot>>();

  save(options: SaveSnapshotOptions): void {
    let byPosition = this._byProjection.get(options.projection);
    if (byPosition === undefined) {
      byPosition = new Map();
      this._byProjection.set(options.projection, byPosition);
    }
    byPosition.set(options.position, seal(options));
  }

  loadAtOrBefore(projection: string, position: number): StoredSnapshot | undefined {
    const byPosition = this._byProjection.get(projection);
    if (byPosition === undefined) return undefined;
    const best = nearest(byPosition.keys(), position);
    return best === undefined ? undefined : byPosition.get(best);
  }
}

// =============================================================================
// On disk
// =============================================================================

const SNAPSHOT_FILE = /^(\d+)\.json$/;

/**
 * One JSON file per snapshot: `<dir>/<projection>/<position>.json`.
 * Files that cannot be read back are treated as absent.
 */
export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly _dir: string) {
    mkdirSync(_dir, { recursive: true });
  }

  save(options: SaveSnapshotOptions): void {
    const dir = this._dirFor(options.projection);
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, `${options.position}.json`), JSON.stringify(seal(options), null, 2), "utf-8");
  }

  loadAtOrBefore(projection: string, position: number): StoredSnapshot | undefined {
    const dir = this._dirFor(projection);
    if (!existsSync(dir)) return undefined;

    const positions = readdirSync(dir).flatMap((file) => {
      const match = SNAPSHOT_FILE.exec(file);
      return match?.[1] === undefined ? [] : [Number(match[1])];
    });
    const best = nearest(positions, position);
    return best === undefined ? undefined : this._read(join(dir, `${best}.json`));
  }

  private _dirFor(projection: string): string {
    return join(this._dir, projection.replace(/[^a-zA-Z0-9_.-]/g, "_"));
  }

  private _read(file: string): StoredSnapshot | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(file, "utf-8"));
    } catch {
      return undefined;
    }
    return isStoredSnapshot(parsed) ? parsed : undefined;
  }
}
