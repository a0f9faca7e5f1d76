/**
 * @covenant/event-store: File-based JSONL EventLog implementation.
 *
 * Stores committed events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each write is a single append followed by fsync before returning
 * - A torn final line (no trailing newline) was never acknowledged;
 *   it is dropped and the file truncated on load
 * - Any other unreadable line, position gap or hash mismatch is
 *   corruption and fails the load
 * - A failed write truncates the file back to its previous size
 *
 * Exclusive access:
 * - Every write holds `<file>.lock`, created with O_EXCL
 * - A lock held by another writer raises CONTENTION (transient)
 * - A file that grew or shrank since this log last wrote it raises
 *   STORAGE_FAILURE without writing: another writer shares the file
 * - Locks older than `staleLockMs` are considered abandoned and broken
 *
 * File format:
 * {"position":0,"id":"...","timestamp":"...","type":"...","payload":{...},"metadata":{...},"hash":"...","previousHash":"genesis"}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  statSync,
  truncateSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import type { CommittedEvent, DomainEvent } from "@covenant/types";
import { isCommittedEvent } from "@covenant/types";
import { deepFreeze } from "./freeze.js";
import { computeEventHash, GENESIS_HASH } from "./hash-chain.js";
import type { EventLog } from "./types.js";
import { EventStoreError } from "./types.js";

/**
 * Options for creating a JsonlEventLog.
 */
export interface JsonlEventLogOptions<TEvent extends DomainEvent> {
  /** Path to the JSONL file */
  readonly filePath: string;

  /**
   * Recognise a stored record as one of the domain's events.
   * Records it rejects make the load fail as CORRUPT_LOG.
   */
  readonly isEvent: (event: CommittedEvent) => event is CommittedEvent<TEvent>;

  /** Age in ms after which a lock file is considered abandoned. Default: 30000 */
  readonly staleLockMs?: number;

  /** Logger for lock housekeeping. Default: silent */
  readonly logger?: Logger;

  /** Millisecond clock used for lock staleness (injectable for testing) */
  readonly nowMs?: () => number;
}

const DEFAULT_STALE_LOCK_MS = 30_000;
const BUSY_ERRNO = new Set(["EAGAIN", "EBUSY"]);

function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * File-based JSONL event log.
 *
 * The in-memory index is rebuilt from the file on construction and
 * extended only after a write has been fsynced.
 */
export class JsonlEventLog<TEvent extends DomainEvent = DomainEvent>
  implements EventLog<TEvent>
{
  private readonly _filePath: string;
  private readonly _lockPath: string;
  private readonly _staleLockMs: number;
  private readonly _logger: Logger;
  private readonly _nowMs: () => number;
  private readonly _isEvent: (event: CommittedEvent) => event is CommittedEvent<TEvent>;

  private readonly _events: CommittedEvent<TEvent>[] = [];
  private _byteLength = 0;
  private _closed = false;

  /**
   * Open (or create on first write) a JSONL log.
   *
   * @throws EventStoreError("CORRUPT_LOG") if the file fails validation
   */
  constructor(options: JsonlEventLogOptions<TEvent>) {
    this._filePath = options.filePath;
    this._isEvent = options.isEvent;
    this._lockPath = `${options.filePath}.lock`;
    this._staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    this._logger = options.logger ?? pino({ level: "silent" });
    this._nowMs = options.nowMs ?? Date.now;

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get length(): number {
    return this._events.length;
  }

  at(position: number): CommittedEvent<TEvent> | undefined {
    return this._events[position];
  }

  slice(from: number, to: number): readonly CommittedEvent<TEvent>[] {
    return this._events.slice(from, to);
  }

  write(record: CommittedEvent<TEvent>): void {
    if (this._closed) {
      throw new EventStoreError("STORE_CLOSED", "Event log is closed");
    }
    if (record.position !== this._events.length) {
      throw new EventStoreError(
        "INVALID_POSITION",
        `Expected position ${this._events.length}, got ${record.position}`,
        record.position,
      );
    }

    const line = JSON.stringify(record) + "\n";

    this._acquireLock();
    try {
      this._checkUnchanged(record.position);
      this._appendDurably(line, record.position);
    } finally {
      this._releaseLock();
    }

    this._byteLength += Buffer.byteLength(line, "utf-8");
    this._events.push(record);
  }

  close(): void {
    this._closed = true;
  }

  /** The file path this log writes to */
  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    const lastNewline = content.lastIndexOf("\n");
    const complete = content.slice(0, lastNewline + 1);

    if (complete.length < content.length) {
      // Torn tail from an interrupted, never acknowledged write
      this._logger.warn(
        { filePath: this._filePath, droppedBytes: Buffer.byteLength(content) - Buffer.byteLength(complete) },
        "Dropping torn final line",
      );
      truncateSync(this._filePath, Buffer.byteLength(complete, "utf-8"));
    }

    let previousHash = GENESIS_HASH;
    const lines = complete.split("\n");

    lines.forEach((line, index) => {
      if (line.trim().length === 0) {
        return;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (err: unknown) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Unparsable record on line ${index + 1} of ${this._filePath}: ${messageOf(err)}`,
          this._events.length,
          { cause: err },
        );
      }

      if (!isCommittedEvent(parsed) || !this._isEvent(parsed)) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Malformed record on line ${index + 1} of ${this._filePath}`,
          this._events.length,
        );
      }

      const expected = this._events.length;
      if (parsed.position !== expected) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Position gap on line ${index + 1}: expected ${expected}, found ${parsed.position}`,
          expected,
        );
      }
      if (
        parsed.previousHash !== previousHash ||
        parsed.hash !== computeEventHash(parsed, previousHash)
      ) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Hash chain broken at position ${expected}`,
          expected,
        );
      }

      previousHash = parsed.hash;
      this._events.push(deepFreeze(parsed));
    });

    this._byteLength = Buffer.byteLength(complete, "utf-8");
  }

  private _checkUnchanged(position: number): void {
    const stats = statSync(this._filePath, { throwIfNoEntry: false });
    const size = stats?.isFile() === true ? stats.size : 0;
    if (size !== this._byteLength) {
      throw new EventStoreError(
        "STORAGE_FAILURE",
        `${this._filePath} is ${size} bytes, expected ${this._byteLength}: modified by another writer`,
        position,
      );
    }
  }

  private _appendDurably(line: string, position: number): void {
    let fd: number | undefined;
    try {
      fd = openSync(this._filePath, "a");
      appendFileSync(fd, line, "utf-8");
      fsyncSync(fd);
    } catch (err: unknown) {
      this._rollback();
      const code = errnoOf(err);
      throw new EventStoreError(
        code !== undefined && BUSY_ERRNO.has(code) ? "CONTENTION" : "STORAGE_FAILURE",
        `Failed to persist position ${position}: ${messageOf(err)}`,
        position,
        { cause: err },
      );
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }

  /**
   * Cut the file back to the last acknowledged byte.
   * If that fails the file can no longer be trusted, so the log closes.
   */
  private _rollback(): void {
    try {
      if (existsSync(this._filePath)) {
        truncateSync(this._filePath, this._byteLength);
      }
    } catch (err: unknown) {
      this._closed = true;
      this._logger.error(
        { filePath: this._filePath, err },
        "Rollback after failed write did not complete; closing log",
      );
    }
  }

  private _acquireLock(retriedStale = false): void {
    try {
      const fd = openSync(this._lockPath, "wx");
      try {
        writeSync(fd, `${process.pid}\n`);
      } finally {
        closeSync(fd);
      }
    } catch (err: unknown) {
      if (errnoOf(err) !== "EEXIST") {
        throw new EventStoreError(
          "STORAGE_FAILURE",
          `Cannot create lock ${this._lockPath}: ${messageOf(err)}`,
          this._events.length,
          { cause: err },
        );
      }

      if (!retriedStale && this._isStale()) {
        this._logger.warn({ lockPath: this._lockPath }, "Breaking stale lock");
        this._unlinkLock();
        this._acquireLock(true);
        return;
      }

      throw new EventStoreError(
        "CONTENTION",
        `Lock ${this._lockPath} is held by another writer`,
        this._events.length,
        { cause: err },
      );
    }
  }

  private _isStale(): boolean {
    try {
      return this._nowMs() - statSync(this._lockPath).mtimeMs > this._staleLockMs;
    } catch (err: unknown) {
      // Released between our open and stat: treat as free
      if (errnoOf(err) === "ENOENT") return true;
      throw err;
    }
  }

  private _unlinkLock(): void {
    try {
      unlinkSync(this._lockPath);
    } catch (err: unknown) {
      if (errnoOf(err) !== "ENOENT") throw err;
    }
  }

  private _releaseLock(): void {
    try {
      this._unlinkLock();
    } catch (err: unknown) {
      // The record is already durable; the lock will age into staleness.
      this._logger.warn({ lockPath: this._lockPath, err }, "Failed to release lock");
    }
  }
}
