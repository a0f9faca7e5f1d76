/**
 * Tests for JsonlEventLog.
 *
 * Verifies:
 * - Persistence across instances
 * - Torn final line recovery
 * - Corruption, gaps and tampering fail the load
 * - Lock-file contention and stale lock recovery
 * - Failed writes leave no trace
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlEventLog } from "../src/jsonl-log.js";
import { computeEventHash, GENESIS_HASH } from "../src/hash-chain.js";
import { EventStoreError } from "../src/types.js";
import type { NoteEvent } from "./helpers.js";
import { chainedNotes, isNoteEvent, thrown } from "./helpers.js";

let dir: string;
let filePath: string;

function open(options: { staleLockMs?: number; nowMs?: () => number } = {}) {
  return new JsonlEventLog<NoteEvent>({ filePath, isEvent: isNoteEvent, ...options });
}

function lines(records: readonly unknown[]): string {
  return records.map((r) => JSON.stringify(r) + "\n").join("");
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "covenant-jsonl-"));
  filePath = join(dir, "events.jsonl");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

// =============================================================================
// Persistence
// =============================================================================

describe("persistence", () => {
  it("does not create the file until the first write", () => {
    const log = open();
    expect(log.length).toBe(0);
    expect(existsSync(filePath)).toBe(false);
  });

  it("creates missing parent directories", () => {
    filePath = join(dir, "nested", "deeper", "events.jsonl");
    const log = open();
    const [first] = chainedNotes(1);
    if (first === undefined) throw new Error("fixture");

    log.write(first);

    expect(existsSync(filePath)).toBe(true);
  });

  it("writes one JSON line per record and reloads them", () => {
    const records = chainedNotes(3);
    const log = open();
    for (const record of records) log.write(record);

    expect(readFileSync(filePath, "utf-8")).toBe(lines(records));

    const reopened = open();
    expect(reopened.length).toBe(3);
    expect(reopened.slice(0, 3)).toEqual(records);
    expect(reopened.filePath).toBe(filePath);
  });

  it("freezes reloaded records", () => {
    writeFileSync(filePath, lines(chainedNotes(1)));
    const record = open().at(0);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record?.payload)).toBe(true);
  });

  it("continues the log after a reload", () => {
    const records = chainedNotes(2);
    writeFileSync(filePath, lines(records.slice(0, 1)));

    const log = open();
    const second = records[1];
    if (second === undefined) throw new Error("fixture");
    log.write(second);

    expect(open().length).toBe(2);
  });

  it("skips blank lines", () => {
    const [a, b] = chainedNotes(2);
    writeFileSync(filePath, `${JSON.stringify(a)}\n\n${JSON.stringify(b)}\n`);
    expect(open().length).toBe(2);
  });
});

// =============================================================================
// Recovery and corruption
// =============================================================================

describe("recovery", () => {
  it("drops a torn final line and truncates the file", () => {
    const records = chainedNotes(2);
    const intact = lines(records);
    writeFileSync(filePath, intact + '{"position":2,"id":"evt');

    const log = open();

    expect(log.length).toBe(2);
    expect(readFileSync(filePath, "utf-8")).toBe(intact);
  });

  it("accepts the next write after dropping a torn line", () => {
    const records = chainedNotes(3);
    writeFileSync(filePath, lines(records.slice(0, 2)) + "{");

    const log = open();
    const third = records[2];
    if (third === undefined) throw new Error("fixture");
    log.write(third);

    expect(readFileSync(filePath, "utf-8")).toBe(lines(records));
  });

  it("fails on an unparsable line in the middle", () => {
    const [a, b] = chainedNotes(2);
    writeFileSync(filePath, `${JSON.stringify(a)}\nNOT VALID JSON\n${JSON.stringify(b)}\n`);

    const err = thrown(() => open());

    expect(err).toBeInstanceOf(EventStoreError);
    expect(err).toMatchObject({ code: "CORRUPT_LOG", position: 1 });
  });

  it("fails on a record missing envelope fields", () => {
    writeFileSync(filePath, JSON.stringify({ position: 0, type: "note.added" }) + "\n");
    expect(thrown(() => open())).toMatchObject({ code: "CORRUPT_LOG", position: 0 });
  });

  it("fails on a record the domain does not recognise", () => {
    const content = {
      type: "note.archived",
      payload: { noteId: "n0" },
      metadata: { actor: "alice", commandId: "c0" },
      position: 0,
      id: "evt-0",
      timestamp: "2025-01-01T00:00:00.000Z",
    };
    const record = { ...content, hash: computeEventHash(content, GENESIS_HASH), previousHash: GENESIS_HASH };
    writeFileSync(filePath, lines([record]));

    expect(thrown(() => open())).toMatchObject({ code: "CORRUPT_LOG" });
  });

  it("fails on a position gap", () => {
    const [a, , c] = chainedNotes(3);
    writeFileSync(filePath, lines([a, c]));

    const err = thrown(() => open());

    expect(err).toMatchObject({ code: "CORRUPT_LOG", position: 1 });
    expect(err instanceof Error ? err.message : "").toBe("Position gap on line 2: expected 1, found 2");
  });

  it("fails when a stored record was edited", () => {
    const [a, b] = chainedNotes(2);
    if (a === undefined || b === undefined) throw new Error("fixture");
    writeFileSync(filePath, lines([{ ...a, payload: { noteId: "n0", text: "edited" } }, b]));

    const err = thrown(() => open());

    expect(err).toMatchObject({ code: "CORRUPT_LOG", position: 0 });
    expect(err instanceof Error ? err.message : "").toBe("Hash chain broken at position 0");
  });
});

// =============================================================================
// Writes and locking
// =============================================================================

describe("writes", () => {
  it("rejects a record at the wrong position", () => {
    const [, second] = chainedNotes(2);
    if (second === undefined) throw new Error("fixture");

    expect(thrown(() => open().write(second))).toMatchObject({ code: "INVALID_POSITION" });
  });

  it("refuses writes once closed", () => {
    const log = open();
    const [first] = chainedNotes(1);
    if (first === undefined) throw new Error("fixture");
    log.close();

    expect(thrown(() => log.write(first))).toMatchObject({ code: "STORE_CLOSED" });
    expect(existsSync(filePath)).toBe(false);
  });

  it("releases the lock after each write", () => {
    const log = open();
    const [first] = chainedNotes(1);
    if (first === undefined) throw new Error("fixture");

    log.write(first);

    expect(existsSync(`${filePath}.lock`)).toBe(false);
  });

  it("reports contention while another writer holds the lock", () => {
    const log = open();
    const [first] = chainedNotes(1);
    if (first === undefined) throw new Error("fixture");
    writeFileSync(`${filePath}.lock`, "4242\n");

    expect(thrown(() => log.write(first))).toMatchObject({ code: "CONTENTION", position: 0 });
    expect(log.length).toBe(0);
    expect(existsSync(filePath)).toBe(false);
    expect(readFileSync(`${filePath}.lock`, "utf-8")).toBe("4242\n");
  });

  it("refuses to append after another writer grew the file", () => {
    const first = open();
    const second = open();
    const [a, b] = chainedNotes(2);
    if (a === undefined || b === undefined) throw new Error("fixture");
    first.write(a);
    const written = readFileSync(filePath, "utf-8");

    expect(thrown(() => second.write(a))).toMatchObject({ code: "STORAGE_FAILURE", position: 0 });
    expect(second.length).toBe(0);
    expect(readFileSync(filePath, "utf-8")).toBe(written);
    expect(existsSync(`${filePath}.lock`)).toBe(false);

    first.write(b);
    expect(open().length).toBe(2);
  });

  it("breaks a stale lock and writes", () => {
    const log = open({ staleLockMs: 1_000, nowMs: () => Date.now() + 60_000 });
    const [first] = chainedNotes(1);
    if (first === undefined) throw new Error("fixture");
    writeFileSync(`${filePath}.lock`, "4242\n");

    log.write(first);

    expect(log.length).toBe(1);
    expect(existsSync(`${filePath}.lock`)).toBe(false);
  });

  it("leaves no trace when the append fails, and closes if rollback fails", () => {
    const log = open();
    const [first] = chainedNotes(1);
    if (first === undefined) throw new Error("fixture");
    // A directory where the log file should be makes every append fail
    mkdirSync(filePath);

    expect(thrown(() => log.write(first))).toMatchObject({ code: "STORAGE_FAILURE", position: 0 });
    expect(log.length).toBe(0);
    expect(existsSync(`${filePath}.lock`)).toBe(false);

    // The rollback truncate also failed, so the log no longer trusts the file
    expect(thrown(() => log.write(first))).toMatchObject({ code: "STORE_CLOSED" });
  });
});
