/**
 * Shared fixtures: a small "notes" domain used to exercise the store
 * without pulling in a real domain package.
 */

import type { CandidateEvent, CommittedEvent, EventMetadata } from "@covenant/types";
import { EventStore } from "../src/event-store.js";
import type { EventStoreOptions } from "../src/event-store.js";
import { ManualClock } from "../src/clock.js";
import { SequentialIdSource } from "../src/ids.js";
import { computeEventHash, GENESIS_HASH } from "../src/hash-chain.js";
import { InMemoryEventLog } from "../src/in-memory-log.js";
import type { Decoder, Validator } from "../src/invariants.js";
import { ok, violation } from "../src/invariants.js";
import type { Projection } from "../src/projection.js";
import type { EventLog } from "../src/types.js";
import { EventStoreError, ProjectionError } from "../src/types.js";

// =============================================================================
// Domain
// =============================================================================

export type NoteEvent =
  | { readonly type: "note.added"; readonly payload: { readonly noteId: string; readonly text: string } }
  | { readonly type: "note.removed"; readonly payload: { readonly noteId: string } };

export interface NotesState {
  readonly notes: Readonly<Record<string, string>>;
  readonly added: number;
}

export const decodeNote: Decoder<NoteEvent> = (candidate) => {
  const { payload, metadata } = candidate;
  const noteId = payload.noteId;
  if (typeof noteId !== "string" || noteId.length === 0) {
    return { ok: false, violation: { kind: "malformed", reason: "noteId must be a non-empty string" } };
  }

  switch (candidate.type) {
    case "note.added": {
      const text = payload.text;
      if (typeof text !== "string") {
        return { ok: false, violation: { kind: "malformed", reason: "text must be a string" } };
      }
      return { ok: true, candidate: { type: "note.added", payload: { noteId, text }, metadata } };
    }
    case "note.removed":
      return { ok: true, candidate: { type: "note.removed", payload: { noteId }, metadata } };
    default:
      return {
        ok: false,
        violation: { kind: "unknown_type", reason: `Unknown event type ${candidate.type}` },
      };
  }
};

export const validateNote: Validator<NoteEvent, NotesState> = (candidate, state) => {
  const exists = candidate.payload.noteId in state.notes;
  if (candidate.type === "note.added" && exists) {
    return violation("conflict", `Note ${candidate.payload.noteId} already exists`);
  }
  if (candidate.type === "note.removed" && !exists) {
    return violation("unknown_reference", `Note ${candidate.payload.noteId} does not exist`);
  }
  return ok();
};

/** Recognises stored records as NoteEvents */
export function isNoteEvent(event: CommittedEvent): event is CommittedEvent<NoteEvent> {
  const { noteId, text } = event.payload;
  if (typeof noteId !== "string") return false;
  return event.type === "note.removed" || (event.type === "note.added" && typeof text === "string");
}

/** Run `fn` and return what it throws */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error("Expected function to throw");
}

function isNotesState(value: unknown): value is NotesState {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.added === "number" && v.notes !== null && typeof v.notes === "object";
}

export const notesProjection: Projection<NoteEvent, NotesState> = {
  name: "notes",
  initial: () => ({ notes: {}, added: 0 }),
  fold: (state, event) => {
    switch (event.type) {
      case "note.added":
        return {
          notes: { ...state.notes, [event.payload.noteId]: event.payload.text },
          added: state.added + 1,
        };
      case "note.removed": {
        const removedId = event.payload.noteId;
        const notes = Object.fromEntries(
          Object.entries(state.notes).filter(([noteId]) => noteId !== removedId),
        );
        return { notes, added: state.added };
      }
      default:
        throw ProjectionError.unhandled("notes", event);
    }
  },
  isState: isNotesState,
};

/** Counts events; independent of the store's own projection. */
export const countProjection: Projection<NoteEvent, number> = {
  name: "count",
  initial: () => 0,
  fold: (count) => count + 1,
};

// =============================================================================
// Builders
// =============================================================================

let commandCounter = 0;

export function meta(overrides: Partial<EventMetadata> = {}): EventMetadata {
  commandCounter++;
  return { actor: "alice", commandId: `cmd-${commandCounter}`, ...overrides };
}

export function added(
  noteId: string,
  text = `text of ${noteId}`,
  metadata: Partial<EventMetadata> = {},
): CandidateEvent {
  return { type: "note.added", payload: { noteId, text }, metadata: meta(metadata) };
}

export function removed(noteId: string, metadata: Partial<EventMetadata> = {}): CandidateEvent {
  return { type: "note.removed", payload: { noteId }, metadata: meta(metadata) };
}

export const START = "2025-01-01T00:00:00.000Z";

export function createNotesStore(
  overrides: Partial<EventStoreOptions<NoteEvent, NotesState>> = {},
): EventStore<NoteEvent, NotesState> {
  return new EventStore<NoteEvent, NotesState>({
    log: new InMemoryEventLog<NoteEvent>(),
    projection: notesProjection,
    decode: decodeNote,
    validate: validateNote,
    clock: new ManualClock(START),
    ids: new SequentialIdSource(),
    sleep: async () => {},
    ...overrides,
  });
}

export async function commitAll(
  store: EventStore<NoteEvent, NotesState>,
  candidates: readonly CandidateEvent[],
): Promise<CommittedEvent<NoteEvent>[]> {
  const committed: CommittedEvent<NoteEvent>[] = [];
  for (const candidate of candidates) {
    const outcome = await store.proposeEvent(candidate);
    if (outcome.status !== "committed") {
      throw new Error(`Expected commit, got ${outcome.status}`);
    }
    committed.push(outcome.event);
  }
  return committed;
}

/**
 * A hash-chained run of `note.added` records, as the store would commit them.
 */
export function chainedNotes(count: number, start = 0, previous = GENESIS_HASH): CommittedEvent<NoteEvent>[] {
  const records: CommittedEvent<NoteEvent>[] = [];
  let previousHash = previous;
  for (let position = start; position < start + count; position++) {
    const content = {
      type: "note.added" as const,
      payload: { noteId: `n${position}`, text: `note ${position}` },
      metadata: { actor: "alice", commandId: `seed-${position}` },
      position,
      id: `evt-${position}`,
      timestamp: new Date(Date.parse(START) + position * 1000).toISOString(),
    };
    const hash = computeEventHash(content, previousHash);
    records.push({ ...content, hash, previousHash });
    previousHash = hash;
  }
  return records;
}

// =============================================================================
// Fault injection
// =============================================================================

/**
 * Wraps a log and fails the next `failures` writes with `error`
 * before delegating.
 */
export class FlakyLog implements EventLog<NoteEvent> {
  writeAttempts = 0;

  constructor(
    private readonly _inner: EventLog<NoteEvent>,
    private _failures: number,
    private readonly _error: () => unknown = () =>
      new EventStoreError("CONTENTION", "simulated contention"),
  ) {}

  get length(): number {
    return this._inner.length;
  }

  at(position: number): CommittedEvent<NoteEvent> | undefined {
    return this._inner.at(position);
  }

  slice(from: number, to: number): readonly CommittedEvent<NoteEvent>[] {
    return this._inner.slice(from, to);
  }

  write(record: CommittedEvent<NoteEvent>): void {
    this.writeAttempts++;
    if (this._failures > 0) {
      this._failures--;
      throw this._error();
    }
    this._inner.write(record);
  }

  close(): void {
    this._inner.close();
  }
}
