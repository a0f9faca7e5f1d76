/**
 * Builders for governance candidates and a store on a manual clock.
 */

import type { CandidateEvent, EventMetadata } from "@covenant/types";
import { InMemoryEventLog, ManualClock, SequentialIdSource } from "@covenant/event-store";
import type { AppendOutcome, Violation } from "@covenant/event-store";
import type { GovernanceEvent } from "../src/events.js";
import type { GovernanceStore, GovernanceStoreOptions } from "../src/store.js";
import { createGovernanceStore } from "../src/store.js";

export const START = "2025-01-01T00:00:00.000Z";

export const SCHEDULE = [30, 90, 180, 365];

let commandCounter = 0;

function meta(overrides: Partial<EventMetadata> = {}): EventMetadata {
  commandCounter++;
  return { actor: "alice", commandId: `gov-${commandCounter}`, ...overrides };
}

export function candidate(
  type: string,
  payload: Record<string, unknown>,
  metadata: Partial<EventMetadata> = {},
): CandidateEvent {
  return { type, payload, metadata: meta(metadata) };
}

export const workspaceCreated = (workspaceId: string, extra: Record<string, unknown> = {}) =>
  candidate("workspace.created", { workspaceId, name: `Workspace ${workspaceId}`, ...extra });

export const workspaceArchived = (workspaceId: string, reason?: string) =>
  candidate("workspace.archived", reason === undefined ? { workspaceId } : { workspaceId, reason });

export const delegationGranted = (
  delegationId: string,
  fromActor: string,
  toActor: string,
  ttlDays = 30,
  workspaceId = "ws-1",
) => candidate("delegation.granted", { delegationId, workspaceId, fromActor, toActor, ttlDays });

export const delegationRenewed = (delegationId: string, ttlDays = 30) =>
  candidate("delegation.renewed", { delegationId, ttlDays });

export const delegationRevoked = (delegationId: string, reason?: string) =>
  candidate("delegation.revoked", reason === undefined ? { delegationId } : { delegationId, reason });

export const lawCreated = (lawId: string, checkpoints: number[] = SCHEDULE, workspaceId = "ws-1") =>
  candidate("law.created", { lawId, workspaceId, title: `Law ${lawId}`, checkpoints });

export const lawActivated = (lawId: string) => candidate("law.activated", { lawId });

export const lawReviewed = (lawId: string, outcome: string, notes?: string) =>
  candidate("law.review.completed", notes === undefined ? { lawId, outcome } : { lawId, outcome, notes });

export const lawArchived = (lawId: string, reason?: string) =>
  candidate("law.archived", reason === undefined ? { lawId } : { lawId, reason });

export interface GovernanceFixture {
  readonly store: GovernanceStore;
  readonly clock: ManualClock;
}

export function createFixture(overrides: Partial<GovernanceStoreOptions> = {}): GovernanceFixture {
  const clock = new ManualClock(START);
  const store = createGovernanceStore({
    log: new InMemoryEventLog<GovernanceEvent>(),
    clock,
    ids: new SequentialIdSource(),
    sleep: async () => {},
    ...overrides,
  });
  return { store, clock };
}

/** Propose each candidate in turn, failing on the first one not committed */
export async function commitAll(store: GovernanceStore, candidates: readonly CandidateEvent[]): Promise<void> {
  for (const c of candidates) {
    const outcome = await store.proposeEvent(c);
    if (outcome.status !== "committed") {
      throw new Error(`Expected ${c.type} to commit, got ${outcome.status}`);
    }
  }
}

/** The violation of a rejected outcome */
export function rejection(outcome: AppendOutcome<GovernanceEvent>): Violation {
  if (outcome.status !== "rejected") {
    throw new Error(`Expected rejection, got ${outcome.status}`);
  }
  return outcome.violation;
}
