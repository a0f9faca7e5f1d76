/**
 * @covenant/governance: Governance projection.
 *
 * Folds committed governance events into workspace, delegation and law
 * records. Derived times (expiry, activation, next checkpoint) come from
 * the committed event timestamps only, so replay reproduces them exactly.
 *
 * Events that reference a record the state does not hold leave the
 * state unchanged; the validator keeps such events out of the log.
 */

import type { CommittedEvent } from "@covenant/types";
import type { Projection } from "@covenant/event-store";
import { ProjectionError, addDays } from "@covenant/event-store";
import type { GovernanceEvent } from "./events.js";
import type { DelegationRecord, GovernanceState, LawRecord, WorkspaceRecord } from "./state.js";
import { emptyGovernanceState, isGovernanceState, recordOf } from "./state.js";

export const GOVERNANCE_PROJECTION = "governance";

/**
 * When the review at `index` falls due, or null once the schedule is spent.
 */
export function checkpointAt(
  activatedAt: string,
  checkpoints: readonly number[],
  index: number,
): string | null {
  const days = checkpoints[index];
  return days === undefined ? null : addDays(activatedAt, days);
}

// ─── Record updates ─────────────────────────────────────────────────

function withWorkspace(state: GovernanceState, record: WorkspaceRecord): GovernanceState {
  return { ...state, workspaces: { ...state.workspaces, [record.workspaceId]: record } };
}

function withDelegation(state: GovernanceState, record: DelegationRecord): GovernanceState {
  return { ...state, delegations: { ...state.delegations, [record.delegationId]: record } };
}

function withLaw(state: GovernanceState, record: LawRecord): GovernanceState {
  return { ...state, laws: { ...state.laws, [record.lawId]: record } };
}

// ─── Fold ───────────────────────────────────────────────────────────

function applyEvent(state: GovernanceState, event: CommittedEvent<GovernanceEvent>): GovernanceState {
  const at = event.timestamp;

  switch (event.type) {
    case "workspace.created": {
      const { workspaceId, name, parentWorkspaceId } = event.payload;
      return withWorkspace(state, {
        workspaceId,
        name,
        parentWorkspaceId: parentWorkspaceId ?? null,
        status: "active",
        createdAt: at,
        createdBy: event.metadata.actor,
        archivedAt: null,
        archiveReason: null,
      });
    }

    case "workspace.archived": {
      const workspace = recordOf(state.workspaces, event.payload.workspaceId);
      if (workspace === undefined) return state;
      return withWorkspace(state, {
        ...workspace,
        status: "archived",
        archivedAt: at,
        archiveReason: event.payload.reason ?? null,
      });
    }

    case "delegation.granted": {
      const { delegationId, workspaceId, fromActor, toActor, ttlDays } = event.payload;
      return withDelegation(state, {
        delegationId,
        workspaceId,
        fromActor,
        toActor,
        ttlDays,
        grantedAt: at,
        expiresAt: addDays(at, ttlDays),
        status: "active",
        renewals: 0,
        revokedAt: null,
        revokeReason: null,
      });
    }

    case "delegation.renewed": {
      const delegation = recordOf(state.delegations, event.payload.delegationId);
      if (delegation === undefined) return state;
      return withDelegation(state, {
        ...delegation,
        ttlDays: event.payload.ttlDays,
        expiresAt: addDays(at, event.payload.ttlDays),
        renewals: delegation.renewals + 1,
      });
    }

    case "delegation.revoked": {
      const delegation = recordOf(state.delegations, event.payload.delegationId);
      if (delegation === undefined) return state;
      return withDelegation(state, {
        ...delegation,
        status: "revoked",
        revokedAt: at,
        revokeReason: event.payload.reason ?? null,
      });
    }

    case "law.created": {
      const { lawId, workspaceId, title, checkpoints } = event.payload;
      return withLaw(state, {
        lawId,
        workspaceId,
        title,
        checkpoints: [...checkpoints],
        status: "draft",
        createdAt: at,
        activatedAt: null,
        nextCheckpointIndex: 0,
        nextCheckpointAt: null,
        reviews: [],
        archivedAt: null,
        archiveReason: null,
      });
    }

    case "law.activated": {
      const law = recordOf(state.laws, event.payload.lawId);
      if (law === undefined) return state;
      return withLaw(state, {
        ...law,
        status: "active",
        activatedAt: at,
        nextCheckpointIndex: 0,
        nextCheckpointAt: checkpointAt(at, law.checkpoints, 0),
      });
    }

    case "law.review.completed": {
      const law = recordOf(state.laws, event.payload.lawId);
      if (law === undefined) return state;
      const { outcome, notes } = event.payload;
      const reviews = [
        ...law.reviews,
        {
          outcome,
          notes: notes ?? null,
          completedAt: at,
          completedBy: event.metadata.actor,
          position: event.position,
        },
      ];

      if (outcome !== "continue") {
        return withLaw(state, { ...law, status: outcome, nextCheckpointAt: null, reviews });
      }

      const nextIndex = law.nextCheckpointIndex + 1;
      return withLaw(state, {
        ...law,
        nextCheckpointIndex: nextIndex,
        nextCheckpointAt:
          law.activatedAt === null ? null : checkpointAt(law.activatedAt, law.checkpoints, nextIndex),
        reviews,
      });
    }

    case "law.archived": {
      const law = recordOf(state.laws, event.payload.lawId);
      if (law === undefined) return state;
      return withLaw(state, {
        ...law,
        status: "archived",
        nextCheckpointAt: null,
        archivedAt: at,
        archiveReason: event.payload.reason ?? null,
      });
    }

    default:
      throw ProjectionError.unhandled(GOVERNANCE_PROJECTION, event);
  }
}

export const governanceProjection: Projection<GovernanceEvent, GovernanceState> = {
  name: GOVERNANCE_PROJECTION,
  initial: emptyGovernanceState,
  fold: applyEvent,
  isState: isGovernanceState,
};
