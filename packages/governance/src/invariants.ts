/**
 * @covenant/governance: Invariant validator.
 *
 * Checks each decoded governance candidate against the head state and
 * the safety policy. Checks run in a fixed order per event type:
 * references, then lifecycle, then evidence, then policy and time limits.
 */

import type { CandidateEvent } from "@covenant/types";
import type { ValidationContext, Validator, Verdict } from "@covenant/event-store";
import { ok, violation } from "@covenant/event-store";
import type { GovernanceEvent } from "./events.js";
import type { SafetyPolicy } from "./policy.js";
import { DEFAULT_SAFETY_POLICY, checkCheckpointSchedule } from "./policy.js";
import { hasDelegationPath, inDegrees } from "./queries.js";
import type { GovernanceState } from "./state.js";
import { recordOf } from "./state.js";

type Candidate<T extends GovernanceEvent["type"]> = CandidateEvent<Extract<GovernanceEvent, { type: T }>>;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

// =============================================================================
// Workspaces
// =============================================================================

/**
 * An existing, non-archived workspace, or the verdict explaining why not.
 */
function requireOpenWorkspace(state: GovernanceState, workspaceId: string): Verdict {
  const workspace = recordOf(state.workspaces, workspaceId);
  if (workspace === undefined) {
    return violation("unknown_reference", `Workspace ${workspaceId} does not exist`, { workspaceId });
  }
  if (workspace.status === "archived") {
    return violation("conflict", `Workspace ${workspaceId} is archived`, { workspaceId });
  }
  return ok();
}

function checkWorkspaceCreated(candidate: Candidate<"workspace.created">, state: GovernanceState): Verdict {
  const { workspaceId, parentWorkspaceId } = candidate.payload;
  if (Object.hasOwn(state.workspaces, workspaceId)) {
    return violation("conflict", `Workspace ${workspaceId} already exists`, { workspaceId });
  }
  if (parentWorkspaceId !== undefined) {
    return requireOpenWorkspace(state, parentWorkspaceId);
  }
  return ok();
}

function checkWorkspaceArchived(candidate: Candidate<"workspace.archived">, state: GovernanceState): Verdict {
  const { workspaceId, reason } = candidate.payload;
  const workspace = recordOf(state.workspaces, workspaceId);
  if (workspace === undefined) {
    return violation("unknown_reference", `Workspace ${workspaceId} does not exist`, { workspaceId });
  }
  if (workspace.status === "archived") {
    return violation("conflict", `Workspace ${workspaceId} is already archived`, { workspaceId });
  }
  if (isBlank(reason)) {
    return violation("missing_evidence", "Archiving a workspace requires a reason", { workspaceId });
  }
  return ok();
}

// =============================================================================
// Delegations
// =============================================================================

function checkTtl(ttlDays: number, policy: SafetyPolicy): Verdict {
  if (ttlDays > policy.maxDelegationTtlDays) {
    return violation(
      "time_bound",
      `TTL of ${ttlDays} days exceeds the maximum of ${policy.maxDelegationTtlDays}`,
      { ttlDays, maxDelegationTtlDays: policy.maxDelegationTtlDays },
    );
  }
  return ok();
}

function checkDelegationGranted(
  candidate: Candidate<"delegation.granted">,
  state: GovernanceState,
  context: ValidationContext,
  policy: SafetyPolicy,
): Verdict {
  const { delegationId, workspaceId, fromActor, toActor, ttlDays } = candidate.payload;
  if (Object.hasOwn(state.delegations, delegationId)) {
    return violation("conflict", `Delegation ${delegationId} already exists`, { delegationId });
  }

  const workspace = requireOpenWorkspace(state, workspaceId);
  if (!workspace.ok) return workspace;

  if (fromActor === toActor) {
    return violation("policy", `Actor ${fromActor} cannot delegate to itself`, { fromActor });
  }

  const ttl = checkTtl(ttlDays, policy);
  if (!ttl.ok) return ttl;

  // The new edge from → to closes a cycle iff `from` is already reachable from `to`.
  if (hasDelegationPath(state, toActor, fromActor, context.now)) {
    return violation("policy", `Delegating from ${fromActor} to ${toActor} would create a cycle`, {
      fromActor,
      toActor,
    });
  }

  const held = (recordOf(inDegrees(state, context.now), toActor) ?? 0) + 1;
  if (held >= policy.delegationInDegreeHalt) {
    return violation(
      "policy",
      `Actor ${toActor} would hold ${held} active delegations, at or above the limit of ${policy.delegationInDegreeHalt}`,
      { toActor, inDegree: held, delegationInDegreeHalt: policy.delegationInDegreeHalt },
    );
  }
  return ok();
}

function checkDelegationRenewed(
  candidate: Candidate<"delegation.renewed">,
  state: GovernanceState,
  context: ValidationContext,
  policy: SafetyPolicy,
): Verdict {
  const { delegationId, ttlDays } = candidate.payload;
  const delegation = recordOf(state.delegations, delegationId);
  if (delegation === undefined) {
    return violation("unknown_reference", `Delegation ${delegationId} does not exist`, { delegationId });
  }
  if (delegation.status === "revoked") {
    return violation("conflict", `Delegation ${delegationId} is revoked`, { delegationId });
  }

  const workspace = requireOpenWorkspace(state, delegation.workspaceId);
  if (!workspace.ok) return workspace;

  if (Date.parse(delegation.expiresAt) <= Date.parse(context.now)) {
    return violation("time_bound", `Delegation ${delegationId} expired at ${delegation.expiresAt}`, {
      delegationId,
      expiresAt: delegation.expiresAt,
    });
  }
  return checkTtl(ttlDays, policy);
}

function checkDelegationRevoked(
  candidate: Candidate<"delegation.revoked">,
  state: GovernanceState,
): Verdict {
  const { delegationId, reason } = candidate.payload;
  const delegation = recordOf(state.delegations, delegationId);
  if (delegation === undefined) {
    return violation("unknown_reference", `Delegation ${delegationId} does not exist`, { delegationId });
  }
  if (delegation.status === "revoked") {
    return violation("conflict", `Delegation ${delegationId} is already revoked`, { delegationId });
  }
  if (isBlank(reason)) {
    return violation("missing_evidence", "Revoking a delegation requires a reason", { delegationId });
  }
  return ok();
}

// =============================================================================
// Laws
// =============================================================================

function checkLawCreated(
  candidate: Candidate<"law.created">,
  state: GovernanceState,
  policy: SafetyPolicy,
): Verdict {
  const { lawId, workspaceId, checkpoints } = candidate.payload;
  if (Object.hasOwn(state.laws, lawId)) {
    return violation("conflict", `Law ${lawId} already exists`, { lawId });
  }

  const workspace = requireOpenWorkspace(state, workspaceId);
  if (!workspace.ok) return workspace;

  const problem = checkCheckpointSchedule(checkpoints, policy);
  if (problem !== undefined) {
    return violation("policy", problem, { lawId, checkpoints: [...checkpoints] });
  }
  return ok();
}

function checkLawActivated(candidate: Candidate<"law.activated">, state: GovernanceState): Verdict {
  const { lawId } = candidate.payload;
  const law = recordOf(state.laws, lawId);
  if (law === undefined) {
    return violation("unknown_reference", `Law ${lawId} does not exist`, { lawId });
  }
  if (law.status !== "draft" && law.status !== "adjust") {
    return violation("conflict", `Law ${lawId} cannot be activated from status ${law.status}`, {
      lawId,
      status: law.status,
    });
  }
  return requireOpenWorkspace(state, law.workspaceId);
}

function checkLawReviewCompleted(
  candidate: Candidate<"law.review.completed">,
  state: GovernanceState,
): Verdict {
  const { lawId, outcome, notes } = candidate.payload;
  const law = recordOf(state.laws, lawId);
  if (law === undefined) {
    return violation("unknown_reference", `Law ${lawId} does not exist`, { lawId });
  }
  if (law.status !== "active") {
    return violation("conflict", `Law ${lawId} cannot be reviewed from status ${law.status}`, {
      lawId,
      status: law.status,
    });
  }
  if (outcome !== "continue" && isBlank(notes)) {
    return violation("missing_evidence", `A review with outcome ${outcome} requires notes`, {
      lawId,
      outcome,
    });
  }
  return ok();
}

function checkLawArchived(candidate: Candidate<"law.archived">, state: GovernanceState): Verdict {
  const { lawId, reason } = candidate.payload;
  const law = recordOf(state.laws, lawId);
  if (law === undefined) {
    return violation("unknown_reference", `Law ${lawId} does not exist`, { lawId });
  }
  if (law.status === "archived") {
    return violation("conflict", `Law ${lawId} is already archived`, { lawId });
  }
  if (isBlank(reason)) {
    return violation("missing_evidence", "Archiving a law requires a reason", { lawId });
  }
  return ok();
}

// =============================================================================
// Validator
// =============================================================================

/**
 * Build the governance validator for a safety policy.
 */
export function createGovernanceValidator(
  policy: SafetyPolicy = DEFAULT_SAFETY_POLICY,
): Validator<GovernanceEvent, GovernanceState> {
  return (candidate, state, context) => {
    switch (candidate.type) {
      case "workspace.created":
        return checkWorkspaceCreated(candidate, state);
      case "workspace.archived":
        return checkWorkspaceArchived(candidate, state);
      case "delegation.granted":
        return checkDelegationGranted(candidate, state, context, policy);
      case "delegation.renewed":
        return checkDelegationRenewed(candidate, state, context, policy);
      case "delegation.revoked":
        return checkDelegationRevoked(candidate, state);
      case "law.created":
        return checkLawCreated(candidate, state, policy);
      case "law.activated":
        return checkLawActivated(candidate, state);
      case "law.review.completed":
        return checkLawReviewCompleted(candidate, state);
      case "law.archived":
        return checkLawArchived(candidate, state);
    }
  };
}
