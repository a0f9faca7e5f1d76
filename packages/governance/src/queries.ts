/**
 * @covenant/governance: Read-side queries over GovernanceState.
 *
 * All queries are pure functions of (state, now). A delegation counts as
 * active while it is not revoked and `now` is strictly before its expiry.
 */

import type { DelegationRecord, GovernanceState, LawRecord } from "./state.js";
import { recordOf } from "./state.js";

function isLive(delegation: DelegationRecord, nowMs: number): boolean {
  return delegation.status === "active" && Date.parse(delegation.expiresAt) > nowMs;
}

/**
 * Delegations in force at `now`, in grant order.
 */
export function activeDelegations(state: GovernanceState, now: string): readonly DelegationRecord[] {
  const nowMs = Date.parse(now);
  return Object.values(state.delegations).filter((d) => isLive(d, nowMs));
}

/**
 * Number of active delegations each actor receives at `now`.
 * Actors with none are absent.
 */
export function inDegrees(state: GovernanceState, now: string): Readonly<Record<string, number>> {
  const degrees = new Map<string, number>();
  for (const { toActor } of activeDelegations(state, now)) {
    degrees.set(toActor, (degrees.get(toActor) ?? 0) + 1);
  }
  return Object.fromEntries(degrees);
}

/**
 * Whether `to` can be reached from `from` along active delegation edges.
 */
export function hasDelegationPath(
  state: GovernanceState,
  from: string,
  to: string,
  now: string,
): boolean {
  const adjacency = new Map<string, string[]>();
  for (const { fromActor, toActor } of activeDelegations(state, now)) {
    const targets = adjacency.get(fromActor);
    if (targets === undefined) {
      adjacency.set(fromActor, [toActor]);
    } else {
      targets.push(toActor);
    }
  }

  const visited = new Set<string>();
  const stack = [from];
  while (stack.length > 0) {
    const actor = stack.pop();
    if (actor === undefined || visited.has(actor)) continue;
    if (actor === to) return true;
    visited.add(actor);
    stack.push(...(adjacency.get(actor) ?? []));
  }
  return false;
}

/**
 * Active laws whose next checkpoint is strictly before `now`.
 */
export function lawsDueForReview(state: GovernanceState, now: string): readonly LawRecord[] {
  const nowMs = Date.parse(now);
  return Object.values(state.laws).filter(
    (law) =>
      law.status === "active" &&
      law.nextCheckpointAt !== null &&
      Date.parse(law.nextCheckpointAt) < nowMs,
  );
}

/**
 * Whether a workspace exists and still accepts new decisions.
 */
export function isWorkspaceActive(state: GovernanceState, workspaceId: string): boolean {
  return recordOf(state.workspaces, workspaceId)?.status === "active";
}
