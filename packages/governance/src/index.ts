/**
 * @covenant/governance: Workspaces, delegations and laws on the event store.
 *
 * Provides:
 * - Event catalog with zod-validated payloads
 * - Safety policy and invariant validator
 * - Governance projection and read-side queries
 * - Freedom health: delegation concentration and law review status
 *
 * @packageDocumentation
 */

// Events
export type { GovernanceEvent, GovernanceEventType } from "./events.js";
export {
  GovernanceEventSchema,
  GOVERNANCE_EVENT_TYPES,
  ReviewOutcome,
  WorkspaceCreatedPayload,
  WorkspaceArchivedPayload,
  DelegationGrantedPayload,
  DelegationRenewedPayload,
  DelegationRevokedPayload,
  LawCreatedPayload,
  LawActivatedPayload,
  LawReviewCompletedPayload,
  LawArchivedPayload,
  decodeGovernanceEvent,
  isGovernanceEvent,
} from "./events.js";

// Policy
export type { SafetyPolicy } from "./policy.js";
export {
  SafetyPolicySchema,
  DEFAULT_SAFETY_POLICY,
  createSafetyPolicy,
  checkCheckpointSchedule,
} from "./policy.js";

// State
export type {
  GovernanceState,
  WorkspaceRecord,
  DelegationRecord,
  LawRecord,
  LawReview,
} from "./state.js";
export { LawStatus, GovernanceStateSchema, emptyGovernanceState, isGovernanceState, recordOf } from "./state.js";

// Projection & queries
export { governanceProjection, GOVERNANCE_PROJECTION, checkpointAt } from "./projection.js";
export {
  activeDelegations,
  inDegrees,
  hasDelegationPath,
  lawsDueForReview,
  isWorkspaceActive,
} from "./queries.js";

// Health
export type { RiskLevel, ConcentrationMetrics, LawReviewHealth, FreedomHealth } from "./health.js";
export { giniCoefficient, concentrationMetrics, freedomHealth } from "./health.js";

// Invariants & store
export { createGovernanceValidator } from "./invariants.js";
export type { GovernanceStore, GovernanceStoreOptions } from "./store.js";
export { createGovernanceStore } from "./store.js";
