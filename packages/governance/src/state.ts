/**
 * @covenant/governance: Projected state.
 *
 * Plain JSON records keyed by id, so a state can be snapshotted and
 * read back unchanged. Absent values are `null`, never `undefined`.
 */

import { z } from "zod";
import { ReviewOutcome } from "./events.js";

// =============================================================================
// Records
// =============================================================================

export const WorkspaceRecordSchema = z.object({
  workspaceId: z.string(),
  name: z.string(),
  parentWorkspaceId: z.string().nullable(),
  status: z.enum(["active", "archived"]),
  createdAt: z.string(),
  createdBy: z.string(),
  archivedAt: z.string().nullable(),
  archiveReason: z.string().nullable(),
});

export type WorkspaceRecord = Readonly<z.infer<typeof WorkspaceRecordSchema>>;

export const DelegationRecordSchema = z.object({
  delegationId: z.string(),
  workspaceId: z.string(),
  fromActor: z.string(),
  toActor: z.string(),
  ttlDays: z.number(),
  grantedAt: z.string(),
  /** Commit timestamp of the latest grant or renewal + ttlDays */
  expiresAt: z.string(),
  status: z.enum(["active", "revoked"]),
  renewals: z.number(),
  revokedAt: z.string().nullable(),
  revokeReason: z.string().nullable(),
});

export type DelegationRecord = Readonly<z.infer<typeof DelegationRecordSchema>>;

export const LawReviewSchema = z.object({
  outcome: ReviewOutcome,
  notes: z.string().nullable(),
  completedAt: z.string(),
  completedBy: z.string(),
  position: z.number(),
});

export type LawReview = Readonly<z.infer<typeof LawReviewSchema>>;

/**
 * - draft: created, not yet in force
 * - active: in force, reviewed at each checkpoint
 * - adjust: a review asked for changes; re-activation restarts the schedule
 * - sunset: a review decided to end the law; awaiting archival
 * - archived: terminal
 */
export const LawStatus = z.enum(["draft", "active", "adjust", "sunset", "archived"]);
export type LawStatus = z.infer<typeof LawStatus>;

export const LawRecordSchema = z.object({
  lawId: z.string(),
  workspaceId: z.string(),
  title: z.string(),
  checkpoints: z.array(z.number()),
  status: LawStatus,
  createdAt: z.string(),
  activatedAt: z.string().nullable(),
  /** Index into `checkpoints` of the next scheduled review */
  nextCheckpointIndex: z.number(),
  nextCheckpointAt: z.string().nullable(),
  reviews: z.array(LawReviewSchema),
  archivedAt: z.string().nullable(),
  archiveReason: z.string().nullable(),
});

export type LawRecord = Readonly<z.infer<typeof LawRecordSchema>>;

// =============================================================================
// State
// =============================================================================

export const GovernanceStateSchema = z.object({
  workspaces: z.record(WorkspaceRecordSchema),
  delegations: z.record(DelegationRecordSchema),
  laws: z.record(LawRecordSchema),
});

export interface GovernanceState {
  readonly workspaces: Readonly<Record<string, WorkspaceRecord>>;
  readonly delegations: Readonly<Record<string, DelegationRecord>>;
  readonly laws: Readonly<Record<string, LawRecord>>;
}

/**
 * The record stored under `id`. Members inherited from Object.prototype
 * (`constructor`, `__proto__`, ...) are never records.
 */
export function recordOf<T>(records: Readonly<Record<string, T>>, id: string): T | undefined {
  return Object.hasOwn(records, id) ? records[id] : undefined;
}

export function emptyGovernanceState(): GovernanceState {
  return { workspaces: {}, delegations: {}, laws: {} };
}

/**
 * Recognise a state read back from a snapshot.
 */
export function isGovernanceState(value: unknown): value is GovernanceState {
  return GovernanceStateSchema.safeParse(value).success;
}
