/**
 * @covenant/governance: Event catalog.
 *
 * Every governance event is `<entity>.<action>` with a zod-validated
 * payload. Payload types are inferred from the schemas so the decoder
 * and the compile-time union cannot drift apart.
 */

import { z } from "zod";
import type { CandidateEvent, CommittedEvent } from "@covenant/types";
import type { Decoder } from "@covenant/event-store";

// =============================================================================
// Payload schemas
// =============================================================================

const Id = z.string().min(1);

export const WorkspaceCreatedPayload = z.object({
  workspaceId: Id,
  name: z.string().min(1),
  parentWorkspaceId: Id.optional(),
});

export const WorkspaceArchivedPayload = z.object({
  workspaceId: Id,
  reason: z.string().optional(),
});

export const DelegationGrantedPayload = z.object({
  delegationId: Id,
  workspaceId: Id,
  fromActor: Id,
  toActor: Id,
  ttlDays: z.number().int().positive(),
});

export const DelegationRenewedPayload = z.object({
  delegationId: Id,
  ttlDays: z.number().int().positive(),
});

export const DelegationRevokedPayload = z.object({
  delegationId: Id,
  reason: z.string().optional(),
});

export const LawCreatedPayload = z.object({
  lawId: Id,
  workspaceId: Id,
  title: z.string().min(1),
  /** Review checkpoints, in days after activation */
  checkpoints: z.array(z.number().int()),
});

export const LawActivatedPayload = z.object({
  lawId: Id,
});

export const ReviewOutcome = z.enum(["continue", "adjust", "sunset"]);
export type ReviewOutcome = z.infer<typeof ReviewOutcome>;

export const LawReviewCompletedPayload = z.object({
  lawId: Id,
  outcome: ReviewOutcome,
  notes: z.string().optional(),
});

export const LawArchivedPayload = z.object({
  lawId: Id,
  reason: z.string().optional(),
});

// =============================================================================
// Event union
// =============================================================================

export const GovernanceEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("workspace.created"), payload: WorkspaceCreatedPayload }),
  z.object({ type: z.literal("workspace.archived"), payload: WorkspaceArchivedPayload }),
  z.object({ type: z.literal("delegation.granted"), payload: DelegationGrantedPayload }),
  z.object({ type: z.literal("delegation.renewed"), payload: DelegationRenewedPayload }),
  z.object({ type: z.literal("delegation.revoked"), payload: DelegationRevokedPayload }),
  z.object({ type: z.literal("law.created"), payload: LawCreatedPayload }),
  z.object({ type: z.literal("law.activated"), payload: LawActivatedPayload }),
  z.object({ type: z.literal("law.review.completed"), payload: LawReviewCompletedPayload }),
  z.object({ type: z.literal("law.archived"), payload: LawArchivedPayload }),
]);

export type GovernanceEvent = z.infer<typeof GovernanceEventSchema>;
export type GovernanceEventType = GovernanceEvent["type"];

export const GOVERNANCE_EVENT_TYPES: ReadonlySet<string> = new Set<GovernanceEventType>([
  "workspace.created",
  "workspace.archived",
  "delegation.granted",
  "delegation.renewed",
  "delegation.revoked",
  "law.created",
  "law.activated",
  "law.review.completed",
  "law.archived",
]);

// =============================================================================
// Decoding
// =============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse an untyped candidate into a GovernanceEvent.
 *
 * Unknown types are rejected as `unknown_type`; payloads that fail
 * their schema as `malformed`. Unrecognised payload members are dropped.
 */
export const decodeGovernanceEvent: Decoder<GovernanceEvent> = (candidate) => {
  if (!GOVERNANCE_EVENT_TYPES.has(candidate.type)) {
    return {
      ok: false,
      violation: {
        kind: "unknown_type",
        reason: `Unknown governance event type: ${candidate.type}`,
        details: { type: candidate.type },
      },
    };
  }

  const parsed = GovernanceEventSchema.safeParse({
    type: candidate.type,
    payload: candidate.payload,
  });
  if (!parsed.success) {
    return {
      ok: false,
      violation: {
        kind: "malformed",
        reason: `Invalid ${candidate.type} payload: ${describeIssues(parsed.error)}`,
        details: { type: candidate.type },
      },
    };
  }

  const decoded: CandidateEvent<GovernanceEvent> = { ...parsed.data, metadata: candidate.metadata };
  return { ok: true, candidate: decoded };
};

/**
 * Recognise a stored record as a GovernanceEvent (used when loading a log).
 */
export function isGovernanceEvent(event: CommittedEvent): event is CommittedEvent<GovernanceEvent> {
  return GovernanceEventSchema.safeParse({ type: event.type, payload: event.payload }).success;
}
