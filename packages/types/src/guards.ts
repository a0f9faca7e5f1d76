/**
 * Runtime Type Guards
 *
 * Narrowing functions for the event envelope.
 * These enable safe runtime validation at system boundaries
 * (caller input, lines read back from disk).
 */

import type {
  CandidateEvent,
  CommittedEvent,
  DomainEvent,
  EventMetadata,
} from "./event.js";

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isNonEmptyString(v.actor) &&
    isNonEmptyString(v.commandId) &&
    isOptionalString(v.causationId) &&
    isOptionalString(v.correlationId)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isNonEmptyString(v.type) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}

export function isCandidateEvent(value: unknown): value is CandidateEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isDomainEvent(value) && isEventMetadata(v.metadata);
}

export function isCommittedEvent(value: unknown): value is CommittedEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isCandidateEvent(value) &&
    typeof v.position === "number" &&
    Number.isInteger(v.position) &&
    v.position >= 0 &&
    isNonEmptyString(v.id) &&
    isNonEmptyString(v.timestamp) &&
    isNonEmptyString(v.hash) &&
    isNonEmptyString(v.previousHash)
  );
}
