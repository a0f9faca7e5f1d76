/**
 * @covenant/types: Shared event envelope types.
 *
 * Used across all Covenant packages:
 * - Candidate events proposed by callers
 * - Committed events read back from the log
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type {
  DomainEvent,
  EventMetadata,
  CandidateEvent,
  CommittedEvent,
} from "./event.js";

export {
  isEventMetadata,
  isDomainEvent,
  isCandidateEvent,
  isCommittedEvent,
} from "./guards.js";
