/**
 * @covenant/event-store: Invariant validator contract.
 *
 * A validator is a pure function of (candidate, state, context).
 * It never mutates state, never performs I/O, and returns the same
 * verdict for the same inputs. The store runs validators inside the
 * append critical section, against the state at the current head.
 */

import type { CandidateEvent, DomainEvent } from "@covenant/types";

/**
 * Categories of invariant violation.
 *
 * - malformed: the candidate does not match the event schema
 * - unknown_type: the domain does not know this event type
 * - duplicate: the command was already committed
 * - conflict: the entity is not in a state that allows this event
 * - unknown_reference: references an entity or event that does not exist yet
 * - missing_evidence: a required justification is absent
 * - time_bound: violates a time limit (TTL, expiry)
 * - policy: violates a safety policy rule
 */
export type ViolationKind =
  | "malformed"
  | "unknown_type"
  | "duplicate"
  | "conflict"
  | "unknown_reference"
  | "missing_evidence"
  | "time_bound"
  | "policy";

export interface Violation {
  readonly kind: ViolationKind;
  readonly reason: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export type Verdict =
  | { readonly ok: true }
  | { readonly ok: false; readonly violation: Violation };

/**
 * What the validator may know beyond state: the timestamp and position
 * the candidate would receive if admitted.
 */
export interface ValidationContext {
  readonly now: string;
  readonly position: number;
}

export type Validator<TEvent extends DomainEvent, TState> = (
  candidate: CandidateEvent<TEvent>,
  state: TState,
  context: ValidationContext,
) => Verdict;

/**
 * Result of decoding an untyped candidate into the domain's event union.
 */
export type DecodeResult<TEvent extends DomainEvent> =
  | { readonly ok: true; readonly candidate: CandidateEvent<TEvent> }
  | { readonly ok: false; readonly violation: Violation };

export type Decoder<TEvent extends DomainEvent> = (
  candidate: CandidateEvent,
) => DecodeResult<TEvent>;

const OK: Verdict = { ok: true };

export function ok(): Verdict {
  return OK;
}

export function violation(
  kind: ViolationKind,
  reason: string,
  details?: Readonly<Record<string, unknown>>,
): Verdict {
  return {
    ok: false,
    violation: details !== undefined ? { kind, reason, details } : { kind, reason },
  };
}

/**
 * Run validators in order; the first violation wins.
 */
export function composeValidators<TEvent extends DomainEvent, TState>(
  ...validators: readonly Validator<TEvent, TState>[]
): Validator<TEvent, TState> {
  return (candidate, state, context) => {
    for (const validate of validators) {
      const verdict = validate(candidate, state, context);
      if (!verdict.ok) {
        return verdict;
      }
    }
    return OK;
  };
}
