/**
 * @covenant/governance: Safety policy.
 *
 * Limits every governance decision is checked against. The policy is
 * configuration, not state: changing it never rewrites history, it only
 * changes which future events are admitted.
 */

import { z } from "zod";

export const SafetyPolicySchema = z.object({
  /** Longest delegation a single grant or renewal may request */
  maxDelegationTtlDays: z.number().int().positive(),
  /** Review points (days after activation) every law schedule must cover */
  minCheckpointSchedule: z.array(z.number().int().positive()).min(1),
  /** How far a law's checkpoint may sit from a required one and still cover it */
  checkpointToleranceDays: z.number().int().nonnegative(),
  /** Gini coefficient of delegation in-degrees that raises a warning */
  delegationGiniWarn: z.number().min(0).max(1),
  /** Gini coefficient of delegation in-degrees that halts the system */
  delegationGiniHalt: z.number().min(0).max(1),
  /** Active delegations held by one actor that raise a warning */
  delegationInDegreeWarn: z.number().int().positive(),
  /** Active delegations one actor may never reach; grants that would are rejected */
  delegationInDegreeHalt: z.number().int().positive(),
});

export type SafetyPolicy = Readonly<z.infer<typeof SafetyPolicySchema>>;

export const DEFAULT_SAFETY_POLICY: SafetyPolicy = Object.freeze({
  maxDelegationTtlDays: 365,
  minCheckpointSchedule: [30, 90, 180, 365],
  checkpointToleranceDays: 5,
  delegationGiniWarn: 0.55,
  delegationGiniHalt: 0.7,
  delegationInDegreeWarn: 500,
  delegationInDegreeHalt: 2000,
});

/**
 * Build a policy from defaults plus overrides.
 *
 * @throws {z.ZodError} if the result is not a valid policy
 */
export function createSafetyPolicy(overrides: Partial<SafetyPolicy> = {}): SafetyPolicy {
  return Object.freeze(SafetyPolicySchema.parse({ ...DEFAULT_SAFETY_POLICY, ...overrides }));
}

/**
 * Check a law's checkpoint schedule: non-empty, positive, strictly
 * ascending, and within tolerance of every required checkpoint.
 *
 * @returns a reason when the schedule is rejected, otherwise undefined
 */
export function checkCheckpointSchedule(
  checkpoints: readonly number[],
  policy: SafetyPolicy,
): string | undefined {
  if (checkpoints.length === 0) {
    return "Checkpoint schedule must not be empty";
  }
  for (const [i, days] of checkpoints.entries()) {
    if (days <= 0) {
      return `Checkpoint ${days} must be a positive number of days`;
    }
    const previous = checkpoints[i - 1];
    if (previous !== undefined && days <= previous) {
      return `Checkpoints must be strictly ascending (${previous} then ${days})`;
    }
  }
  const tolerance = policy.checkpointToleranceDays;
  for (const required of policy.minCheckpointSchedule) {
    if (!checkpoints.some((days) => Math.abs(days - required) <= tolerance)) {
      return `No checkpoint within ${tolerance} days of required checkpoint ${required}`;
    }
  }
  return undefined;
}
