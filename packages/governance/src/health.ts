/**
 * @covenant/governance: Freedom health.
 *
 * Rates how concentrated delegated power is and how well laws are kept
 * under review, against the safety policy thresholds:
 *
 * - red: a halt threshold is reached
 * - yellow: a warn threshold is reached, or a law review is overdue
 * - green: otherwise
 */

import { addDays } from "@covenant/event-store";
import type { SafetyPolicy } from "./policy.js";
import { DEFAULT_SAFETY_POLICY } from "./policy.js";
import { inDegrees, lawsDueForReview } from "./queries.js";
import type { GovernanceState } from "./state.js";

export type RiskLevel = "green" | "yellow" | "red";

export interface ConcentrationMetrics {
  /** 0 when every delegate holds the same number of delegations, towards 1 as one holds them all */
  readonly giniCoefficient: number;
  readonly maxInDegree: number;
  readonly totalActiveDelegations: number;
  readonly uniqueDelegates: number;
}

export interface LawReviewHealth {
  readonly totalActiveLaws: number;
  readonly overdueReviews: number;
  readonly upcomingReviews7d: number;
  readonly upcomingReviews30d: number;
}

export interface FreedomHealth {
  readonly riskLevel: RiskLevel;
  readonly concentration: ConcentrationMetrics;
  readonly lawReviews: LawReviewHealth;
  /** Every threshold reached, halts first; empty when green */
  readonly reasons: readonly string[];
  readonly computedAt: string;
}

/**
 * Gini coefficient of a distribution, clamped to [0, 1].
 */
export function giniCoefficient(values: readonly number[]): number {
  const total = values.reduce((sum, v) => sum + v, 0);
  if (values.length === 0 || total === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  const weighted = sorted.reduce((sum, v, i) => sum + (i + 1) * v, 0);
  const gini = (2 * weighted) / (n * total) - (n + 1) / n;
  return Math.max(0, Math.min(1, gini));
}

export function concentrationMetrics(degrees: Readonly<Record<string, number>>): ConcentrationMetrics {
  const values = Object.values(degrees);
  return {
    giniCoefficient: giniCoefficient(values),
    maxInDegree: values.reduce((max, v) => Math.max(max, v), 0),
    totalActiveDelegations: values.reduce((sum, v) => sum + v, 0),
    uniqueDelegates: values.filter((v) => v > 0).length,
  };
}

function lawReviewHealth(state: GovernanceState, now: string): LawReviewHealth {
  const nowMs = Date.parse(now);
  const within = (days: number) => {
    const limit = Date.parse(addDays(now, days));
    return (at: number) => at > nowMs && at <= limit;
  };
  const in7d = within(7);
  const in30d = within(30);

  const active = Object.values(state.laws).filter((law) => law.status === "active");
  const next = active.flatMap((law) => (law.nextCheckpointAt === null ? [] : [Date.parse(law.nextCheckpointAt)]));

  return {
    totalActiveLaws: active.length,
    overdueReviews: lawsDueForReview(state, now).length,
    upcomingReviews7d: next.filter(in7d).length,
    upcomingReviews30d: next.filter(in30d).length,
  };
}

/**
 * Health of the governance state at `now`.
 */
export function freedomHealth(
  state: GovernanceState,
  now: string,
  policy: SafetyPolicy = DEFAULT_SAFETY_POLICY,
): FreedomHealth {
  const concentration = concentrationMetrics(inDegrees(state, now));
  const lawReviews = lawReviewHealth(state, now);
  const gini = concentration.giniCoefficient.toFixed(3);

  const halts: string[] = [];
  if (concentration.giniCoefficient >= policy.delegationGiniHalt) {
    halts.push(`Delegation Gini ${gini} >= halt threshold ${policy.delegationGiniHalt}`);
  }
  if (concentration.maxInDegree >= policy.delegationInDegreeHalt) {
    halts.push(`Max delegation in-degree ${concentration.maxInDegree} >= halt threshold ${policy.delegationInDegreeHalt}`);
  }

  const warnings: string[] = [];
  if (concentration.giniCoefficient >= policy.delegationGiniWarn) {
    warnings.push(`Delegation Gini ${gini} >= warn threshold ${policy.delegationGiniWarn}`);
  }
  if (concentration.maxInDegree >= policy.delegationInDegreeWarn) {
    warnings.push(`Max delegation in-degree ${concentration.maxInDegree} >= warn threshold ${policy.delegationInDegreeWarn}`);
  }
  if (lawReviews.overdueReviews > 0) {
    warnings.push(`Law reviews overdue: ${lawReviews.overdueReviews}`);
  }

  const riskLevel: RiskLevel = halts.length > 0 ? "red" : warnings.length > 0 ? "yellow" : "green";
  return {
    riskLevel,
    concentration,
    lawReviews,
    reasons: [...halts, ...warnings],
    computedAt: now,
  };
}
