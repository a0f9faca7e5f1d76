/**
 * @covenant/event-store: Retry with exponential backoff.
 *
 * Wraps a single storage attempt and retries it while it fails with
 * transient contention. Fatal errors are returned on the first failure.
 *
 * Backoff formula: min(baseDelayMs * multiplier^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs). Retrying stops after maxAttempts
 * attempts, or earlier when the next sleep would push the total time
 * spent sleeping past maxTotalDelayMs.
 */

import { EventStoreError } from "./types.js";

/**
 * Configuration for retry behavior.
 */
export interface RetryPolicy {
  /** Maximum number of attempts (including the first try). Default: 5 */
  readonly maxAttempts: number;
  /** Delay in ms before the first retry. Default: 10 */
  readonly baseDelayMs: number;
  /** Factor applied to the delay after each retry. Default: 2 */
  readonly multiplier: number;
  /** Cap on a single delay. Default: 250 */
  readonly maxDelayMs: number;
  /** Cap on the sum of all delays. Default: 1000 */
  readonly maxTotalDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 0 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 10,
  multiplier: 2,
  maxDelayMs: 250,
  maxTotalDelayMs: 1000,
  jitterMs: 0,
};

/**
 * Outcome of a retried operation.
 *
 * `exhausted` and `fatal` are kept apart: the first may succeed if the
 * caller tries again later, the second will not.
 */
export type RetryResult<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | {
      readonly ok: false;
      readonly reason: "exhausted";
      readonly attempts: number;
      readonly lastError: unknown;
    }
  | {
      readonly ok: false;
      readonly reason: "fatal";
      readonly attempts: number;
      readonly error: unknown;
    };

export interface RetryHooks {
  /** Which errors are worth retrying. Default: isTransientStorageError */
  readonly isTransient?: (err: unknown) => boolean;
  /** Sleep function (injectable for testing) */
  readonly sleep?: (ms: number) => Promise<void>;
  /** Called before each backoff sleep */
  readonly onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Sleep for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based retry index (0 = first retry)
 */
export function computeDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt);
  const jitter = policy.jitterMs > 0 ? Math.random() * policy.jitterMs : 0;
  return Math.min(exponential + jitter, policy.maxDelayMs);
}

/**
 * Reject policies that could never run or never stop.
 */
export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0 || policy.maxTotalDelayMs < 0) {
    throw new RangeError("Retry delays must be non-negative");
  }
  if (policy.multiplier < 1) {
    throw new RangeError(`multiplier must be >= 1, got ${policy.multiplier}`);
  }
  if (policy.jitterMs < 0) {
    throw new RangeError(`jitterMs must be non-negative, got ${policy.jitterMs}`);
  }
}

/**
 * Execute `fn`, retrying transient failures with exponential backoff.
 *
 * Never throws for failures of `fn`; the result says how it ended.
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<RetryResult<T>> {
  validateRetryPolicy(policy);

  const isTransient = hooks.isTransient ?? isTransientStorageError;
  const sleepFn = hooks.sleep ?? sleep;
  let slept = 0;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const value = await fn();
      return { ok: true, value, attempts: attempt };
    } catch (err: unknown) {
      lastError = err;

      if (!isTransient(err)) {
        return { ok: false, reason: "fatal", attempts: attempt, error: err };
      }

      if (attempt === policy.maxAttempts) {
        break;
      }

      const delayMs = computeDelay(attempt - 1, policy);
      if (slept + delayMs > policy.maxTotalDelayMs) {
        return { ok: false, reason: "exhausted", attempts: attempt, lastError: err };
      }

      hooks.onRetry?.({ attempt, delayMs, error: err });
      await sleepFn(delayMs);
      slept += delayMs;
    }
  }

  return { ok: false, reason: "exhausted", attempts: policy.maxAttempts, lastError };
}

const TRANSIENT_ERRNO = new Set(["EAGAIN", "EBUSY"]);

/**
 * Default retry predicate.
 *
 * Returns true for lock contention and errno codes that signal a busy
 * resource; everything else (corruption, full disk, closed store) is fatal.
 */
export function isTransientStorageError(err: unknown): boolean {
  if (err instanceof EventStoreError) {
    return err.code === "CONTENTION";
  }
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return TRANSIENT_ERRNO.has(err.code);
  }
  return false;
}
