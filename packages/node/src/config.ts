/**
 * @covenant/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { RetryPolicy } from "@covenant/event-store";
import { DEFAULT_RETRY_POLICY } from "@covenant/event-store";
import type { SafetyPolicy } from "@covenant/governance";
import { createSafetyPolicy } from "@covenant/governance";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  COVENANT_LOG_FILE: z.string().min(1).default("./data/events.jsonl"),
  COVENANT_SNAPSHOT_DIR: z.string().min(1).optional(),
  SNAPSHOT_INTERVAL: z.coerce.number().int().min(0).default(100),
  LOCK_STALE_MS: z.coerce.number().int().min(1).default(30000),

  // Retry
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(10),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(250),
  RETRY_MAX_TOTAL_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  // Safety policy
  MAX_DELEGATION_TTL_DAYS: z.coerce.number().int().min(1).default(365),
  DELEGATION_GINI_WARN: z.coerce.number().min(0).max(1).default(0.55),
  DELEGATION_GINI_HALT: z.coerce.number().min(0).max(1).default(0.7),
  DELEGATION_IN_DEGREE_WARN: z.coerce.number().int().min(1).default(500),
  DELEGATION_IN_DEGREE_HALT: z.coerce.number().int().min(1).default(2000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Derived settings
// =============================================================================

export function retryPolicyFromConfig(config: AppConfig): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    multiplier: config.RETRY_MULTIPLIER,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    maxTotalDelayMs: config.RETRY_MAX_TOTAL_DELAY_MS,
  };
}

export function safetyPolicyFromConfig(config: AppConfig): SafetyPolicy {
  return createSafetyPolicy({
    maxDelegationTtlDays: config.MAX_DELEGATION_TTL_DAYS,
    delegationGiniWarn: config.DELEGATION_GINI_WARN,
    delegationGiniHalt: config.DELEGATION_GINI_HALT,
    delegationInDegreeWarn: config.DELEGATION_IN_DEGREE_WARN,
    delegationInDegreeHalt: config.DELEGATION_IN_DEGREE_HALT,
  });
}
