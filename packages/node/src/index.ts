/**
 * @covenant/node: Runtime wiring for a durable governance log.
 *
 * @packageDocumentation
 */

export { ConfigSchema, loadConfig, retryPolicyFromConfig, safetyPolicyFromConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { createRuntime, summarize } from "./runtime.js";
export type { Runtime, RuntimeOptions, ReplaySummary } from "./runtime.js";
export { ingestLines, ingestFile } from "./ingest.js";
export type { IngestResult, IngestReport } from "./ingest.js";
