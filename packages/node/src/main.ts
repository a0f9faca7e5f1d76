/**
 * @covenant/node: Entry point.
 *
 * Opens the configured log, rebuilds state, verifies the hash chain and
 * reports a replay summary. Given a path argument, proposes each
 * candidate event in that JSONL file before reporting.
 */

import { loadConfig } from "./config.js";
import { ingestFile } from "./ingest.js";
import { createLogger } from "./logger.js";
import { createRuntime, summarize } from "./runtime.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const runtime = createRuntime(config, { logger });

  logger.info({ logFile: config.COVENANT_LOG_FILE, length: runtime.store.length }, "Covenant node started");

  const commandFile = process.argv[2];
  if (commandFile !== undefined) {
    const report = await ingestFile(runtime.store, commandFile, logger.child({ component: "ingest" }));
    for (const result of report.results) {
      if (result.violation !== undefined) {
        logger.info({ line: result.line, violation: result.violation }, "Command not admitted");
      }
    }
    logger.info(
      { committed: report.committed, rejected: report.rejected, failed: report.failed },
      "Command file ingested",
    );
  }

  const summary = summarize(runtime);
  if (summary.integrity.valid) {
    logger.info(summary, "Replay summary");
  } else {
    logger.error({ errors: summary.integrity.errors }, "Log failed integrity verification");
    process.exitCode = 1;
  }
  if (summary.riskLevel !== "green") {
    logger.warn({ riskLevel: summary.riskLevel, reasons: summary.riskReasons }, "Freedom health degraded");
  }
  logger.debug({ metrics: runtime.metrics.render() }, "Metrics");

  await runtime.close();
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
