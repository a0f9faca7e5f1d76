/**
 * @covenant/node: Command file ingestion.
 *
 * Proposes candidate events read from JSON lines, one at a time and in
 * file order. Blank lines are skipped. A line that is not a candidate
 * event is reported as malformed and never reaches the store.
 */

import { readFileSync } from "node:fs";
import type { Logger } from "pino";
import { isCandidateEvent } from "@covenant/types";
import type { AppendStatus, Violation } from "@covenant/event-store";
import type { GovernanceStore } from "@covenant/governance";

export interface IngestResult {
  /** 1-based line number in the input */
  readonly line: number;
  readonly status: AppendStatus | "unparsable";
  readonly position?: number;
  readonly violation?: Violation;
}

export interface IngestReport {
  readonly results: readonly IngestResult[];
  readonly committed: number;
  readonly rejected: number;
  readonly failed: number;
}

function parseLine(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export async function ingestLines(
  store: GovernanceStore,
  lines: readonly string[],
  logger?: Logger,
): Promise<IngestReport> {
  const results: IngestResult[] = [];

  for (const [index, raw] of lines.entries()) {
    const line = index + 1;
    const text = raw.trim();
    if (text === "") continue;

    const parsed = parseLine(text);
    if (!isCandidateEvent(parsed)) {
      logger?.warn({ line }, "Skipping line that is not a candidate event");
      results.push({
        line,
        status: "unparsable",
        violation: { kind: "malformed", reason: "Not a candidate event" },
      });
      continue;
    }

    const outcome = await store.proposeEvent(parsed);
    switch (outcome.status) {
      case "committed":
        results.push({ line, status: outcome.status, position: outcome.event.position });
        break;
      case "rejected":
        results.push({ line, status: outcome.status, violation: outcome.violation });
        break;
      default:
        results.push({ line, status: outcome.status });
        break;
    }
  }

  return {
    results,
    committed: results.filter((r) => r.status === "committed").length,
    rejected: results.filter((r) => r.status === "rejected" || r.status === "unparsable").length,
    failed: results.filter((r) => r.status === "retry_exhausted" || r.status === "fatal").length,
  };
}

/**
 * Ingest a JSONL command file.
 */
export function ingestFile(
  store: GovernanceStore,
  filePath: string,
  logger?: Logger,
): Promise<IngestReport> {
  return ingestLines(store, readFileSync(filePath, "utf-8").split("\n"), logger);
}
