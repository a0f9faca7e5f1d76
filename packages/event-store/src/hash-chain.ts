/**
 * @covenant/event-store: Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { CommittedEvent } from "@covenant/types";
import type { EventStoreIntegrityResult, IntegrityError } from "./types.js";

/**
 * The hash used as `previousHash` for the event at position 0.
 */
export const GENESIS_HASH = "genesis";

/**
 * The committed fields covered by the hash (everything but the hash pair).
 */
export type HashableEvent = Omit<CommittedEvent, "hash" | "previousHash">;

function canonicalEventContent(event: HashableEvent): string {
  const content = JSON.stringify({
    position: event.position,
    id: event.id,
    timestamp: event.timestamp,
    type: event.type,
    payload: event.payload,
    metadata: event.metadata,
  });
  // Hash exactly what the log stores: JSON drops undefined members
  return canonicalize(JSON.parse(content));
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @param previousHash - Hash of the preceding event, or GENESIS_HASH for position 0
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: HashableEvent,
  previousHash: string,
): string {
  const content = canonicalEventContent(event);
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain and position sequence of a log.
 *
 * Events must be the complete log in position order starting at 0.
 */
export function verifyHashChain(
  events: readonly CommittedEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let verifiedCount = 0;

  events.forEach((event, index) => {
    if (event.position !== index) {
      errors.push({
        position: index,
        reason: `Position gap: expected ${index}, found ${event.position}`,
      });
    }

    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.position,
        reason: `previousHash mismatch at position ${event.position}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.position,
        reason: `Hash mismatch at position ${event.position}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    if (errors.length === 0) {
      verifiedCount++;
    }
    previousHash = event.hash;
  });

  return {
    valid: errors.length === 0,
    verifiedCount,
    errors,
  };
}
