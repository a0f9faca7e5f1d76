/**
 * @covenant/event-store: Event ID generation.
 *
 * Default IDs are UUIDv7: a 48-bit millisecond timestamp followed by
 * random bits, so IDs sort roughly by creation time.
 */

import { randomBytes } from "node:crypto";

export interface IdSource {
  next(): string;
}

/**
 * Build a UUIDv7 string from a millisecond timestamp and 10 random bytes.
 */
export function uuidv7(timestampMs: number = Date.now(), random: Uint8Array = randomBytes(10)): string {
  if (random.length < 10) {
    throw new Error("uuidv7 requires at least 10 random bytes");
  }

  const bytes = new Uint8Array(16);
  let ts = Math.floor(timestampMs);
  for (let i = 5; i >= 0; i--) {
    bytes[i] = ts & 0xff;
    ts = Math.floor(ts / 256);
  }
  bytes.set(random.subarray(0, 10), 6);

  // version 7 in the high nibble of byte 6, RFC 4122 variant in byte 8
  bytes[6] = 0x70 | ((bytes[6] ?? 0) & 0x0f);
  bytes[8] = 0x80 | ((bytes[8] ?? 0) & 0x3f);

  const hex = Buffer.from(bytes).toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export class UuidV7IdSource implements IdSource {
  next(): string {
    return uuidv7();
  }
}

/**
 * Predictable IDs for tests: evt-000001, evt-000002, ...
 */
export class SequentialIdSource implements IdSource {
  private _counter = 0;

  constructor(private readonly _prefix = "evt") {}

  next(): string {
    this._counter++;
    return `${this._prefix}-${String(this._counter).padStart(6, "0")}`;
  }
}
