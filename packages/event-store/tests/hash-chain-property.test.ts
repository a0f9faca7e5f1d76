/**
 * Property-based tests for hash chain integrity.
 *
 * Uses fast-check to verify invariants:
 * 1. Any sequence of committed events → valid chain
 * 2. Remove any event → breaks chain
 * 3. Modify any payload → breaks chain
 * 4. verifyIntegrity() is idempotent
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { verifyHashChain } from "../src/hash-chain.js";
import { added, commitAll, createNotesStore } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Distinct note texts; each becomes one committed note.added */
const arbTexts = (minLength: number, maxLength: number) =>
  fc.array(fc.string({ maxLength: 30 }), { minLength, maxLength });

async function committedLog(texts: readonly string[]) {
  const store = createNotesStore();
  const events = await commitAll(
    store,
    texts.map((text, i) => added(`n${i}`, text)),
  );
  return { store, events };
}

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any committed sequence produces a valid chain", async () => {
    await fc.assert(
      fc.asyncProperty(arbTexts(1, 20), async (texts) => {
        const { store } = await committedLog(texts);

        const result = store.verifyIntegrity();
        expect(result.valid).toBe(true);
        expect(result.verifiedCount).toBe(texts.length);
      }),
      { numRuns: 50 },
    );
  });

  it("removing any event from the middle breaks the chain", async () => {
    await fc.assert(
      fc.asyncProperty(arbTexts(3, 10), fc.nat(), async (texts, removeIndex) => {
        const { events } = await committedLog(texts);

        const idx = 1 + (removeIndex % (events.length - 2));
        const tampered = [...events.slice(0, idx), ...events.slice(idx + 1)];

        const result = verifyHashChain(tampered);
        expect(result.valid).toBe(false);
        expect(result.verifiedCount).toBe(idx);
      }),
      { numRuns: 30 },
    );
  });

  it("modifying any event payload breaks the chain at that position", async () => {
    await fc.assert(
      fc.asyncProperty(arbTexts(2, 8), fc.nat(), async (texts, modifyIndex) => {
        const { events } = await committedLog(texts);
        const idx = modifyIndex % events.length;

        const tampered = events.map((event, i) =>
          i === idx ? { ...event, payload: { ...event.payload, tampered: true } } : event,
        );

        const result = verifyHashChain(tampered);
        expect(result.valid).toBe(false);
        expect(result.errors[0]?.position).toBe(idx);
      }),
      { numRuns: 30 },
    );
  });

  it("verifyIntegrity is idempotent", async () => {
    await fc.assert(
      fc.asyncProperty(arbTexts(1, 10), async (texts) => {
        const { store } = await committedLog(texts);

        const r1 = store.verifyIntegrity();
        const r2 = store.verifyIntegrity();

        expect(r2).toEqual(r1);
      }),
      { numRuns: 30 },
    );
  });
});
