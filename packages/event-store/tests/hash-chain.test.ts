/**
 * Tests for hash chain verification.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "../src/hash-chain.js";
import type { StoredEvent } from "../src/types.js";
import { makeEvent, makeEvents } from "./helpers.js";

function storeWith(count: number): InMemoryEventStore {
  const store = new InMemoryEventStore();
  store.append("s", makeEvents(count));
  return store;
}

describe("verifyHashChain", () => {
  it("treats an empty log as valid", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("verifies an untouched log", () => {
    const result = storeWith(5).verifyIntegrity();
    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(5);
  });

  it("detects a modified payload at its position", () => {
    const events = [...storeWith(3).readAll()];
    const victim = events[1] as StoredEvent;
    events[1] = { ...victim, event: { ...victim.event, payload: { amount: "999" } } };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(2);
    expect(result.lastVerifiedPosition).toBe(1);
  });

  it("detects a removed event", () => {
    const events = storeWith(3).readAll();
    const result = verifyHashChain([events[0] as StoredEvent, events[2] as StoredEvent]);
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.reason).toContain("previousHash mismatch at position 3");
  });

  it("hashes deterministically regardless of payload key order", () => {
    const base = {
      streamId: "s",
      version: 1,
      globalPosition: 1,
      appendedAt: "2024-01-15T10:00:00.000Z",
    };
    const a = { ...base, event: makeEvent("x", { a: "1", b: "2" }) };
    const b = { ...base, event: { ...a.event, payload: { b: "2", a: "1" } } };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });
});

describe("hash chain properties", () => {
  it("any sequence of batches produces a valid chain", () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 1, max: 4 }), { minLength: 1, maxLength: 8 }), (batches) => {
        const store = new InMemoryEventStore();
        batches.forEach((size, i) => store.append(`stream-${i % 3}`, makeEvents(size)));
        const result = store.verifyIntegrity();
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(batches.reduce((a, b) => a + b, 0));
      }),
      { numRuns: 50 },
    );
  });
});
