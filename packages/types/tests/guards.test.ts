/**
 * Runtime type guard tests for @linked-token/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isHex,
  isAddress,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

const ALICE = "0x1111111111111111111111111111111111111111";
const ID = `0x${"ab".repeat(32)}`;

// =============================================================================
// Primitive guards
// =============================================================================

describe("isHex", () => {
  it("accepts empty and even-length hex", () => {
    expect(isHex("0x")).toBe(true);
    expect(isHex("0xdeadBEEF")).toBe(true);
  });

  it("rejects odd length, missing prefix, non-strings", () => {
    expect(isHex("0xabc")).toBe(false);
    expect(isHex("deadbeef")).toBe(false);
    expect(isHex(42)).toBe(false);
  });
});

describe("isAddress", () => {
  it("accepts a 20-byte address in any case", () => {
    expect(isAddress(ALICE)).toBe(true);
    expect(isAddress("0xAbCdEf0000000000000000000000000000000000")).toBe(true);
  });

  it("rejects wrong length", () => {
    expect(isAddress("0x1234")).toBe(false);
    expect(isAddress(`${ALICE}00`)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventMetadata / isDomainEvent", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: "2024-01-15T10:00:00.000Z",
    actor: ALICE,
    correlationId: ID,
    source: "protocol",
  };

  it("accepts valid metadata and event", () => {
    expect(isEventMetadata(metadata)).toBe(true);
    expect(isDomainEvent({ type: "transfer.sent", metadata, payload: {} })).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });

  it("rejects a null payload", () => {
    expect(isDomainEvent({ type: "x", metadata, payload: null })).toBe(false);
  });
});
