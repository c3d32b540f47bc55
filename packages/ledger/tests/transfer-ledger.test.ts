/**
 * Tests for the unconfirmed-transfer ledger.
 *
 * Covers:
 * - insert / get / has / take
 * - Duplicate and unknown id rejection
 * - Filtering
 * - Each record is taken exactly once
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import type { Address, TransferId, UnconfirmedTransfer } from "@linked-token/types";
import { UnconfirmedTransferLedger } from "../src/transfer-ledger.js";
import { TransferLedgerError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

const ALICE: Address = "0x1111111111111111111111111111111111111111";
const BOB: Address = "0x2222222222222222222222222222222222222222";
const CAROL: Address = "0x3333333333333333333333333333333333333333";

function idOf(n: number): TransferId {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

function record(n: number, overrides: Partial<UnconfirmedTransfer> = {}): UnconfirmedTransfer {
  return {
    id: idOf(n),
    sender: ALICE,
    recipient: BOB,
    amount: 100n,
    nonce: BigInt(n),
    createdAt: `2026-01-01T00:00:${String(n).padStart(2, "0")}.000Z`,
    ...overrides,
  };
}

describe("UnconfirmedTransferLedger", () => {
  let ledger: UnconfirmedTransferLedger;

  beforeEach(() => {
    ledger = new UnconfirmedTransferLedger();
  });

  // ─── insert ────────────────────────────────────────────────────────────

  describe("insert", () => {
    it("stores a record retrievable by id", () => {
      ledger.insert(record(1));
      expect(ledger.get(idOf(1))).toEqual(record(1));
      expect(ledger.has(idOf(1))).toBe(true);
      expect(ledger.size).toBe(1);
    });

    it("freezes stored records", () => {
      const stored = ledger.insert(record(1));
      expect(Object.isFrozen(stored)).toBe(true);
    });

    it("rejects a duplicate id", () => {
      ledger.insert(record(1));
      try {
        ledger.insert(record(1, { amount: 5n }));
        expect.fail("Should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(TransferLedgerError);
        const ledgerErr = err as TransferLedgerError;
        expect(ledgerErr.code).toBe("DUPLICATE_TRANSFER");
        expect(ledgerErr.transferId).toBe(idOf(1));
      }
      expect(ledger.get(idOf(1))?.amount).toBe(100n);
    });

    it("treats ids case-insensitively", () => {
      ledger.insert(record(1, { id: `0x${"ab".repeat(32)}` }));
      expect(ledger.has(`0x${"AB".repeat(32)}`)).toBe(true);
    });

    it("rejects a zero amount", () => {
      expect(() => ledger.insert(record(1, { amount: 0n }))).toThrow(/non-positive amount/);
    });

    it("rejects an id that is not 32 bytes", () => {
      expect(() => ledger.insert(record(1, { id: "0xabcd" }))).toThrow(TransferLedgerError);
    });
  });

  // ─── take ──────────────────────────────────────────────────────────────

  describe("take", () => {
    it("returns and removes the record", () => {
      ledger.insert(record(1));
      const taken = ledger.take(idOf(1));
      expect(taken.amount).toBe(100n);
      expect(ledger.has(idOf(1))).toBe(false);
      expect(ledger.size).toBe(0);
    });

    it("throws UNKNOWN_TRANSFER on a second take", () => {
      ledger.insert(record(1));
      ledger.take(idOf(1));
      expect(() => ledger.take(idOf(1))).toThrow(
        expect.objectContaining({ code: "UNKNOWN_TRANSFER" }),
      );
    });

    it("leaves other records untouched", () => {
      ledger.insert(record(1));
      ledger.insert(record(2));
      ledger.take(idOf(1));
      expect(ledger.list().map((r) => r.id)).toEqual([idOf(2)]);
    });
  });

  // ─── list ──────────────────────────────────────────────────────────────

  describe("list", () => {
    beforeEach(() => {
      ledger.insert(record(1));
      ledger.insert(record(2, { sender: CAROL }));
      ledger.insert(record(3, { recipient: CAROL, amount: 50n }));
    });

    it("lists in insertion order", () => {
      expect(ledger.list().map((r) => r.nonce)).toEqual([1n, 2n, 3n]);
    });

    it("filters by sender", () => {
      expect(ledger.list({ sender: CAROL }).map((r) => r.nonce)).toEqual([2n]);
    });

    it("filters by recipient ignoring case", () => {
      const upper: Address = `0x${CAROL.slice(2).toUpperCase()}`;
      expect(ledger.list({ recipient: upper }).map((r) => r.nonce)).toEqual([3n]);
    });

    it("filters by creation time", () => {
      expect(ledger.list({ createdBefore: "2026-01-01T00:00:03.000Z" })).toHaveLength(2);
    });
  });

  // ─── exactly once ──────────────────────────────────────────────────────

  describe("take", () => {
    it("hands out every inserted record once and then empties", () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(fc.integer({ min: 1, max: 10_000 }), { maxLength: 20 }),
          fc.bigInt({ min: 1n, max: 10n ** 40n }),
          (ids, amount) => {
            const fresh = new UnconfirmedTransferLedger();
            for (const n of ids) fresh.insert(record(n, { amount }));

            for (const n of ids) {
              expect(fresh.take(idOf(n)).amount).toBe(amount);
              expect(() => fresh.take(idOf(n))).toThrow(
                expect.objectContaining({ code: "UNKNOWN_TRANSFER" }),
              );
            }
            expect(fresh.size).toBe(0);
          },
        ),
      );
    });
  });
});
