/**
 * @linked-token/ledger: Token amount conversion.
 *
 * Converts between human decimal strings ("1.5") and integer
 * smallest-unit amounts (1500000000000000000n at 18 decimals).
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are unsigned
 * - Fractional digits beyond the token's decimals are rejected, not rounded
 */

import { BalanceError } from "./types.js";

const DECIMAL_RE = /^\d+(\.\d+)?$/;

/**
 * Parse a decimal string into a smallest-unit bigint.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new BalanceError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new BalanceError("INVALID_AMOUNT", `Decimals must be a non-negative integer, got ${String(decimals)}`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > decimals) {
    throw new BalanceError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Format a smallest-unit bigint as a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=0 → "5"
 */
export function formatAmount(units: bigint, decimals: number): string {
  if (units < 0n) {
    throw new BalanceError("INVALID_AMOUNT", `Amounts are unsigned, got ${units.toString()}`);
  }
  if (decimals === 0) {
    return units.toString();
  }

  const str = units.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

/**
 * Parse a base-unit decimal string ("1500") as used on the wire.
 */
export function parseUnits(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new BalanceError("INVALID_AMOUNT", `Invalid integer amount: "${value}"`);
  }
  return BigInt(value);
}
