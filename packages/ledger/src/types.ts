/**
 * @linked-token/ledger: Internal types for the ledger package.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - All token arithmetic uses bigint (no floating point)
 */

import type { Address, TransferId } from "@linked-token/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for the unconfirmed-transfer ledger. */
export type TransferLedgerErrorCode =
  | "DUPLICATE_TRANSFER"
  | "UNKNOWN_TRANSFER"
  | "INVALID_RECORD";

/**
 * Structured error from the unconfirmed-transfer ledger.
 */
export class TransferLedgerError extends Error {
  public readonly code: TransferLedgerErrorCode;
  public readonly transferId: TransferId | undefined;

  constructor(code: TransferLedgerErrorCode, message: string, transferId?: TransferId) {
    super(message);
    this.name = "TransferLedgerError";
    this.code = code;
    this.transferId = transferId;
  }
}

/** Error codes for balance book operations. */
export type BalanceErrorCode = "INSUFFICIENT_BALANCE" | "INVALID_AMOUNT";

/**
 * Structured error from the balance book and amount parsing.
 */
export class BalanceError extends Error {
  public readonly code: BalanceErrorCode;

  constructor(code: BalanceErrorCode, message: string) {
    super(message);
    this.name = "BalanceError";
    this.code = code;
  }
}

/**
 * Filter criteria for listing unconfirmed transfers.
 */
export interface TransferFilter {
  readonly sender?: Address | undefined;
  readonly recipient?: Address | undefined;
  /** Only transfers dispatched before this ISO timestamp */
  readonly createdBefore?: string | undefined;
}
