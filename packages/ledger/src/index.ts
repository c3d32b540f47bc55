/**
 * @linked-token/ledger: Pending-transfer bookkeeping.
 *
 * - Unconfirmed-transfer ledger with compare-and-delete removal
 * - Per-identifier mutual exclusion for async settlement
 * - Token balance book (balances and total supply)
 * - Decimal ↔ smallest-unit amount conversion
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - All token arithmetic uses bigint
 */

export { UnconfirmedTransferLedger } from "./transfer-ledger.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { BalanceBook } from "./balance-book.js";
export { parseAmount, formatAmount, parseUnits } from "./amounts.js";

export type {
  TransferLedgerErrorCode,
  BalanceErrorCode,
  TransferFilter,
} from "./types.js";
export { TransferLedgerError, BalanceError } from "./types.js";
