/**
 * @linked-token/ledger: Unconfirmed-transfer ledger.
 *
 * Holds one record per outbound transfer that has been dispatched but
 * whose result has not yet come back. A record is created at dispatch and
 * deleted exactly once: on settlement, on refund, or by forced removal.
 *
 * Rules:
 * - Identifiers are unique: inserting an existing id throws
 * - `take()` is compare-and-delete: it returns the record and removes it
 *   in one step, so a second `take()` of the same id throws
 * - Records are frozen on insert
 */

import type { Address, TransferId, UnconfirmedTransfer } from "@linked-token/types";
import { isAddress, isHex } from "@linked-token/types";
import type { TransferFilter } from "./types.js";
import { TransferLedgerError } from "./types.js";

const ID_LENGTH = 66;

function keyOf(id: TransferId): string {
  return id.toLowerCase();
}

function validateRecord(record: UnconfirmedTransfer): void {
  if (!isHex(record.id) || record.id.length !== ID_LENGTH) {
    throw new TransferLedgerError("INVALID_RECORD", `Transfer id must be 32 bytes of hex, got "${record.id}"`);
  }
  if (!isAddress(record.sender) || !isAddress(record.recipient)) {
    throw new TransferLedgerError("INVALID_RECORD", `Transfer ${record.id} has an invalid sender or recipient`, record.id);
  }
  if (record.amount <= 0n) {
    throw new TransferLedgerError("INVALID_RECORD", `Transfer ${record.id} has a non-positive amount`, record.id);
  }
  if (record.nonce < 0n) {
    throw new TransferLedgerError("INVALID_RECORD", `Transfer ${record.id} has a negative nonce`, record.id);
  }
}

function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class UnconfirmedTransferLedger {
  private readonly _records = new Map<string, UnconfirmedTransfer>();

  /**
   * Record a newly dispatched transfer.
   *
   * @throws TransferLedgerError DUPLICATE_TRANSFER if the id is already pending
   * @throws TransferLedgerError INVALID_RECORD if the record is malformed
   */
  insert(record: UnconfirmedTransfer): UnconfirmedTransfer {
    validateRecord(record);
    const key = keyOf(record.id);
    if (this._records.has(key)) {
      throw new TransferLedgerError(
        "DUPLICATE_TRANSFER",
        `Transfer ${record.id} is already pending`,
        record.id,
      );
    }
    const frozen = Object.freeze({ ...record });
    this._records.set(key, frozen);
    return frozen;
  }

  get(id: TransferId): UnconfirmedTransfer | undefined {
    return this._records.get(keyOf(id));
  }

  has(id: TransferId): boolean {
    return this._records.has(keyOf(id));
  }

  /**
   * Remove and return the record for `id`.
   *
   * @throws TransferLedgerError UNKNOWN_TRANSFER if no record exists
   */
  take(id: TransferId): UnconfirmedTransfer {
    const key = keyOf(id);
    const record = this._records.get(key);
    if (record === undefined) {
      throw new TransferLedgerError("UNKNOWN_TRANSFER", `No unconfirmed transfer with id ${id}`, id);
    }
    this._records.delete(key);
    return record;
  }

  /**
   * List pending transfers, oldest first (insertion order).
   */
  list(filter?: TransferFilter): readonly UnconfirmedTransfer[] {
    const all = [...this._records.values()];
    if (filter === undefined) return all;

    return all.filter((record) => {
      if (filter.sender !== undefined && !sameAddress(record.sender, filter.sender)) return false;
      if (filter.recipient !== undefined && !sameAddress(record.recipient, filter.recipient)) return false;
      if (filter.createdBefore !== undefined && record.createdAt >= filter.createdBefore) return false;
      return true;
    });
  }

  get size(): number {
    return this._records.size;
  }
}
