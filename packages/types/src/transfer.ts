/**
 * Transfer Types
 *
 * Records kept on the origin side for transfers that have been
 * dispatched but not yet settled.
 */

import type { Address, Hex, SubnetId } from "./address.js";

/** 32-byte identifier derived from the dispatched envelope. */
export type TransferId = Hex;

/**
 * A dispatched transfer awaiting its result.
 *
 * Existence of a record implies the amount was captured from `sender`
 * and that capture has not been reversed.
 */
export interface UnconfirmedTransfer {
  readonly id: TransferId;
  readonly sender: Address;
  readonly recipient: Address;

  /** Captured amount (smallest unit, > 0) */
  readonly amount: bigint;

  /** Transport sequence number of the dispatched envelope */
  readonly nonce: bigint;

  /** ISO 8601 timestamp of dispatch */
  readonly createdAt: string;
}

/**
 * Reference to the underlying asset on this subnet.
 */
export interface TokenRef {
  readonly subnetId: SubnetId;

  /** Token contract address (or native identifier) */
  readonly address: Address;

  /** Token symbol (e.g., "USDC", "FIL") */
  readonly symbol: string;

  /** Decimal places */
  readonly decimals: number;
}
