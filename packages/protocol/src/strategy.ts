/**
 * Capture/release strategies.
 *
 * capture(holder, amount) takes value out of circulation on this subnet;
 * release(beneficiary, amount) puts it back. Both throw on failure and
 * never partially apply.
 */

import type { Address } from "@linked-token/types";
import type { BalanceBook } from "@linked-token/ledger";

export type CustodyMode = "lock" | "mint";

export interface CaptureReleaseStrategy {
  readonly mode: CustodyMode;
  capture(holder: Address, amount: bigint): Promise<void>;
  release(beneficiary: Address, amount: bigint): Promise<void>;
}

/**
 * Lock-vault: captured tokens sit in a vault account until released.
 * Used on the subnet where the token is native.
 */
export class LockVaultStrategy implements CaptureReleaseStrategy {
  readonly mode = "lock" as const;
  private readonly book: BalanceBook;
  readonly vault: Address;

  constructor(book: BalanceBook, vault: Address) {
    this.book = book;
    this.vault = vault;
  }

  async capture(holder: Address, amount: bigint): Promise<void> {
    this.book.transfer(holder, this.vault, amount);
  }

  async release(beneficiary: Address, amount: bigint): Promise<void> {
    this.book.transfer(this.vault, beneficiary, amount);
  }

  /** Tokens currently locked. */
  locked(): bigint {
    return this.book.balanceOf(this.vault);
  }
}

/**
 * Burn-mint: capture burns, release mints.
 * Used on the subnet holding the wrapped representation.
 */
export class BurnMintStrategy implements CaptureReleaseStrategy {
  readonly mode = "mint" as const;
  private readonly book: BalanceBook;

  constructor(book: BalanceBook) {
    this.book = book;
  }

  async capture(holder: Address, amount: bigint): Promise<void> {
    this.book.burn(holder, amount);
  }

  async release(beneficiary: Address, amount: bigint): Promise<void> {
    this.book.mint(beneficiary, amount);
  }
}
