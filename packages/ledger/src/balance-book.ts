/**
 * @linked-token/ledger: Token balance book.
 *
 * Per-holder bigint balances plus total supply for one token.
 * Stands in for the local token contract that capture and release
 * strategies move funds through.
 *
 * Rules:
 * - Balances never go negative
 * - Amounts must be positive
 * - totalSupply always equals the sum of all balances
 */

import type { Address } from "@linked-token/types";
import { BalanceError } from "./types.js";

function keyOf(holder: Address): string {
  return holder.toLowerCase();
}

function requirePositive(amount: bigint, operation: string): void {
  if (amount <= 0n) {
    throw new BalanceError("INVALID_AMOUNT", `${operation} amount must be positive, got ${amount.toString()}`);
  }
}

export class BalanceBook {
  private readonly _balances = new Map<string, bigint>();
  private _totalSupply = 0n;

  balanceOf(holder: Address): bigint {
    return this._balances.get(keyOf(holder)) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  mint(to: Address, amount: bigint): void {
    requirePositive(amount, "Mint");
    this._balances.set(keyOf(to), this.balanceOf(to) + amount);
    this._totalSupply += amount;
  }

  burn(from: Address, amount: bigint): void {
    requirePositive(amount, "Burn");
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new BalanceError(
        "INSUFFICIENT_BALANCE",
        `Cannot burn ${amount.toString()} from ${from}: balance is ${balance.toString()}`,
      );
    }
    this._set(from, balance - amount);
    this._totalSupply -= amount;
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    requirePositive(amount, "Transfer");
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new BalanceError(
        "INSUFFICIENT_BALANCE",
        `Cannot transfer ${amount.toString()} from ${from}: balance is ${balance.toString()}`,
      );
    }
    this._set(from, balance - amount);
    this._set(to, this.balanceOf(to) + amount);
  }

  private _set(holder: Address, balance: bigint): void {
    if (balance === 0n) {
      this._balances.delete(keyOf(holder));
    } else {
      this._balances.set(keyOf(holder), balance);
    }
  }
}
