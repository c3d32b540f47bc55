/**
 * Link configuration: the pairing between this contract and its
 * counterpart on the linked subnet.
 *
 * Rules:
 * - Underlying token and linked subnet are fixed at construction
 * - The linked contract is set once by the owner (`initialize`)
 * - Afterwards only the owner may replace it (`reconfigure`)
 * - The zero address is never a valid linked contract
 */

import type { Address, IpcAddress, SubnetId, TokenRef } from "@linked-token/types";
import { LinkedTokenError } from "./errors.js";
import { isZeroAddress, normalizeAddress, sameAddress } from "./subnet.js";

export interface LinkConfigInit {
  readonly owner: Address;
  readonly underlying: TokenRef;
  readonly linkedSubnet: SubnetId;
  /** Pre-set linked contract. Leaves the link uninitialized when omitted. */
  readonly linkedContract?: Address | undefined;
}

export interface LinkState {
  readonly owner: Address;
  readonly underlying: TokenRef;
  readonly linkedSubnet: SubnetId;
  readonly linkedContract: Address | undefined;
  readonly initialized: boolean;
}

export class LinkConfig {
  readonly owner: Address;
  readonly underlying: TokenRef;
  readonly linkedSubnet: SubnetId;
  private _linkedContract: Address | undefined;

  constructor(init: LinkConfigInit) {
    this.owner = normalizeAddress(init.owner);
    this.underlying = init.underlying;
    this.linkedSubnet = init.linkedSubnet;
    if (init.linkedContract !== undefined) {
      requireNonZero(init.linkedContract);
      this._linkedContract = normalizeAddress(init.linkedContract);
    }
  }

  get initialized(): boolean {
    return this._linkedContract !== undefined;
  }

  get linkedContract(): Address | undefined {
    return this._linkedContract;
  }

  /**
   * The linked contract, or NOT_INITIALIZED.
   */
  requireInitialized(): Address {
    if (this._linkedContract === undefined) {
      throw new LinkedTokenError("NOT_INITIALIZED", "Linked contract has not been set");
    }
    return this._linkedContract;
  }

  /** Destination of outbound receive calls. */
  destination(): IpcAddress {
    return { subnetId: this.linkedSubnet, rawAddress: this.requireInitialized() };
  }

  isOwner(caller: Address): boolean {
    return sameAddress(caller, this.owner);
  }

  requireOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new LinkedTokenError("UNAUTHORIZED", `${caller} is not the owner`, { caller });
    }
  }

  /**
   * Set the linked contract once. `beforeCommit` runs after every check
   * and before the change; if it throws, the link stays unset.
   */
  initialize(caller: Address, contract: Address, beforeCommit?: (linked: Address) => void): Address {
    this.requireOwner(caller);
    if (this._linkedContract !== undefined) {
      throw new LinkedTokenError(
        "ALREADY_INITIALIZED",
        `Linked contract is already set to ${this._linkedContract}`,
      );
    }
    requireNonZero(contract);
    const linked = normalizeAddress(contract);
    beforeCommit?.(linked);
    this._linkedContract = linked;
    return linked;
  }

  /**
   * Replace the linked contract. Returns the previous one. `beforeCommit`
   * runs as in `initialize`.
   */
  reconfigure(
    caller: Address,
    contract: Address,
    beforeCommit?: (previous: Address, linked: Address) => void,
  ): Address {
    this.requireOwner(caller);
    const previous = this.requireInitialized();
    requireNonZero(contract);
    const linked = normalizeAddress(contract);
    beforeCommit?.(previous, linked);
    this._linkedContract = linked;
    return previous;
  }

  /**
   * Set the linked contract without the owner check. Used when the
   * link is rebuilt from the event log.
   */
  restore(contract: Address): void {
    requireNonZero(contract);
    this._linkedContract = normalizeAddress(contract);
  }

  state(): LinkState {
    return {
      owner: this.owner,
      underlying: this.underlying,
      linkedSubnet: this.linkedSubnet,
      linkedContract: this._linkedContract,
      initialized: this.initialized,
    };
  }
}

function requireNonZero(contract: Address): void {
  if (isZeroAddress(contract)) {
    throw new LinkedTokenError("ZERO_ADDRESS", "Linked contract cannot be the zero address");
  }
}
