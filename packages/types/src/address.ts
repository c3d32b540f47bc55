/**
 * Address Types
 *
 * Cross-domain addressing primitives.
 *
 * Rules:
 * - Addresses are 20-byte hex strings, compared case-insensitively
 * - A subnet is identified by its root chain and the route of gateway
 *   addresses leading to it
 * - Equality of subnet ids is structural (root + every hop)
 */

/** A 0x-prefixed hex string of any length. */
export type Hex = `0x${string}`;

/** A 0x-prefixed 20-byte account or contract address. */
export type Address = `0x${string}`;

/** The zero address. Never a valid recipient or linked contract. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Hierarchical subnet identifier.
 *
 * Rendered as `/r<root>/<hop>/<hop>…`, e.g. `/r314159/0x1234…`.
 */
export interface SubnetId {
  /** Chain id of the root network */
  readonly root: bigint;

  /** Gateway/subnet actor addresses from the root down to this subnet */
  readonly route: readonly Address[];
}

/**
 * An address qualified by the subnet it lives in.
 * This is the transport's address representation.
 */
export interface IpcAddress {
  readonly subnetId: SubnetId;
  readonly rawAddress: Address;
}
