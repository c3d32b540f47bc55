/**
 * Subnet identifiers and address normalization.
 *
 * Text form: `/r<root>/<hop>/<hop>…`, e.g. `/r314159/0xAbC…`.
 * Hops are rendered checksummed; parsing accepts any case.
 */

import { getAddress, isAddress, isAddressEqual } from "viem";
import type { Address, IpcAddress, SubnetId } from "@linked-token/types";
import { ZERO_ADDRESS } from "@linked-token/types";

const ROOT_RE = /^r(\d+)$/;

export class SubnetParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubnetParseError";
  }
}

/** Checksummed form of `address`. Throws on anything that is not 20 bytes of hex. */
export function normalizeAddress(address: string): Address {
  return getAddress(address);
}

export function sameAddress(a: Address, b: Address): boolean {
  return isAddressEqual(a, b);
}

export function isZeroAddress(address: Address): boolean {
  return isAddressEqual(address, ZERO_ADDRESS);
}

/** Structural equality: same root and the same hops in the same order. */
export function subnetEquals(a: SubnetId, b: SubnetId): boolean {
  if (a.root !== b.root) return false;
  if (a.route.length !== b.route.length) return false;
  return a.route.every((hop, i) => {
    const other = b.route[i];
    return other !== undefined && isAddressEqual(hop, other);
  });
}

export function formatSubnetId(subnet: SubnetId): string {
  const hops = subnet.route.map((hop) => `/${getAddress(hop)}`).join("");
  return `/r${subnet.root.toString()}${hops}`;
}

export function parseSubnetId(text: string): SubnetId {
  const [empty, root, ...hops] = text.split("/");
  if (empty !== "" || root === undefined) {
    throw new SubnetParseError(`Subnet id must start with "/r<root>": "${text}"`);
  }
  const match = ROOT_RE.exec(root);
  if (match === null || match[1] === undefined) {
    throw new SubnetParseError(`Invalid subnet root "${root}" in "${text}"`);
  }

  const route = hops.map((hop) => {
    if (!isAddress(hop, { strict: false })) {
      throw new SubnetParseError(`Invalid route hop "${hop}" in "${text}"`);
    }
    return getAddress(hop);
  });

  return { root: BigInt(match[1]), route };
}

export function formatIpcAddress(address: IpcAddress): string {
  return `${formatSubnetId(address.subnetId)}:${getAddress(address.rawAddress)}`;
}

export function ipcAddressKey(address: IpcAddress): string {
  return formatIpcAddress(address).toLowerCase();
}
