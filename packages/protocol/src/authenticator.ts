/**
 * Message authenticator.
 *
 * Checks, in order:
 * 1. origin subnet equals the linked subnet (structural)
 * 2. origin contract equals the linked contract
 * 3. (calls only) method selector equals receiveLinked's selector
 *
 * There is no signature check here: the transport has already verified
 * that the envelope came from the subnet and contract it claims.
 */

import type { Hex, IpcEnvelope } from "@linked-token/types";
import { LinkedTokenError, invalidEnvelope } from "./errors.js";
import type { LinkConfig } from "./link-config.js";
import { byteLength, RECEIVE_SELECTOR, SELECTOR_SIZE, selectorOf } from "./codec.js";
import { formatSubnetId, sameAddress, subnetEquals } from "./subnet.js";

export class MessageAuthenticator {
  private readonly link: LinkConfig;
  private readonly expectedSelector: Hex;

  constructor(link: LinkConfig, expectedSelector: Hex = RECEIVE_SELECTOR) {
    this.link = link;
    this.expectedSelector = expectedSelector;
  }

  /** Rules 1 and 2. Reads the link live, so a reconfiguration applies immediately. */
  authenticateOrigin(envelope: IpcEnvelope): void {
    const linkedContract = this.link.requireInitialized();
    const origin = envelope.from;

    if (!subnetEquals(origin.subnetId, this.link.linkedSubnet)) {
      throw new LinkedTokenError(
        "INVALID_ORIGIN_SUBNET",
        `Envelope from ${formatSubnetId(origin.subnetId)}, expected ${formatSubnetId(this.link.linkedSubnet)}`,
        { origin: formatSubnetId(origin.subnetId) },
      );
    }

    if (!sameAddress(origin.rawAddress, linkedContract)) {
      throw new LinkedTokenError(
        "INVALID_ORIGIN_CONTRACT",
        `Envelope from contract ${origin.rawAddress}, expected ${linkedContract}`,
        { origin: origin.rawAddress },
      );
    }
  }

  /** Rule 3. */
  requireSelector(method: Hex): void {
    if (byteLength(method) < SELECTOR_SIZE) {
      throw invalidEnvelope("short selector");
    }
    if (selectorOf(method).toLowerCase() !== this.expectedSelector.toLowerCase()) {
      throw invalidEnvelope("invalid selector");
    }
  }
}
