import { describe, it, expect } from "vitest";
import { LinkConfig } from "../src/link-config.js";
import { MessageAuthenticator } from "../src/authenticator.js";
import { RECEIVE_SELECTOR } from "../src/codec.js";
import {
  CHILD,
  DEST_CONTRACT,
  MALLORY,
  OTHER_CHILD,
  OWNER,
  UNDERLYING,
  callEnvelope,
} from "./helpers.js";

// Authenticator on the root side: accepts envelopes from DEST_CONTRACT on CHILD
function authenticator(): { auth: MessageAuthenticator; link: LinkConfig } {
  const link = new LinkConfig({
    owner: OWNER,
    underlying: UNDERLYING,
    linkedSubnet: CHILD,
    linkedContract: DEST_CONTRACT,
  });
  return { auth: new MessageAuthenticator(link), link };
}

const FROM_DEST = { subnetId: CHILD, rawAddress: DEST_CONTRACT };

describe("MessageAuthenticator", () => {
  describe("authenticateOrigin", () => {
    it("accepts the linked subnet and contract", () => {
      const { auth } = authenticator();
      expect(() => auth.authenticateOrigin(callEnvelope(undefined, { from: FROM_DEST }))).not.toThrow();
    });

    it("rejects another subnet even from the linked contract address", () => {
      const { auth } = authenticator();
      const envelope = callEnvelope(undefined, { from: { subnetId: OTHER_CHILD, rawAddress: DEST_CONTRACT } });
      expect(() => auth.authenticateOrigin(envelope)).toThrow(
        expect.objectContaining({ code: "INVALID_ORIGIN_SUBNET", category: "authentication" }),
      );
    });

    it("rejects another contract on the linked subnet", () => {
      const { auth } = authenticator();
      const envelope = callEnvelope(undefined, { from: { subnetId: CHILD, rawAddress: MALLORY } });
      expect(() => auth.authenticateOrigin(envelope)).toThrow(
        expect.objectContaining({ code: "INVALID_ORIGIN_CONTRACT" }),
      );
    });

    it("checks the subnet before the contract", () => {
      const { auth } = authenticator();
      const envelope = callEnvelope(undefined, { from: { subnetId: OTHER_CHILD, rawAddress: MALLORY } });
      expect(() => auth.authenticateOrigin(envelope)).toThrow(
        expect.objectContaining({ code: "INVALID_ORIGIN_SUBNET" }),
      );
    });

    it("follows reconfiguration of the linked contract", () => {
      const { auth, link } = authenticator();
      link.reconfigure(OWNER, MALLORY);
      expect(() => auth.authenticateOrigin(callEnvelope(undefined, { from: FROM_DEST }))).toThrow(
        expect.objectContaining({ code: "INVALID_ORIGIN_CONTRACT" }),
      );
      expect(() =>
        auth.authenticateOrigin(callEnvelope(undefined, { from: { subnetId: CHILD, rawAddress: MALLORY } })),
      ).not.toThrow();
    });

    it("fails with NOT_INITIALIZED before the link is set", () => {
      const auth = new MessageAuthenticator(
        new LinkConfig({ owner: OWNER, underlying: UNDERLYING, linkedSubnet: CHILD }),
      );
      expect(() => auth.authenticateOrigin(callEnvelope(undefined, { from: FROM_DEST }))).toThrow(
        expect.objectContaining({ code: "NOT_INITIALIZED" }),
      );
    });
  });

  describe("requireSelector", () => {
    it("accepts the receive selector", () => {
      expect(() => authenticator().auth.requireSelector(RECEIVE_SELECTOR)).not.toThrow();
    });

    it("accepts the selector in upper case", () => {
      const upper = `0x${RECEIVE_SELECTOR.slice(2).toUpperCase()}` as const;
      expect(() => authenticator().auth.requireSelector(upper)).not.toThrow();
    });

    it("fails a 3-byte method with short selector", () => {
      expect(() => authenticator().auth.requireSelector("0xdeadbe")).toThrow(
        expect.objectContaining({ code: "INVALID_ENVELOPE", details: { reason: "short selector" } }),
      );
    });

    it("fails an empty method with short selector", () => {
      expect(() => authenticator().auth.requireSelector("0x")).toThrow("Invalid envelope: short selector");
    });

    it("fails a different selector with invalid selector", () => {
      expect(() => authenticator().auth.requireSelector("0xdeadbeef")).toThrow(
        expect.objectContaining({ details: { reason: "invalid selector" } }),
      );
    });
  });
});
