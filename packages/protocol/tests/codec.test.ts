import { describe, it, expect } from "vitest";
import { encodeAbiParameters, keccak256, parseAbiParameters, toHex } from "viem";
import type { IpcEnvelope } from "@linked-token/types";
import {
  RECEIVE_SELECTOR,
  RECEIVE_SIGNATURE,
  buildReceiveCall,
  decodeCallMsg,
  decodeReceiveParams,
  decodeResultMsg,
  encodeCallMsg,
  encodeResultMsg,
  envelopeId,
} from "../src/codec.js";
import { LinkedTokenError } from "../src/errors.js";
import { BOB, callEnvelope } from "./helpers.js";

const SOME_ID = `0x${"ab".repeat(32)}` as const;

describe("receive selector", () => {
  it("is the first 4 bytes of the signature hash", () => {
    expect(RECEIVE_SIGNATURE).toBe("receiveLinked(address,uint256)");
    expect(RECEIVE_SELECTOR).toBe(keccak256(toHex(RECEIVE_SIGNATURE)).slice(0, 10));
  });

  it("builds a call carrying recipient and amount", () => {
    const call = buildReceiveCall(BOB, 250n);
    expect(call.method).toBe(RECEIVE_SELECTOR);
    expect(decodeReceiveParams(call.params)).toEqual({ recipient: BOB, amount: 250n });
  });
});

describe("call and result messages", () => {
  it("decodes an encoded call", () => {
    const call = buildReceiveCall(BOB, 1n);
    expect(decodeCallMsg(encodeCallMsg(call))).toEqual(call);
  });

  it("decodes each outcome", () => {
    for (const outcome of ["ok", "system_error", "actor_error"] as const) {
      expect(decodeResultMsg(encodeResultMsg({ id: SOME_ID, outcome, ret: "0x01" }))).toEqual({
        id: SOME_ID,
        outcome,
        ret: "0x01",
      });
    }
  });

  it("rejects an unknown outcome code", () => {
    const message = encodeAbiParameters(parseAbiParameters("bytes32, uint8, bytes"), [SOME_ID, 3, "0x"]);
    expect(() => decodeResultMsg(message)).toThrow(
      expect.objectContaining({ code: "INVALID_ENVELOPE", details: { reason: "malformed message" } }),
    );
  });

  it("rejects truncated data as malformed", () => {
    try {
      decodeCallMsg("0x1234");
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LinkedTokenError);
      expect((err as LinkedTokenError).message).toBe("Invalid envelope: malformed message");
      expect((err as LinkedTokenError).cause).toBeDefined();
    }
  });
});

describe("envelopeId", () => {
  it("is a 32-byte hash", () => {
    expect(envelopeId(callEnvelope())).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it("is deterministic", () => {
    expect(envelopeId(callEnvelope())).toBe(envelopeId(callEnvelope()));
  });

  it("changes with the nonce", () => {
    const first: IpcEnvelope = callEnvelope(undefined, { localNonce: 1n });
    const second: IpcEnvelope = callEnvelope(undefined, { localNonce: 2n });
    expect(envelopeId(first)).not.toBe(envelopeId(second));
  });
});
