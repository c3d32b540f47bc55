/**
 * ABI codec for envelope payloads.
 *
 * - CallMsg    → (bytes method, bytes params)
 * - ResultMsg  → (bytes32 id, uint8 outcome, bytes ret)
 * - receive    → receiveLinked(address recipient, uint256 amount)
 * - Envelope id = keccak256 of the ABI-encoded envelope
 *
 * Decoders throw INVALID_ENVELOPE ("malformed message") on bad input.
 */

import {
  decodeAbiParameters,
  encodeAbiParameters,
  keccak256,
  parseAbiItem,
  parseAbiParameters,
  size,
  slice,
  toFunctionSelector,
} from "viem";
import type {
  Address,
  CallMsg,
  EnvelopeKind,
  Hex,
  IpcAddress,
  IpcEnvelope,
  OutcomeType,
  ResultMsg,
  TransferId,
} from "@linked-token/types";
import { invalidEnvelope } from "./errors.js";

// =============================================================================
// Receive method
// =============================================================================

export const RECEIVE_SIGNATURE = "receiveLinked(address,uint256)";

const RECEIVE_LINKED = parseAbiItem("function receiveLinked(address recipient, uint256 amount)");

/** First 4 bytes of keccak256("receiveLinked(address,uint256)"). */
export const RECEIVE_SELECTOR: Hex = toFunctionSelector(RECEIVE_LINKED);

export const SELECTOR_SIZE = 4;

const RECEIVE_PARAMS = parseAbiParameters("address recipient, uint256 amount");

export interface ReceiveParams {
  readonly recipient: Address;
  readonly amount: bigint;
}

export function encodeReceiveParams(recipient: Address, amount: bigint): Hex {
  return encodeAbiParameters(RECEIVE_PARAMS, [recipient, amount]);
}

export function decodeReceiveParams(params: Hex): ReceiveParams {
  try {
    const [recipient, amount] = decodeAbiParameters(RECEIVE_PARAMS, params);
    return { recipient, amount };
  } catch (err) {
    throw invalidEnvelope("malformed message", err);
  }
}

/** The call payload of an outbound transfer. */
export function buildReceiveCall(recipient: Address, amount: bigint): CallMsg {
  return { method: RECEIVE_SELECTOR, params: encodeReceiveParams(recipient, amount) };
}

// =============================================================================
// CallMsg / ResultMsg
// =============================================================================

const CALL_MSG = parseAbiParameters("bytes method, bytes params");
const RESULT_MSG = parseAbiParameters("bytes32 id, uint8 outcome, bytes ret");

const OUTCOMES: readonly OutcomeType[] = ["ok", "system_error", "actor_error"];

export function encodeCallMsg(call: CallMsg): Hex {
  return encodeAbiParameters(CALL_MSG, [call.method, call.params]);
}

export function decodeCallMsg(message: Hex): CallMsg {
  try {
    const [method, params] = decodeAbiParameters(CALL_MSG, message);
    return { method, params };
  } catch (err) {
    throw invalidEnvelope("malformed message", err);
  }
}

export function encodeResultMsg(result: ResultMsg): Hex {
  return encodeAbiParameters(RESULT_MSG, [result.id, OUTCOMES.indexOf(result.outcome), result.ret]);
}

export function decodeResultMsg(message: Hex): ResultMsg {
  let decoded: readonly [Hex, number, Hex];
  try {
    decoded = decodeAbiParameters(RESULT_MSG, message);
  } catch (err) {
    throw invalidEnvelope("malformed message", err);
  }
  const [id, outcomeIndex, ret] = decoded;
  const outcome = OUTCOMES[outcomeIndex];
  if (outcome === undefined) {
    throw invalidEnvelope("malformed message");
  }
  return { id, outcome, ret };
}

// =============================================================================
// Selector
// =============================================================================

/** Byte length of a hex payload. */
export function byteLength(data: Hex): number {
  return size(data);
}

/** First 4 bytes of `method`. Caller checks the length first. */
export function selectorOf(method: Hex): Hex {
  return slice(method, 0, SELECTOR_SIZE);
}

// =============================================================================
// Envelope identity
// =============================================================================

const KINDS: readonly EnvelopeKind[] = ["transfer", "call", "result"];

const IPC_ADDRESS = {
  type: "tuple",
  components: [
    {
      name: "subnetId",
      type: "tuple",
      components: [
        { name: "root", type: "uint64" },
        { name: "route", type: "address[]" },
      ],
    },
    { name: "rawAddress", type: "address" },
  ],
} as const;

const ENVELOPE = [
  { name: "kind", type: "uint8" },
  { name: "localNonce", type: "uint64" },
  { name: "originalNonce", type: "uint64" },
  { name: "value", type: "uint256" },
  { name: "from", ...IPC_ADDRESS },
  { name: "to", ...IPC_ADDRESS },
  { name: "message", type: "bytes" },
] as const;

function addressTuple(address: IpcAddress) {
  return {
    subnetId: { root: address.subnetId.root, route: address.subnetId.route },
    rawAddress: address.rawAddress,
  };
}

export function encodeEnvelope(envelope: IpcEnvelope): Hex {
  return encodeAbiParameters(ENVELOPE, [
    KINDS.indexOf(envelope.kind),
    envelope.localNonce,
    envelope.originalNonce,
    envelope.value,
    addressTuple(envelope.from),
    addressTuple(envelope.to),
    envelope.message,
  ]);
}

/** Stable 32-byte identifier of a dispatched envelope. */
export function envelopeId(envelope: IpcEnvelope): TransferId {
  return keccak256(encodeEnvelope(envelope));
}
