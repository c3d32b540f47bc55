/**
 * Envelope Types
 *
 * Transport-level message units carried between subnets.
 * Envelopes are read-only inputs to the protocol: the transport
 * creates them, assigns nonces, and delivers them.
 */

import type { Hex, IpcAddress } from "./address.js";

/**
 * Kind of envelope.
 *
 * - "transfer": plain value transfer, no payload semantics
 * - "call": invoke a method on the destination contract
 * - "result": outcome of a previously dispatched call, sent back to its origin
 */
export type EnvelopeKind = "transfer" | "call" | "result";

/**
 * Transport verdict on a dispatched call.
 *
 * "ok" is the only success outcome; both error variants trigger a refund.
 */
export type OutcomeType = "ok" | "system_error" | "actor_error";

export interface IpcEnvelope {
  readonly kind: EnvelopeKind;

  /** Sequence number assigned by the transport on the origin subnet */
  readonly localNonce: bigint;

  /** For results: nonce of the envelope being answered. Otherwise 0. */
  readonly originalNonce: bigint;

  /** Value attached to the envelope (smallest unit) */
  readonly value: bigint;

  readonly from: IpcAddress;
  readonly to: IpcAddress;

  /** ABI-encoded CallMsg or ResultMsg, depending on kind */
  readonly message: Hex;
}

/**
 * Payload of a call envelope.
 */
export interface CallMsg {
  /** Method selector, normally 4 bytes. Validated by the receiver. */
  readonly method: Hex;

  /** ABI-encoded method arguments */
  readonly params: Hex;
}

/**
 * Payload of a result envelope.
 */
export interface ResultMsg {
  /** Identifier of the call envelope this result answers */
  readonly id: Hex;

  readonly outcome: OutcomeType;

  /** Return data (or revert data) produced by the destination */
  readonly ret: Hex;
}
