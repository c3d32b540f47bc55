/**
 * Transport contract.
 *
 * The GMP transport routes envelopes, assigns nonces and guarantees
 * each envelope is delivered at most once. The protocol only dispatches
 * outbound calls and receives inbound envelopes.
 */

import type { CallMsg, IpcAddress, IpcEnvelope } from "@linked-token/types";

export interface GmpTransport {
  /**
   * Send `call` to `to` with `value` attached. Resolves with the
   * envelope as committed by the transport (nonce assigned).
   */
  dispatch(to: IpcAddress, call: CallMsg, value: bigint): Promise<IpcEnvelope>;

  /**
   * Take back a dispatched envelope that has not been delivered yet.
   * Returns false when it already left. Transports that hand envelopes
   * off immediately leave this out.
   */
  withdraw?(envelope: IpcEnvelope): boolean;
}

/** Receiver side of the transport. Throwing rejects the envelope. */
export interface EnvelopeHandler {
  handleEnvelope(envelope: IpcEnvelope): Promise<unknown>;
}
