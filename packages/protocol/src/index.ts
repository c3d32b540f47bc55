/**
 * @linked-token/protocol: Cross-subnet linked token transfers.
 *
 * Tokens are captured on the origin subnet, a receive call is dispatched
 * through the GMP transport to the linked contract, and the transfer
 * stays unconfirmed until the transport reports the outcome: success
 * keeps the capture, failure refunds the sender.
 *
 * Design rules:
 * - Inbound envelopes are authenticated by origin subnet, origin
 *   contract and method selector
 * - Every entry point applies fully or throws with no state change
 * - A transfer is settled exactly once
 */

// Protocol
export { TransferProtocol } from "./transfer-protocol.js";
export type {
  TransferProtocolOptions,
  InitiatedTransfer,
  ReceivedTransfer,
  Settlement,
  EnvelopeOutcome,
} from "./transfer-protocol.js";

// Link configuration
export { LinkConfig } from "./link-config.js";
export type { LinkConfigInit, LinkState } from "./link-config.js";

// Authentication
export { MessageAuthenticator } from "./authenticator.js";

// Capture/release
export { LockVaultStrategy, BurnMintStrategy } from "./strategy.js";
export type { CaptureReleaseStrategy, CustodyMode } from "./strategy.js";

// Transport
export type { GmpTransport, EnvelopeHandler } from "./transport.js";
export { InProcessGateway } from "./in-process-gateway.js";
export type { DeliveryReport, InProcessGatewayOptions } from "./in-process-gateway.js";

// Codec
export {
  RECEIVE_SIGNATURE,
  RECEIVE_SELECTOR,
  buildReceiveCall,
  encodeReceiveParams,
  decodeReceiveParams,
  encodeCallMsg,
  decodeCallMsg,
  encodeResultMsg,
  decodeResultMsg,
  encodeEnvelope,
  envelopeId,
} from "./codec.js";
export type { ReceiveParams } from "./codec.js";

// Subnets
export {
  normalizeAddress,
  sameAddress,
  isZeroAddress,
  subnetEquals,
  formatSubnetId,
  parseSubnetId,
  formatIpcAddress,
  SubnetParseError,
} from "./subnet.js";

// Errors
export { LinkedTokenError, invalidEnvelope, isLinkedTokenError } from "./errors.js";
export type { LinkedTokenErrorCode, ErrorCategory, InvalidEnvelopeReason } from "./errors.js";
