/**
 * @linked-token/types: Shared domain types for the linked-token stack.
 *
 * These types are used across all packages:
 * - Subnet identifiers and transport addresses
 * - Envelopes, call and result messages
 * - Unconfirmed transfer records
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types: meaning lives in consuming code
 */

// Address types
export type { Hex, Address, SubnetId, IpcAddress } from "./address.js";
export { ZERO_ADDRESS } from "./address.js";

// Envelope types
export type {
  EnvelopeKind,
  OutcomeType,
  IpcEnvelope,
  CallMsg,
  ResultMsg,
} from "./envelope.js";

// Transfer types
export type { TransferId, UnconfirmedTransfer, TokenRef } from "./transfer.js";

// Event types
export type { DomainEvent, EventMetadata } from "./event.js";

// Runtime type guards
export {
  isHex,
  isAddress,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
