/**
 * @linked-token/event-store: Linked-token domain event definitions.
 *
 * Naming convention: `<entity>.<action>`.
 * Payloads are JSON-safe: amounts and nonces are decimal strings,
 * addresses and ids are 0x-hex, subnets use their text form.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

export const LINKED_TOKEN_EVENTS = {
  LINK_INITIALIZED: "link.initialized",
  LINK_RECONFIGURED: "link.reconfigured",
  TRANSFER_SENT: "transfer.sent",
  TRANSFER_RECEIVED: "transfer.received",
  TRANSFER_SETTLED: "transfer.settled",
  TRANSFER_FORCE_REMOVED: "transfer.force_removed",
} as const;

export type LinkedTokenEventType =
  (typeof LINKED_TOKEN_EVENTS)[keyof typeof LINKED_TOKEN_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export interface LinkInitializedPayload {
  readonly underlying: string;
  readonly linkedSubnet: string;
  readonly linkedContract: string;
}

export interface LinkReconfiguredPayload {
  readonly previous: string;
  readonly linkedContract: string;
  /** Unconfirmed transfers at the moment of the change */
  readonly pendingTransfers: number;
}

export interface TransferSentPayload {
  readonly underlying: string;
  readonly sender: string;
  readonly recipient: string;
  readonly id: string;
  readonly nonce: string;
  readonly amount: string;
}

export interface TransferReceivedPayload {
  /** Identifier of the inbound call envelope */
  readonly id: string;
  readonly recipient: string;
  readonly amount: string;
}

export interface TransferSettledPayload {
  readonly id: string;
  readonly outcome: string;
  readonly refunded: boolean;
  readonly sender: string;
  readonly amount: string;
}

export interface TransferForceRemovedPayload {
  readonly id: string;
  readonly sender: string;
  readonly amount: string;
  readonly removedBy: string;
}

// =============================================================================
// Validation helpers
// =============================================================================

const DECIMAL_RE = /^\d+$/;

function isObject(p: unknown): p is Record<string, unknown> {
  return typeof p === "object" && p !== null;
}

function hasString(p: Record<string, unknown>, key: string): boolean {
  return typeof p[key] === "string";
}

function hasDecimal(p: Record<string, unknown>, key: string): boolean {
  const v = p[key];
  return typeof v === "string" && DECIMAL_RE.test(v);
}

// =============================================================================
// Schemas
// =============================================================================

const LINK_SCHEMAS: readonly EventSchema[] = [
  {
    type: LINKED_TOKEN_EVENTS.LINK_INITIALIZED,
    version: 1,
    description: "The linked contract was set for the first time",
    source: "admin",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "underlying") &&
      hasString(p, "linkedSubnet") &&
      hasString(p, "linkedContract"),
  },
  {
    type: LINKED_TOKEN_EVENTS.LINK_RECONFIGURED,
    version: 1,
    description: "The owner replaced the linked contract",
    source: "admin",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "previous") &&
      hasString(p, "linkedContract") &&
      typeof p["pendingTransfers"] === "number",
  },
];

const TRANSFER_SCHEMAS: readonly EventSchema[] = [
  {
    type: LINKED_TOKEN_EVENTS.TRANSFER_SENT,
    version: 1,
    description: "Tokens were captured and a receive call dispatched",
    source: "protocol",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "underlying") &&
      hasString(p, "sender") &&
      hasString(p, "recipient") &&
      hasString(p, "id") &&
      hasDecimal(p, "nonce") &&
      hasDecimal(p, "amount"),
  },
  {
    type: LINKED_TOKEN_EVENTS.TRANSFER_RECEIVED,
    version: 1,
    description: "An authenticated receive call released tokens",
    source: "transport",
    validate: (p) =>
      isObject(p) && hasString(p, "id") && hasString(p, "recipient") && hasDecimal(p, "amount"),
  },
  {
    type: LINKED_TOKEN_EVENTS.TRANSFER_SETTLED,
    version: 1,
    description: "A result arrived and the unconfirmed transfer was settled",
    source: "transport",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "id") &&
      hasString(p, "outcome") &&
      typeof p["refunded"] === "boolean" &&
      hasString(p, "sender") &&
      hasDecimal(p, "amount"),
  },
  {
    type: LINKED_TOKEN_EVENTS.TRANSFER_FORCE_REMOVED,
    version: 1,
    description: "The owner removed an unconfirmed transfer without refund",
    source: "admin",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "id") &&
      hasString(p, "sender") &&
      hasDecimal(p, "amount") &&
      hasString(p, "removedBy"),
  },
];

/**
 * Create a catalog with every linked-token event registered at version 1.
 */
export function createLinkedTokenCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [...LINK_SCHEMAS, ...TRANSFER_SCHEMAS]) {
    catalog.register(schema);
  }
  return catalog;
}
