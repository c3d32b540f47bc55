/**
 * @linked-token/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - EventCatalog with the linked-token event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  AppendResult,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { HashableEvent } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { EventStoreOptions } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Linked-token domain events
export { LINKED_TOKEN_EVENTS, createLinkedTokenCatalog } from "./linked-token-events.js";
export type {
  LinkedTokenEventType,
  LinkInitializedPayload,
  LinkReconfiguredPayload,
  TransferSentPayload,
  TransferReceivedPayload,
  TransferSettledPayload,
  TransferForceRemovedPayload,
} from "./linked-token-events.js";
