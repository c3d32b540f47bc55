/**
 * Event Types
 *
 * Every observable state change of the protocol is captured as a
 * DomainEvent and appended to the event log.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which transfer)
 * - Payloads are JSON-safe: bigints travel as decimal strings
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event (an address, or "transport") */
  readonly actor: string;

  /** Groups events of the same transfer (the transfer id) or link ("link") */
  readonly correlationId: string;

  /** Which part of the system emitted this event */
  readonly source: "protocol" | "transport" | "admin";
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "transfer.sent", "link.initialized") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
