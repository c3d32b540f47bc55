/**
 * @linked-token/event-store: Event Catalog.
 *
 * Registry of every event type the system emits, with a payload
 * validator per type. A store built with a catalog refuses payloads
 * that don't match, so indexers can rely on the shapes.
 *
 * Each event type carries a schema version. Stored events keep the
 * version they were written with, so a future shape change can tell
 * old records apart.
 */

import type { EventMetadata } from "@linked-token/types";

/**
 * A versioned event schema.
 */
export interface EventSchema {
  /** Event type string (e.g., "transfer.sent") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which part of the system emits this event */
  readonly source: EventMetadata["source"];

  validate(payload: unknown): boolean;
}

/**
 * Centralized registry of domain event types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 * catalog.register({
 *   type: "transfer.sent",
 *   version: 1,
 *   description: "Tokens were captured and a call dispatched",
 *   source: "protocol",
 *   validate: (p) => typeof p === "object" && p !== null && "id" in p,
 * });
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a newer version replaces
   * the old one; an older version is rejected.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${String(schema.version)}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
      );
    }
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  /**
   * Validate a payload against its registered schema.
   *
   * @returns false for unregistered types
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

/**
 * Error thrown by catalog operations.
 */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
