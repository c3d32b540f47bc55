/**
 * @linked-token/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Also the base of JsonlEventStore, which overrides `persist()` to
 * write each batch to disk before it becomes visible.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Synchronous subscription dispatch
 * - No durability guarantees
 */

import type { DomainEvent } from "@linked-token/types";
import type { EventCatalog } from "./catalog.js";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface EventStoreOptions {
  /**
   * When set, every appended payload must pass the catalog schema for
   * its type. Unregistered types are rejected.
   */
  readonly catalog?: EventCatalog | undefined;

  /** Clock for `appendedAt`. Defaults to wall time. */
  readonly now?: (() => string) | undefined;
}

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _subscribers = new Set<EventHandler>();

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  private readonly _catalog: EventCatalog | undefined;
  private readonly _now: () => string;

  constructor(options?: EventStoreOptions) {
    this._catalog = options?.catalog;
    this._now = options?.now ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    if (this._catalog !== undefined) {
      for (const event of events) {
        if (!this._catalog.validate(event.type, event.payload)) {
          throw new EventStoreError(
            "INVALID_PAYLOAD",
            `Payload of "${event.type}" does not match its catalog schema`,
            streamId,
          );
        }
      }
    }

    const currentVersion = this.streamVersion(streamId);
    const appendedAt = this._now();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: currentVersion + i + 1,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      stored.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    // Nothing becomes visible unless persistence succeeded
    this.persist(stored);
    this._commit(stored);

    for (const handler of this._subscribers) {
      for (const event of stored) {
        handler(event);
      }
    }

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + events.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    return [...(this._streams.get(streamId) ?? [])];
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const type = options?.type;

    let result = this._globalLog.filter(
      (e) => e.globalPosition >= fromPosition && (type === undefined || e.event.type === type),
    );

    const maxCount = options?.maxCount;
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Durably write a fully built batch. Throwing aborts the append.
   * The in-memory store keeps nothing outside the process.
   */
  protected persist(_events: readonly StoredEvent[]): void {}

  /**
   * Load previously persisted events (already chain-verified by the caller).
   */
  protected restore(events: readonly StoredEvent[]): void {
    this._commit(events);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _commit(events: readonly StoredEvent[]): void {
    for (const event of events) {
      let stream = this._streams.get(event.streamId);
      if (stream === undefined) {
        stream = [];
        this._streams.set(event.streamId, stream);
      }
      stream.push(event);
      this._globalLog.push(event);
      this._lastHash = event.hash;
    }
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }
}
