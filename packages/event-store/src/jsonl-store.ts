/**
 * @linked-token/event-store: File-based JSONL EventStore.
 *
 * One JSON object per line, hash-chained. The file is the source of
 * truth; the in-memory index is rebuilt from it on construction and the
 * chain is verified before the store accepts writes.
 *
 * Crash safety:
 * - Each batch is written with a single append + fsync before it becomes visible
 * - A torn line (partial write) is skipped on load; the next append starts on a fresh line
 * - A broken chain refuses to open the log
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@linked-token/types";
import type { EventStoreOptions } from "./in-memory-store.js";
import { InMemoryEventStore } from "./in-memory-store.js";
import { verifyHashChain } from "./hash-chain.js";
import type { StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";

export interface JsonlEventStoreOptions extends EventStoreOptions {
  /** Path to the JSONL file. Parent directories are created. */
  readonly filePath: string;
}

export class JsonlEventStore extends InMemoryEventStore {
  private readonly _filePath: string;
  private _tornTail = false;

  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });

    const events = this._load();
    const integrity = verifyHashChain(events);
    if (!integrity.valid) {
      const first = integrity.errors[0];
      throw new EventStoreError(
        "CORRUPT_LOG",
        `Event log ${this._filePath} failed verification: ${first?.reason ?? "unknown"}`,
      );
    }
    this.restore(events);
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override persist(events: readonly StoredEvent[]): void {
    const prefix = this._tornTail ? "\n" : "";
    const lines = prefix + events.map((e) => JSON.stringify(e)).join("\n") + "\n";
    let fd: number | undefined;
    try {
      fd = openSync(this._filePath, "a");
      appendFileSync(fd, lines, "utf-8");
      fsyncSync(fd);
      this._tornTail = false;
    } catch (err) {
      throw new EventStoreError(
        "WRITE_FAILED",
        `Failed to write ${this._filePath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }

  private _load(): StoredEvent[] {
    if (!existsSync(this._filePath)) {
      return [];
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._tornTail = content.length > 0 && !content.endsWith("\n");

    const events: StoredEvent[] = [];
    content.split("\n").forEach((line, index) => {
      if (line.trim() === "") {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        // torn write from a crash mid-append; never acknowledged
        return;
      }
      if (!isStoredEvent(parsed)) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Malformed record at line ${index + 1} of ${this._filePath}`,
        );
      }
      events.push(parsed);
    });

    return events;
  }
}

function isStoredEvent(value: unknown): value is StoredEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDomainEvent(v.event) &&
    typeof v.streamId === "string" &&
    typeof v.version === "number" &&
    typeof v.globalPosition === "number" &&
    typeof v.appendedAt === "string" &&
    typeof v.hash === "string" &&
    typeof v.previousHash === "string"
  );
}
