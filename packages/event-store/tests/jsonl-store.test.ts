/**
 * Tests for JsonlEventStore.
 *
 * Verifies:
 * - Persistence: events survive store recreation
 * - Crash safety: torn lines are skipped, later appends still load
 * - Tampering: a broken chain refuses to open
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlEventStore } from "../src/jsonl-store.js";
import { EventStoreError } from "../src/types.js";
import { makeEvents } from "./helpers.js";

let testDir: string;
let testFile: string;

beforeEach(() => {
  testDir = join(tmpdir(), `linked-token-jsonl-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
  testFile = join(testDir, "nested", "events.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

describe("JsonlEventStore", () => {
  it("creates parent directories and the file on first append", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    expect(existsSync(testFile)).toBe(false);

    store.append("s", makeEvents(2));

    expect(readFileSync(testFile, "utf-8").trim().split("\n")).toHaveLength(2);
  });

  it("reloads events with versions, positions and hashes intact", () => {
    const first = new JsonlEventStore({ filePath: testFile });
    first.append("a", makeEvents(2));
    first.append("b", makeEvents(1));

    const reopened = new JsonlEventStore({ filePath: testFile });
    expect(reopened.globalPosition()).toBe(3);
    expect(reopened.streamVersion("a")).toBe(2);
    expect(reopened.readAll()).toEqual(first.readAll());
    expect(reopened.verifyIntegrity().valid).toBe(true);
  });

  it("continues the chain after reopening", () => {
    new JsonlEventStore({ filePath: testFile }).append("a", makeEvents(1));
    const reopened = new JsonlEventStore({ filePath: testFile });
    reopened.append("a", makeEvents(1));

    const again = new JsonlEventStore({ filePath: testFile });
    expect(again.globalPosition()).toBe(2);
    expect(again.verifyIntegrity().valid).toBe(true);
  });

  it("skips a torn final line and starts the next append on a fresh line", () => {
    new JsonlEventStore({ filePath: testFile }).append("a", makeEvents(1));
    appendFileSync(testFile, '{"event":{"type":"half');

    const recovered = new JsonlEventStore({ filePath: testFile });
    expect(recovered.globalPosition()).toBe(1);
    recovered.append("a", makeEvents(1));

    const again = new JsonlEventStore({ filePath: testFile });
    expect(again.globalPosition()).toBe(2);
    expect(again.verifyIntegrity().valid).toBe(true);
  });

  it("refuses to open a tampered log", () => {
    new JsonlEventStore({ filePath: testFile }).append("a", makeEvents(2));
    const lines = readFileSync(testFile, "utf-8").trim().split("\n");
    const tampered = JSON.parse(lines[0] ?? "") as { event: { payload: Record<string, unknown> } };
    tampered.event.payload = { amount: "1000000" };
    writeFileSync(testFile, [JSON.stringify(tampered), lines[1]].join("\n") + "\n");

    expect(() => new JsonlEventStore({ filePath: testFile })).toThrow(EventStoreError);
  });

  it("refuses records that are valid JSON but not stored events", () => {
    mkdirSync(join(testDir, "nested"), { recursive: true });
    writeFileSync(testFile, '{"hello":"world"}\n');
    expect(() => new JsonlEventStore({ filePath: testFile })).toThrow(/Malformed record at line 1/);
  });
});
