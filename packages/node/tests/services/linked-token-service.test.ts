/**
 * LinkedTokenService tests: recovery from a JSONL event log.
 *
 * A first service runs a mix of transfers against a log file; a second
 * service opened on the same file must end up with the same balances,
 * the same unconfirmed transfers and the same link.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "pino";
import type { TransferId } from "@linked-token/types";
import type { StoredEvent } from "@linked-token/event-store";
import { EventStoreError } from "@linked-token/event-store";
import { BalanceBook, UnconfirmedTransferLedger } from "@linked-token/ledger";
import { BurnMintStrategy, LinkConfig } from "@linked-token/protocol";
import { LinkedTokenService } from "../../src/services/linked-token-service.js";
import { replayEvents } from "../../src/services/replay.js";
import { EnvelopeSchema } from "../../src/types/wire.js";
import {
  ALICE,
  BOB,
  LINKED_CONTRACT,
  LINKED_SUBNET,
  NOW,
  OWNER,
  SELF,
  TOKEN,
  LOCAL_SUBNET,
  callEnvelope,
  resultEnvelope,
  testServiceConfig,
} from "../setup.js";

let testDir: string;
let logPath: string;

beforeEach(() => {
  testDir = join(tmpdir(), `linked-token-service-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
  logPath = join(testDir, "events.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function mockLogger() {
  const warn = vi.fn();
  const logger = { info: vi.fn(), warn, error: vi.fn(), debug: vi.fn() } as unknown as Logger;
  return { logger, warn };
}

/**
 * ALICE sends 100 (left pending), 50 (settled), 40 (refunded) and
 * 10 (force-removed); BOB receives 10 from the linked side.
 */
async function runHistory(service: LinkedTokenService): Promise<TransferId> {
  const pending = await service.initiateTransfer(ALICE, BOB, "100");
  const settled = await service.initiateTransfer(ALICE, BOB, "50");
  const refunded = await service.initiateTransfer(ALICE, BOB, "40");

  await service.deliver(EnvelopeSchema.parse(resultEnvelope(settled.id, "ok")));
  await service.deliver(EnvelopeSchema.parse(resultEnvelope(refunded.id, "actor_error")));

  const removed = await service.initiateTransfer(ALICE, BOB, "10");
  await service.forceRemove(OWNER, removed.id);

  await service.deliver(EnvelopeSchema.parse(callEnvelope(BOB, 10_000_000n)));
  return pending.id;
}

describe("LinkedTokenService recovery", () => {
  it("starts ready on an empty log", async () => {
    const service = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));

    expect(service.recovered).toBe(true);
    expect(service.isReady().ready).toBe(true);
    expect(service.readEvents().map((e) => e.event.type)).toEqual(["link.initialized"]);
  });

  it("rebuilds balances, transfers and link from the log", async () => {
    const first = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));
    const pendingId = await runHistory(first);

    expect(first.balanceOf(ALICE).balance).toBe("840000000");
    expect(first.balanceOf(SELF).balance).toBe("150000000");
    expect(first.balanceOf(BOB).balance).toBe("10000000");
    expect(first.readEvents()).toHaveLength(9);

    const second = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));

    expect(second.balanceOf(ALICE).balance).toBe("840000000");
    expect(second.balanceOf(SELF).balance).toBe("150000000");
    expect(second.balanceOf(BOB).balance).toBe("10000000");
    expect(second.listTransfers()).toEqual(first.listTransfers());
    expect(second.getTransfer(pendingId)?.createdAt).toBe(NOW);
    expect(second.linkState().linkedContract).toBe(LINKED_CONTRACT);
    expect(second.readEvents()).toHaveLength(9);
    expect(second.isReady().ready).toBe(true);
  });

  it("settles a transfer sent before the restart", async () => {
    const first = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));
    const pendingId = await runHistory(first);

    const second = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));
    const outcome = await second.deliver(EnvelopeSchema.parse(resultEnvelope(pendingId, "system_error")));

    expect(outcome.kind).toBe("result");
    expect(second.balanceOf(ALICE).balance).toBe("940000000");
    expect(second.listTransfers()).toHaveLength(0);
  });

  it("keeps a reconfigured contract over the configured one", async () => {
    const other = "0x5000000000000000000000000000000000000005";
    const first = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));
    first.reconfigureLink(OWNER, other);

    const { logger, warn } = mockLogger();
    const second = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath, logger }));

    expect(second.linkState().linkedContract).toBe(other);
    expect(warn).toHaveBeenCalledWith(
      { configured: LINKED_CONTRACT, recorded: other },
      "LINKED_CONTRACT differs from the event log; keeping the recorded contract",
    );
  });

  it("is not ready until recover() has run", async () => {
    const first = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));
    await first.initiateTransfer(ALICE, BOB, "1");

    const second = new LinkedTokenService(testServiceConfig({ eventLogPath: logPath }));
    const before = second.isReady();
    expect(before.ready).toBe(false);
    expect(before.subsystems.recovery.complete).toBe(false);

    const summary = await second.recover();
    expect(summary).toEqual({ applied: 2, pending: 1 });
    expect(second.isReady().ready).toBe(true);

    expect(await second.recover()).toEqual({ applied: 0, pending: 1 });
    expect(second.balanceOf(ALICE).balance).toBe("999000000");
  });

  it("initializes the link on a log that never recorded one", async () => {
    const first = await LinkedTokenService.open(
      testServiceConfig({ eventLogPath: logPath, linkedContract: undefined }),
    );
    expect(first.isReady().subsystems.link.initialized).toBe(false);

    const second = await LinkedTokenService.open(testServiceConfig({ eventLogPath: logPath }));
    expect(second.linkState().linkedContract).toBe(LINKED_CONTRACT);
    expect(second.readEvents().map((e) => e.event.type)).toEqual(["link.initialized"]);
  });
});

describe("LinkedTokenService custody", () => {
  it("reports the vault in lock mode", async () => {
    const service = new LinkedTokenService(testServiceConfig());
    await service.initiateTransfer(ALICE, BOB, "2.5");

    expect(service.custody()).toEqual({ mode: "lock", totalSupply: "1000000000", locked: "2500000" });
  });

  it("burns on capture in mint mode", async () => {
    const service = new LinkedTokenService(testServiceConfig({ custody: "mint" }));
    await service.initiateTransfer(ALICE, BOB, "2.5");

    expect(service.custody()).toEqual({ mode: "mint", totalSupply: "997500000" });
    expect(service.balanceOf(ALICE)).toEqual({
      address: ALICE,
      balance: "997500000",
      formatted: "997.500000",
      symbol: "LTK",
    });
  });
});

describe("replayEvents", () => {
  it("refuses an event whose payload does not parse", async () => {
    const stored: StoredEvent = {
      event: {
        type: "transfer.sent",
        metadata: {
          eventId: "evt-1",
          timestamp: NOW,
          actor: ALICE,
          correlationId: "0x12",
          source: "protocol",
        },
        payload: { id: "0x12" },
      },
      streamId: "transfer-0x12",
      version: 1,
      globalPosition: 1,
      appendedAt: NOW,
      hash: "h1",
      previousHash: "h0",
    };
    const target = {
      link: new LinkConfig({
        owner: OWNER,
        underlying: { subnetId: LOCAL_SUBNET, address: TOKEN, symbol: "LTK", decimals: 6 },
        linkedSubnet: LINKED_SUBNET,
      }),
      ledger: new UnconfirmedTransferLedger(),
      strategy: new BurnMintStrategy(new BalanceBook()),
    };

    try {
      await replayEvents([stored], target);
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      expect((err as EventStoreError).code).toBe("CORRUPT_LOG");
    }
  });
});
