/**
 * Shared fixtures for protocol tests.
 *
 * Two subnets joined by an in-process gateway:
 * - root subnet: token native, lock-vault custody
 * - child subnet: wrapped token, burn-mint custody
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address, CallMsg, IpcAddress, IpcEnvelope, OutcomeType, SubnetId, TokenRef } from "@linked-token/types";
import { InMemoryEventStore, createLinkedTokenCatalog } from "@linked-token/event-store";
import { BalanceBook } from "@linked-token/ledger";
import {
  BurnMintStrategy,
  InProcessGateway,
  LinkConfig,
  LockVaultStrategy,
  TransferProtocol,
  buildReceiveCall,
  encodeCallMsg,
  encodeResultMsg,
} from "../src/index.js";
import type { InitiatedTransfer } from "../src/index.js";

// ─── Addresses ───────────────────────────────────────────────────────────

export const OWNER: Address = "0x9999999999999999999999999999999999999999";
export const ALICE: Address = "0x1111111111111111111111111111111111111111";
export const BOB: Address = "0x2222222222222222222222222222222222222222";
export const MALLORY: Address = "0x6666666666666666666666666666666666666666";
export const ORIGIN_CONTRACT: Address = "0x1000000000000000000000000000000000000001";
export const DEST_CONTRACT: Address = "0x2000000000000000000000000000000000000002";
export const CHILD_GATEWAY: Address = "0x3000000000000000000000000000000000000003";
export const TOKEN: Address = "0x4000000000000000000000000000000000000004";

export const ROOT: SubnetId = { root: 314159n, route: [] };
export const CHILD: SubnetId = { root: 314159n, route: [CHILD_GATEWAY] };
export const OTHER_CHILD: SubnetId = {
  root: 314159n,
  route: ["0x5000000000000000000000000000000000000005"],
};

export const ORIGIN: IpcAddress = { subnetId: ROOT, rawAddress: ORIGIN_CONTRACT };
export const DESTINATION: IpcAddress = { subnetId: CHILD, rawAddress: DEST_CONTRACT };

export const UNDERLYING: TokenRef = { subnetId: ROOT, address: TOKEN, symbol: "TKN", decimals: 18 };

export const NOW = "2026-03-01T12:00:00.000Z";
export const STARTING_BALANCE = 1_000n;

// ─── Log capture ─────────────────────────────────────────────────────────

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

// ─── Bridge ──────────────────────────────────────────────────────────────

export interface Bridge {
  readonly gateway: InProcessGateway;
  readonly origin: TransferProtocol;
  readonly destination: TransferProtocol;
  readonly originBook: BalanceBook;
  readonly destinationBook: BalanceBook;
  readonly originEvents: InMemoryEventStore;
  readonly destinationEvents: InMemoryEventStore;
}

export interface BridgeOptions {
  readonly initialize?: boolean;
  readonly logger?: Logger;
}

export function createBridge(options: BridgeOptions = {}): Bridge {
  const gateway = new InProcessGateway();
  const catalog = createLinkedTokenCatalog();

  const originBook = new BalanceBook();
  originBook.mint(ALICE, STARTING_BALANCE);
  const originEvents = new InMemoryEventStore({ catalog, now: () => NOW });
  const origin = new TransferProtocol({
    link: new LinkConfig({ owner: OWNER, underlying: UNDERLYING, linkedSubnet: CHILD }),
    strategy: new LockVaultStrategy(originBook, ORIGIN_CONTRACT),
    transport: gateway.transportFor(ORIGIN),
    eventStore: originEvents,
    logger: options.logger,
    now: () => NOW,
  });

  const destinationBook = new BalanceBook();
  const destinationEvents = new InMemoryEventStore({ catalog, now: () => NOW });
  const destination = new TransferProtocol({
    link: new LinkConfig({
      owner: OWNER,
      underlying: { ...UNDERLYING, subnetId: CHILD },
      linkedSubnet: ROOT,
    }),
    strategy: new BurnMintStrategy(destinationBook),
    transport: gateway.transportFor(DESTINATION),
    eventStore: destinationEvents,
    now: () => NOW,
  });

  gateway.register(ORIGIN, origin);
  gateway.register(DESTINATION, destination);

  if (options.initialize !== false) {
    origin.initializeLink(OWNER, DEST_CONTRACT);
    destination.initializeLink(OWNER, ORIGIN_CONTRACT);
  }

  return {
    gateway,
    origin,
    destination,
    originBook,
    destinationBook,
    originEvents,
    destinationEvents,
  };
}

// ─── Envelope builders ───────────────────────────────────────────────────

/** A result envelope answering `initiated`, as the destination would send it. */
export function resultFor(
  initiated: InitiatedTransfer,
  outcome: OutcomeType,
  overrides: Partial<IpcEnvelope> = {},
): IpcEnvelope {
  return {
    kind: "result",
    localNonce: 0n,
    originalNonce: initiated.envelope.localNonce,
    value: 0n,
    from: DESTINATION,
    to: ORIGIN,
    message: encodeResultMsg({ id: initiated.id, outcome, ret: "0x" }),
    ...overrides,
  };
}

/** An inbound receive call from the root-side contract to the child side. */
export function callEnvelope(
  call: CallMsg = buildReceiveCall(BOB, 100n),
  overrides: Partial<IpcEnvelope> = {},
): IpcEnvelope {
  return {
    kind: "call",
    localNonce: 7n,
    originalNonce: 0n,
    value: 0n,
    from: ORIGIN,
    to: DESTINATION,
    message: encodeCallMsg(call),
    ...overrides,
  };
}
