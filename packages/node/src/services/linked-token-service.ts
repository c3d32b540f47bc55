/**
 * LinkedTokenService: Composition root for the linked-token packages.
 *
 * Route handlers delegate to this service; they never import the
 * protocol directly. One service instance backs one token link.
 *
 * Wiring:
 * - BalanceBook stands in for the underlying token
 * - Custody mode picks the strategy: lock into the contract's vault, or burn/mint
 * - The event log is in memory, or a JSONL file that is replayed by `open()`
 * - Without a remote transport, outbound calls queue in an in-process gateway
 */

import type { Logger } from "pino";
import type {
  Address,
  IpcAddress,
  IpcEnvelope,
  SubnetId,
  TokenRef,
  TransferId,
  UnconfirmedTransfer,
} from "@linked-token/types";
import {
  InMemoryEventStore,
  JsonlEventStore,
  createLinkedTokenCatalog,
} from "@linked-token/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@linked-token/event-store";
import { BalanceBook, formatAmount, parseAmount } from "@linked-token/ledger";
import type { TransferFilter } from "@linked-token/ledger";
import {
  BurnMintStrategy,
  InProcessGateway,
  LinkConfig,
  LockVaultStrategy,
  TransferProtocol,
  sameAddress,
} from "@linked-token/protocol";
import type {
  CaptureReleaseStrategy,
  CustodyMode,
  EnvelopeOutcome,
  GmpTransport,
  InitiatedTransfer,
  LinkState,
} from "@linked-token/protocol";
import type { GenesisBalance } from "../config.js";
import { replayEvents } from "./replay.js";
import type { ReplaySummary } from "./replay.js";

// =============================================================================
// Configuration
// =============================================================================

export interface LinkedTokenServiceConfig {
  readonly owner: Address;
  /** Underlying token; its subnet is the local subnet */
  readonly token: TokenRef;
  /** This contract's address on the local subnet */
  readonly self: Address;
  readonly custody: CustodyMode;
  readonly linkedSubnet: SubnetId;
  /** Initialized on the owner's behalf when the link is still unset */
  readonly linkedContract?: Address | undefined;
  readonly genesisBalances?: readonly GenesisBalance[] | undefined;
  /** JSONL event log. In memory when omitted. */
  readonly eventLogPath?: string | undefined;
  /** Outbound transport. Default: an in-process gateway. */
  readonly transport?: GmpTransport | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => string) | undefined;
}

export interface BalanceView {
  readonly address: Address;
  readonly balance: string;
  readonly formatted: string;
  readonly symbol: string;
}

export interface CustodyView {
  readonly mode: CustodyMode;
  readonly totalSupply: string;
  /** Tokens held by the vault (lock mode only) */
  readonly locked?: string;
}

export interface ReadinessReport {
  readonly ready: boolean;
  readonly subsystems: {
    readonly eventStore: EventStoreIntegrityResult;
    readonly link: { readonly initialized: boolean };
    readonly recovery: { readonly complete: boolean };
  };
}

// =============================================================================
// Service
// =============================================================================

export class LinkedTokenService {
  readonly token: TokenRef;
  readonly self: IpcAddress;
  readonly book: BalanceBook;
  readonly link: LinkConfig;
  readonly eventStore: EventStore;
  readonly protocol: TransferProtocol;
  /** Set when no remote transport was given */
  readonly gateway: InProcessGateway | undefined;

  private readonly strategy: CaptureReleaseStrategy;
  private readonly vault: LockVaultStrategy | undefined;
  private readonly presetContract: Address | undefined;
  private readonly logger: Logger | undefined;
  private _recovered: boolean;

  /**
   * Build the service. A JSONL log that already holds events leaves the
   * service unready until `recover()` has replayed it; `open()` does both.
   */
  constructor(config: LinkedTokenServiceConfig) {
    this.token = config.token;
    this.self = { subnetId: config.token.subnetId, rawAddress: config.self };
    this.logger = config.logger;
    this.presetContract = config.linkedContract;

    this.book = new BalanceBook();
    for (const { holder, amount } of config.genesisBalances ?? []) {
      this.book.mint(holder, amount);
    }

    if (config.custody === "lock") {
      this.vault = new LockVaultStrategy(this.book, config.self);
      this.strategy = this.vault;
    } else {
      this.vault = undefined;
      this.strategy = new BurnMintStrategy(this.book);
    }

    const catalog = createLinkedTokenCatalog();
    this.eventStore =
      config.eventLogPath !== undefined
        ? new JsonlEventStore({ filePath: config.eventLogPath, catalog, now: config.now })
        : new InMemoryEventStore({ catalog, now: config.now });

    this.link = new LinkConfig({
      owner: config.owner,
      underlying: config.token,
      linkedSubnet: config.linkedSubnet,
    });

    let transport = config.transport;
    if (transport === undefined) {
      this.gateway = new InProcessGateway({ logger: config.logger });
      transport = this.gateway.transportFor(this.self);
    } else {
      this.gateway = undefined;
    }

    this.protocol = new TransferProtocol({
      link: this.link,
      strategy: this.strategy,
      transport,
      eventStore: this.eventStore,
      logger: config.logger,
      now: config.now,
    });
    this.gateway?.register(this.self, this.protocol);

    this._recovered = this.eventStore.globalPosition() === 0;
    if (this._recovered) {
      this.applyPresetLink();
    }
  }

  /**
   * Build the service and replay its event log.
   */
  static async open(config: LinkedTokenServiceConfig): Promise<LinkedTokenService> {
    const service = new LinkedTokenService(config);
    if (!service.recovered) {
      await service.recover();
    }
    return service;
  }

  get recovered(): boolean {
    return this._recovered;
  }

  /**
   * Replay the event log into the balance book, ledger and link.
   * Runs at most once.
   */
  async recover(): Promise<ReplaySummary> {
    if (this._recovered) {
      return { applied: 0, pending: this.protocol.ledger.size };
    }
    const summary = await replayEvents(this.eventStore.readAll(), {
      link: this.link,
      ledger: this.protocol.ledger,
      strategy: this.strategy,
    });
    this._recovered = true;
    this.logger?.info(
      { applied: summary.applied, pending: summary.pending, linkedContract: this.link.linkedContract },
      "Recovered state from event log",
    );
    this.applyPresetLink();
    return summary;
  }

  isReady(): ReadinessReport {
    const integrity = this.eventStore.verifyIntegrity();
    const initialized = this.link.initialized;
    return {
      ready: integrity.valid && initialized && this._recovered,
      subsystems: {
        eventStore: integrity,
        link: { initialized },
        recovery: { complete: this._recovered },
      },
    };
  }

  // ─── Transfers ─────────────────────────────────────────────────────

  /**
   * Start a transfer of `amount` (display units, e.g. "1.5") from
   * `sender` to `recipient` on the linked subnet.
   */
  initiateTransfer(sender: Address, recipient: Address, amount: string): Promise<InitiatedTransfer> {
    return this.protocol.initiateTransfer(sender, recipient, parseAmount(amount, this.token.decimals));
  }

  /** Inbound delivery from the transport. */
  deliver(envelope: IpcEnvelope): Promise<EnvelopeOutcome> {
    return this.protocol.handleEnvelope(envelope);
  }

  getTransfer(id: TransferId): UnconfirmedTransfer | undefined {
    return this.protocol.getUnconfirmedTransfer(id);
  }

  listTransfers(filter?: TransferFilter): readonly UnconfirmedTransfer[] {
    return this.protocol.listUnconfirmed(filter);
  }

  // ─── Administration ────────────────────────────────────────────────

  initializeLink(caller: Address, contract: Address): Address {
    return this.protocol.initializeLink(caller, contract);
  }

  reconfigureLink(caller: Address, contract: Address): Address {
    return this.protocol.reconfigureLink(caller, contract);
  }

  forceRemove(caller: Address, id: TransferId): Promise<UnconfirmedTransfer> {
    return this.protocol.forceRemove(caller, id);
  }

  linkState(): LinkState {
    return this.link.state();
  }

  custody(): CustodyView {
    const totalSupply = this.book.totalSupply.toString();
    if (this.vault !== undefined) {
      return { mode: this.strategy.mode, totalSupply, locked: this.vault.locked().toString() };
    }
    return { mode: this.strategy.mode, totalSupply };
  }

  // ─── Balances ──────────────────────────────────────────────────────

  balanceOf(address: Address): BalanceView {
    const balance = this.book.balanceOf(address);
    return {
      address,
      balance: balance.toString(),
      formatted: formatAmount(balance, this.token.decimals),
      symbol: this.token.symbol,
    };
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  /** Events of one stream: "link" or "transfer-<id>". */
  readStream(streamId: string): readonly StoredEvent[] {
    return this.eventStore.read(streamId);
  }

  verifyEvents(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private applyPresetLink(): void {
    const preset = this.presetContract;
    if (preset === undefined) return;

    const current = this.link.linkedContract;
    if (current === undefined) {
      this.protocol.initializeLink(this.link.owner, preset);
    } else if (!sameAddress(current, preset)) {
      this.logger?.warn(
        { configured: preset, recorded: current },
        "LINKED_CONTRACT differs from the event log; keeping the recorded contract",
      );
    }
  }
}
