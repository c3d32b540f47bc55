/**
 * TransferProtocol: the transfer lifecycle.
 *
 *   None ──initiateTransfer──▶ Pending ──result / forceRemove──▶ (removed)
 *
 * Entry points:
 * - initiateTransfer: capture, dispatch receive call, record as unconfirmed
 * - handleEnvelope:   inbound call (release to recipient) or result (settle)
 * - forceRemove:      owner drops a stuck record without refund
 * - initializeLink / reconfigureLink: owner-gated link setup
 *
 * Every entry point either fully applies or throws with no state change.
 * Its event is appended before the change is committed, or the change
 * is undone when the append fails.
 * Settlement and forced removal of one id are serialized through a
 * per-id mutex and delete the record with compare-and-delete, so a
 * record is settled exactly once.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type {
  Address,
  DomainEvent,
  EventMetadata,
  IpcEnvelope,
  OutcomeType,
  TransferId,
  UnconfirmedTransfer,
} from "@linked-token/types";
import type { EventStore } from "@linked-token/event-store";
import { LINKED_TOKEN_EVENTS } from "@linked-token/event-store";
import type {
  LinkInitializedPayload,
  LinkReconfiguredPayload,
  TransferForceRemovedPayload,
  TransferReceivedPayload,
  TransferSentPayload,
  TransferSettledPayload,
} from "@linked-token/event-store";
import type { TransferFilter } from "@linked-token/ledger";
import { KeyedMutex, TransferLedgerError, UnconfirmedTransferLedger } from "@linked-token/ledger";
import { MessageAuthenticator } from "./authenticator.js";
import {
  buildReceiveCall,
  decodeCallMsg,
  decodeReceiveParams,
  decodeResultMsg,
  envelopeId,
} from "./codec.js";
import { LinkedTokenError, invalidEnvelope, isLinkedTokenError } from "./errors.js";
import type { LinkConfig } from "./link-config.js";
import type { CaptureReleaseStrategy } from "./strategy.js";
import { formatSubnetId, isZeroAddress, normalizeAddress } from "./subnet.js";
import type { EnvelopeHandler, GmpTransport } from "./transport.js";

// =============================================================================
// Types
// =============================================================================

export interface TransferProtocolOptions {
  readonly link: LinkConfig;
  readonly strategy: CaptureReleaseStrategy;
  readonly transport: GmpTransport;
  readonly ledger?: UnconfirmedTransferLedger | undefined;
  /** When set, every state change is appended as a domain event. */
  readonly eventStore?: EventStore | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => string) | undefined;
}

export interface InitiatedTransfer {
  readonly id: TransferId;
  readonly envelope: IpcEnvelope;
  readonly transfer: UnconfirmedTransfer;
}

export interface ReceivedTransfer {
  /** Identifier of the inbound call envelope */
  readonly id: TransferId;
  readonly recipient: Address;
  readonly amount: bigint;
}

export interface Settlement {
  readonly id: TransferId;
  readonly outcome: OutcomeType;
  readonly refunded: boolean;
  readonly transfer: UnconfirmedTransfer;
}

export type EnvelopeOutcome =
  | { readonly kind: "call"; readonly received: ReceivedTransfer }
  | { readonly kind: "result"; readonly settlement: Settlement };

const LINK_STREAM = "link";

function transferStream(id: TransferId): string {
  return `transfer-${id.toLowerCase()}`;
}

// =============================================================================
// Protocol
// =============================================================================

export class TransferProtocol implements EnvelopeHandler {
  readonly link: LinkConfig;
  readonly ledger: UnconfirmedTransferLedger;
  private readonly strategy: CaptureReleaseStrategy;
  private readonly transport: GmpTransport;
  private readonly authenticator: MessageAuthenticator;
  private readonly mutex = new KeyedMutex();
  private readonly eventStore: EventStore | undefined;
  private readonly logger: Logger | undefined;
  private readonly now: () => string;

  constructor(options: TransferProtocolOptions) {
    this.link = options.link;
    this.strategy = options.strategy;
    this.transport = options.transport;
    this.ledger = options.ledger ?? new UnconfirmedTransferLedger();
    this.authenticator = new MessageAuthenticator(options.link);
    this.eventStore = options.eventStore;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date().toISOString());
  }

  // ─── Link Administration ───────────────────────────────────────────

  initializeLink(caller: Address, contract: Address): Address {
    return this.link.initialize(caller, contract, (linkedContract) => {
      const payload: LinkInitializedPayload = {
        underlying: this.link.underlying.address,
        linkedSubnet: formatSubnetId(this.link.linkedSubnet),
        linkedContract,
      };
      this.emit(LINK_STREAM, LINKED_TOKEN_EVENTS.LINK_INITIALIZED, "admin", caller, LINK_STREAM, payload);
      this.logger?.info(payload, "Link initialized");
    });
  }

  /**
   * Replace the linked contract. Results still in flight from the old
   * contract will fail authentication afterwards, so a non-empty ledger
   * is logged at warn level.
   */
  reconfigureLink(caller: Address, contract: Address): Address {
    this.link.reconfigure(caller, contract, (previous, linkedContract) => {
      const payload: LinkReconfiguredPayload = {
        previous,
        linkedContract,
        pendingTransfers: this.ledger.size,
      };
      this.emit(LINK_STREAM, LINKED_TOKEN_EVENTS.LINK_RECONFIGURED, "admin", caller, LINK_STREAM, payload);

      if (payload.pendingTransfers > 0) {
        this.logger?.warn(payload, "Link reconfigured with unconfirmed transfers in flight");
      } else {
        this.logger?.info(payload, "Link reconfigured");
      }
    });
    return this.link.requireInitialized();
  }

  // ─── Initiation ────────────────────────────────────────────────────

  /**
   * Capture `amount` from `caller` and dispatch a receive call to the
   * linked contract. The transfer stays unconfirmed until its result
   * arrives.
   *
   * If dispatch or recording fails after capture, the dispatched
   * envelope is withdrawn where the transport allows it and the capture
   * is released back to `caller` before the error is rethrown.
   */
  async initiateTransfer(caller: Address, recipient: Address, amount: bigint): Promise<InitiatedTransfer> {
    const destination = this.link.destination();
    if (isZeroAddress(recipient)) {
      throw new LinkedTokenError("ZERO_RECIPIENT", "Recipient cannot be the zero address");
    }
    if (amount <= 0n) {
      throw new LinkedTokenError("ZERO_AMOUNT", "Amount must be greater than zero", {
        amount: amount.toString(),
      });
    }

    const sender = normalizeAddress(caller);
    const to = normalizeAddress(recipient);

    await this.strategy.capture(sender, amount);

    let envelope: IpcEnvelope;
    try {
      envelope = await this.transport.dispatch(destination, buildReceiveCall(to, amount), 0n);
    } catch (err) {
      await this.compensate(sender, amount, err);
      throw err;
    }

    const transfer: UnconfirmedTransfer = {
      id: envelopeId(envelope),
      sender,
      recipient: to,
      amount,
      nonce: envelope.localNonce,
      createdAt: this.now(),
    };
    const payload: TransferSentPayload = {
      underlying: this.link.underlying.address,
      sender,
      recipient: to,
      id: transfer.id,
      nonce: transfer.nonce.toString(),
      amount: amount.toString(),
    };

    let recorded: UnconfirmedTransfer;
    let inserted = false;
    try {
      recorded = this.record(transfer);
      inserted = true;
      this.emit(transferStream(transfer.id), LINKED_TOKEN_EVENTS.TRANSFER_SENT, "protocol", sender, transfer.id, payload);
    } catch (err) {
      if (inserted) this.ledger.take(transfer.id);
      this.withdraw(envelope, err);
      await this.compensate(sender, amount, err);
      throw err;
    }
    this.logger?.info(payload, "Transfer sent");

    return { id: recorded.id, envelope, transfer: recorded };
  }

  // ─── Inbound ───────────────────────────────────────────────────────

  /**
   * Single inbound entry point for the transport.
   */
  async handleEnvelope(envelope: IpcEnvelope): Promise<EnvelopeOutcome> {
    switch (envelope.kind) {
      case "call":
        return { kind: "call", received: await this.handleCall(envelope) };
      case "result":
        return { kind: "result", settlement: await this.handleResult(envelope) };
      default:
        throw invalidEnvelope("unsupported kind");
    }
  }

  /**
   * Destination side: release the transferred amount to the recipient.
   * No ledger interaction; at-most-once delivery is the transport's job.
   */
  async handleCall(envelope: IpcEnvelope): Promise<ReceivedTransfer> {
    const id = envelopeId(envelope);
    const { recipient, amount } = this.guard(envelope, () => {
      this.authenticator.authenticateOrigin(envelope);
      if (envelope.value !== 0n) {
        throw new LinkedTokenError("UNEXPECTED_VALUE", "Receive calls must not carry value", {
          value: envelope.value.toString(),
        });
      }
      const call = decodeCallMsg(envelope.message);
      this.authenticator.requireSelector(call.method);
      return decodeReceiveParams(call.params);
    });

    if (isZeroAddress(recipient)) {
      throw new LinkedTokenError("ZERO_RECIPIENT", "Recipient cannot be the zero address");
    }
    if (amount === 0n) {
      throw new LinkedTokenError("ZERO_AMOUNT", "Amount must be greater than zero");
    }

    await this.strategy.release(recipient, amount);

    const payload: TransferReceivedPayload = { id, recipient, amount: amount.toString() };
    try {
      this.emit(transferStream(id), LINKED_TOKEN_EVENTS.TRANSFER_RECEIVED, "transport", "transport", id, payload);
    } catch (err) {
      await this.undo(() => this.strategy.capture(recipient, amount), err, { id, recipient });
      throw err;
    }
    this.logger?.info(payload, "Transfer received");

    return { id, recipient, amount };
  }

  /**
   * Origin side: settle the unconfirmed transfer a result answers.
   * Any outcome other than "ok" refunds the sender.
   */
  async handleResult(envelope: IpcEnvelope): Promise<Settlement> {
    const result = this.guard(envelope, () => {
      this.authenticator.authenticateOrigin(envelope);
      return decodeResultMsg(envelope.message);
    });

    return this.mutex.runExclusive(result.id.toLowerCase(), async () => {
      const transfer = this.ledger.get(result.id);
      if (transfer === undefined) {
        this.logger?.error({ id: result.id, outcome: result.outcome }, "Result for unknown transfer");
        throw unknownTransfer(result.id);
      }

      const refunded = result.outcome !== "ok";
      if (refunded) {
        await this.strategy.release(transfer.sender, transfer.amount);
      }

      const payload: TransferSettledPayload = {
        id: transfer.id,
        outcome: result.outcome,
        refunded,
        sender: transfer.sender,
        amount: transfer.amount.toString(),
      };
      try {
        this.emit(transferStream(transfer.id), LINKED_TOKEN_EVENTS.TRANSFER_SETTLED, "transport", "transport", transfer.id, payload);
      } catch (err) {
        if (refunded) {
          await this.undo(() => this.strategy.capture(transfer.sender, transfer.amount), err, { id: transfer.id });
        }
        throw err;
      }
      this.ledger.take(result.id);
      this.logger?.info(payload, refunded ? "Transfer refunded" : "Transfer settled");

      return { id: transfer.id, outcome: result.outcome, refunded, transfer };
    });
  }

  // ─── Administrative Override ───────────────────────────────────────

  /**
   * Drop an unconfirmed transfer without releasing anything.
   * Owner only. The captured amount stays captured.
   */
  async forceRemove(caller: Address, id: TransferId): Promise<UnconfirmedTransfer> {
    this.link.requireOwner(caller);

    return this.mutex.runExclusive(id.toLowerCase(), async () => {
      const transfer = this.ledger.get(id);
      if (transfer === undefined) {
        throw unknownTransfer(id);
      }

      const payload: TransferForceRemovedPayload = {
        id: transfer.id,
        sender: transfer.sender,
        amount: transfer.amount.toString(),
        removedBy: caller,
      };
      this.emit(transferStream(transfer.id), LINKED_TOKEN_EVENTS.TRANSFER_FORCE_REMOVED, "admin", caller, transfer.id, payload);
      this.ledger.take(id);
      this.logger?.warn(payload, "Unconfirmed transfer force-removed without refund");

      return transfer;
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getUnconfirmedTransfer(id: TransferId): UnconfirmedTransfer | undefined {
    return this.ledger.get(id);
  }

  listUnconfirmed(filter?: TransferFilter): readonly UnconfirmedTransfer[] {
    return this.ledger.list(filter);
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private record(transfer: UnconfirmedTransfer): UnconfirmedTransfer {
    try {
      return this.ledger.insert(transfer);
    } catch (err) {
      if (err instanceof TransferLedgerError && err.code === "DUPLICATE_TRANSFER") {
        throw new LinkedTokenError("DUPLICATE_TRANSFER", err.message, { id: transfer.id }, { cause: err });
      }
      throw err;
    }
  }

  private withdraw(envelope: IpcEnvelope, cause: unknown): void {
    const withdrawn = this.transport.withdraw?.(envelope) ?? false;
    if (!withdrawn) {
      this.logger?.error(
        { err: cause, id: envelopeId(envelope) },
        "Recording failed after dispatch and the envelope could not be withdrawn",
      );
    }
  }

  /** Reverse a committed balance change after a failed append. */
  private async undo(reverse: () => Promise<void>, cause: unknown, context: object): Promise<void> {
    try {
      await reverse();
    } catch (reverseErr) {
      this.logger?.error({ ...context, err: reverseErr }, "Could not reverse balance change after append failure");
      throw new AggregateError([cause, reverseErr], "Event append failed and the balance change could not be reversed");
    }
  }

  private async compensate(sender: Address, amount: bigint, cause: unknown): Promise<void> {
    try {
      await this.strategy.release(sender, amount);
    } catch (releaseErr) {
      this.logger?.error(
        { err: releaseErr, sender, amount: amount.toString() },
        "Compensating release failed after initiation error",
      );
      throw new AggregateError([cause, releaseErr], "Initiation failed and the capture could not be released");
    }
    this.logger?.warn({ err: cause, sender, amount: amount.toString() }, "Initiation failed; capture released");
  }

  /** Run inbound checks, logging authentication rejections with their origin. */
  private guard<T>(envelope: IpcEnvelope, check: () => T): T {
    try {
      return check();
    } catch (err) {
      if (isLinkedTokenError(err) && err.category === "authentication") {
        this.logger?.warn(
          {
            code: err.code,
            kind: envelope.kind,
            originSubnet: formatSubnetId(envelope.from.subnetId),
            originContract: envelope.from.rawAddress,
            details: err.details,
          },
          "Rejected inbound envelope",
        );
      }
      throw err;
    }
  }

  private emit(
    streamId: string,
    type: string,
    source: EventMetadata["source"],
    actor: string,
    correlationId: string,
    payload: object,
  ): void {
    if (this.eventStore === undefined) return;
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this.now(),
        actor,
        correlationId,
        source,
      },
      payload: { ...payload },
    };
    this.eventStore.append(streamId, [event]);
  }
}

function unknownTransfer(id: TransferId): LinkedTokenError {
  return new LinkedTokenError("UNKNOWN_TRANSFER", `No unconfirmed transfer with id ${id}`, { id });
}
