/**
 * InProcessGateway: a GMP transport that lives in one process.
 *
 * Stands in for the real transport in tests and the local demo:
 * - assigns per-subnet nonces and computes envelope ids
 * - queues dispatched envelopes until delivery is requested
 * - turns a rejected call into an "actor_error" result, or a
 *   "system_error" result when nobody is registered at the destination
 * - routes the result envelope back to the caller
 *
 * Delivery is explicit (`deliverNext` / `deliverAll`) so ordering,
 * loss and redelivery are under the caller's control.
 */

import { stringToHex } from "viem";
import type { Logger } from "pino";
import type {
  CallMsg,
  Hex,
  IpcAddress,
  IpcEnvelope,
  OutcomeType,
  SubnetId,
  TransferId,
} from "@linked-token/types";
import { encodeCallMsg, encodeResultMsg, envelopeId } from "./codec.js";
import { formatSubnetId, ipcAddressKey } from "./subnet.js";
import type { EnvelopeHandler, GmpTransport } from "./transport.js";

// =============================================================================
// Types
// =============================================================================

export interface DeliveryReport {
  readonly envelope: IpcEnvelope;
  readonly id: TransferId;
  /** For calls: the outcome sent back. Absent for results. */
  readonly outcome?: OutcomeType | undefined;
  /** Whether a handler accepted the envelope */
  readonly delivered: boolean;
  /** Rejection raised by the handler, if any */
  readonly error?: unknown;
}

export interface InProcessGatewayOptions {
  readonly logger?: Logger | undefined;
  /** Upper bound on envelopes processed by one `deliverAll` call. */
  readonly maxDeliveries?: number | undefined;
}

const DEFAULT_MAX_DELIVERIES = 10_000;

// =============================================================================
// Gateway
// =============================================================================

export class InProcessGateway {
  private readonly handlers = new Map<string, EnvelopeHandler>();
  private readonly nonces = new Map<string, bigint>();
  private readonly queue: IpcEnvelope[] = [];
  private readonly logger: Logger | undefined;
  private readonly maxDeliveries: number;

  constructor(options: InProcessGatewayOptions = {}) {
    this.logger = options.logger;
    this.maxDeliveries = options.maxDeliveries ?? DEFAULT_MAX_DELIVERIES;
  }

  /** Route envelopes addressed to `address` to `handler`. */
  register(address: IpcAddress, handler: EnvelopeHandler): void {
    this.handlers.set(ipcAddressKey(address), handler);
  }

  unregister(address: IpcAddress): boolean {
    return this.handlers.delete(ipcAddressKey(address));
  }

  /** A transport whose dispatches originate from `origin`. */
  transportFor(origin: IpcAddress): GmpTransport {
    return {
      dispatch: async (to: IpcAddress, call: CallMsg, value: bigint): Promise<IpcEnvelope> =>
        this.enqueue({
          kind: "call",
          localNonce: this.nextNonce(origin.subnetId),
          originalNonce: 0n,
          value,
          from: origin,
          to,
          message: encodeCallMsg(call),
        }),
      withdraw: (envelope: IpcEnvelope): boolean => this.withdraw(envelope),
    };
  }

  /** Remove a queued envelope by id. False when it is no longer queued. */
  withdraw(envelope: IpcEnvelope): boolean {
    const id = envelopeId(envelope);
    const index = this.queue.findIndex((queued) => envelopeId(queued) === id);
    if (index === -1) return false;
    this.queue.splice(index, 1);
    return true;
  }

  /** Queue an envelope as-is (redelivery, forged envelopes in tests). */
  inject(envelope: IpcEnvelope): void {
    this.queue.push(envelope);
  }

  /** Envelopes waiting for delivery, oldest first. */
  pending(): readonly IpcEnvelope[] {
    return [...this.queue];
  }

  /** Remove the next queued envelope without delivering it. */
  drop(): IpcEnvelope | undefined {
    return this.queue.shift();
  }

  /**
   * Deliver the oldest queued envelope. Returns undefined when the
   * queue is empty.
   */
  async deliverNext(): Promise<DeliveryReport | undefined> {
    const envelope = this.queue.shift();
    if (envelope === undefined) return undefined;

    const id = envelopeId(envelope);
    const handler = this.handlers.get(ipcAddressKey(envelope.to));

    if (envelope.kind !== "call") {
      return this.deliverResult(envelope, id, handler);
    }

    if (handler === undefined) {
      this.logger?.warn({ id, to: formatSubnetId(envelope.to.subnetId) }, "No handler for call envelope");
      this.reply(envelope, id, "system_error", stringToHex("no handler at destination"));
      return { envelope, id, outcome: "system_error", delivered: false };
    }

    try {
      await handler.handleEnvelope(envelope);
    } catch (err) {
      this.logger?.warn({ id, err }, "Call envelope rejected by destination");
      this.reply(envelope, id, "actor_error", stringToHex(errorText(err)));
      return { envelope, id, outcome: "actor_error", delivered: true, error: err };
    }

    this.reply(envelope, id, "ok", "0x");
    return { envelope, id, outcome: "ok", delivered: true };
  }

  /** Deliver until the queue is empty, including results produced on the way. */
  async deliverAll(): Promise<readonly DeliveryReport[]> {
    const reports: DeliveryReport[] = [];
    while (this.queue.length > 0) {
      if (reports.length >= this.maxDeliveries) {
        throw new Error(`Delivery limit of ${String(this.maxDeliveries)} envelopes reached`);
      }
      const report = await this.deliverNext();
      if (report !== undefined) reports.push(report);
    }
    return reports;
  }

  private async deliverResult(
    envelope: IpcEnvelope,
    id: TransferId,
    handler: EnvelopeHandler | undefined,
  ): Promise<DeliveryReport> {
    if (handler === undefined) {
      this.logger?.warn({ id }, "No handler for result envelope");
      return { envelope, id, delivered: false };
    }
    try {
      await handler.handleEnvelope(envelope);
    } catch (err) {
      // Results cannot be bounced; the rejection is reported to the caller
      this.logger?.error({ id, err }, "Result envelope rejected by origin");
      return { envelope, id, delivered: true, error: err };
    }
    return { envelope, id, delivered: true };
  }

  private reply(call: IpcEnvelope, id: TransferId, outcome: OutcomeType, ret: Hex): void {
    this.enqueue({
      kind: "result",
      localNonce: this.nextNonce(call.to.subnetId),
      originalNonce: call.localNonce,
      value: 0n,
      from: call.to,
      to: call.from,
      message: encodeResultMsg({ id, outcome, ret }),
    });
  }

  private enqueue(envelope: IpcEnvelope): IpcEnvelope {
    this.queue.push(envelope);
    return envelope;
  }

  private nextNonce(subnet: SubnetId): bigint {
    const key = formatSubnetId(subnet);
    const nonce = this.nonces.get(key) ?? 0n;
    this.nonces.set(key, nonce + 1n);
    return nonce;
  }
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
