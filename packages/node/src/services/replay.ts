/**
 * Rebuild protocol state from the event log.
 *
 * Events are applied in global order on top of the genesis balances.
 * Replay never appends: it drives the capture/release strategy, the
 * unconfirmed-transfer ledger and the link configuration directly.
 */

import { z } from "zod";
import type { StoredEvent } from "@linked-token/event-store";
import { EventStoreError, LINKED_TOKEN_EVENTS } from "@linked-token/event-store";
import type { UnconfirmedTransferLedger } from "@linked-token/ledger";
import type { CaptureReleaseStrategy, LinkConfig } from "@linked-token/protocol";
import { TransferIdSchema } from "../types/dto.js";
import { AddressSchema, DecimalSchema } from "../types/wire.js";

export interface ReplayTarget {
  readonly link: LinkConfig;
  readonly ledger: UnconfirmedTransferLedger;
  readonly strategy: CaptureReleaseStrategy;
}

export interface ReplaySummary {
  readonly applied: number;
  readonly pending: number;
}

// ─── Payload schemas ─────────────────────────────────────────────────

const LinkPayload = z.object({ linkedContract: AddressSchema });

const SentPayload = z.object({
  id: TransferIdSchema,
  sender: AddressSchema,
  recipient: AddressSchema,
  nonce: DecimalSchema,
  amount: DecimalSchema,
});

const ReceivedPayload = z.object({ recipient: AddressSchema, amount: DecimalSchema });

const SettledPayload = z.object({
  id: TransferIdSchema,
  refunded: z.boolean(),
  sender: AddressSchema,
  amount: DecimalSchema,
});

const ForceRemovedPayload = z.object({ id: TransferIdSchema });

function payloadOf<T>(stored: StoredEvent, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(stored.event.payload);
  if (!result.success) {
    throw new EventStoreError(
      "CORRUPT_LOG",
      `Cannot replay "${stored.event.type}" at position ${stored.globalPosition}: ${result.error.issues[0]?.message ?? "invalid payload"}`,
      stored.streamId,
    );
  }
  return result.data;
}

// ─── Replay ──────────────────────────────────────────────────────────

export async function replayEvents(
  events: readonly StoredEvent[],
  target: ReplayTarget,
): Promise<ReplaySummary> {
  const { link, ledger, strategy } = target;
  let applied = 0;

  for (const stored of events) {
    switch (stored.event.type) {
      case LINKED_TOKEN_EVENTS.LINK_INITIALIZED:
      case LINKED_TOKEN_EVENTS.LINK_RECONFIGURED: {
        link.restore(payloadOf(stored, LinkPayload).linkedContract);
        break;
      }
      case LINKED_TOKEN_EVENTS.TRANSFER_SENT: {
        const sent = payloadOf(stored, SentPayload);
        await strategy.capture(sent.sender, sent.amount);
        ledger.insert({
          id: sent.id,
          sender: sent.sender,
          recipient: sent.recipient,
          amount: sent.amount,
          nonce: sent.nonce,
          createdAt: stored.event.metadata.timestamp,
        });
        break;
      }
      case LINKED_TOKEN_EVENTS.TRANSFER_RECEIVED: {
        const received = payloadOf(stored, ReceivedPayload);
        await strategy.release(received.recipient, received.amount);
        break;
      }
      case LINKED_TOKEN_EVENTS.TRANSFER_SETTLED: {
        const settled = payloadOf(stored, SettledPayload);
        if (settled.refunded) {
          await strategy.release(settled.sender, settled.amount);
        }
        ledger.take(settled.id);
        break;
      }
      case LINKED_TOKEN_EVENTS.TRANSFER_FORCE_REMOVED: {
        ledger.take(payloadOf(stored, ForceRemovedPayload).id);
        break;
      }
      default:
        continue;
    }
    applied++;
  }

  return { applied, pending: ledger.size };
}
