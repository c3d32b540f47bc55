/**
 * Shared fixtures for event-store tests.
 */

import type { DomainEvent } from "@linked-token/types";

export const TRANSFER_ID = `0x${"ab".repeat(32)}`;
export const ALICE = "0x1111111111111111111111111111111111111111";
export const BOB = "0x2222222222222222222222222222222222222222";

export function makeEvent(type: string, payload: Record<string, unknown> = { type }): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}-${Math.random().toString(36).slice(2, 8)}`,
      timestamp: "2024-01-15T10:00:00.000Z",
      actor: "test",
      correlationId: TRANSFER_ID,
      source: "protocol",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

export function sentPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    underlying: ALICE,
    sender: ALICE,
    recipient: BOB,
    id: TRANSFER_ID,
    nonce: "1",
    amount: "100",
    ...overrides,
  };
}
