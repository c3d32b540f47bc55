/**
 * Inbound delivery from the transport.
 *
 * POST /api/v1/envelopes: A relayer hands over a call or result envelope.
 *
 * The status tells the relayer the outcome: 200 applied, 401 rejected by
 * authentication, 409 for a result that matches no unconfirmed transfer.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { EnvelopeSchema, serializeTransfer } from "../types/wire.js";
import { requirePermission } from "../middleware/auth.js";
import { jsonBody } from "../middleware/validate.js";

export function createEnvelopeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("relay"), jsonBody(EnvelopeSchema), async (c) => {
    const service = c.get("service");
    const outcome = await service.deliver(c.req.valid("json"));

    if (outcome.kind === "call") {
      const { id, recipient, amount } = outcome.received;
      return c.json({
        data: { kind: "call", id, recipient, amount: amount.toString() },
      });
    }

    const { id, outcome: result, refunded, transfer } = outcome.settlement;
    return c.json({
      data: { kind: "result", id, outcome: result, refunded, transfer: serializeTransfer(transfer) },
    });
  });

  return routes;
}
