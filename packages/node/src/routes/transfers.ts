/**
 * Transfer routes.
 *
 * POST /api/v1/transfers    : Capture from the caller and dispatch (operator)
 * GET  /api/v1/transfers    : Unconfirmed transfers, optionally by sender/recipient
 * GET  /api/v1/transfers/:id: One unconfirmed transfer
 */

import { Hono } from "hono";
import { sameAddress } from "@linked-token/protocol";
import type { AppEnv } from "../types/api-contract.js";
import {
  InitiateTransferSchema,
  ListTransfersQuerySchema,
  TransferIdParamSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { serializeEnvelope, serializeTransfer } from "../types/wire.js";
import { callerAddress, requirePermission } from "../middleware/auth.js";
import { jsonBody, pathParams, queryParams } from "../middleware/validate.js";

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("transfer"), jsonBody(InitiateTransferSchema), async (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");
    const sender = callerAddress(c);

    if (body.sender !== undefined && !sameAddress(body.sender, sender)) {
      return c.json(
        createErrorEnvelope("FORBIDDEN", `Caller ${sender} cannot transfer on behalf of ${body.sender}`, {
          caller: sender,
          sender: body.sender,
        }),
        403,
      );
    }

    const initiated = await service.initiateTransfer(sender, body.recipient, body.amount);

    return c.json(
      {
        data: {
          id: initiated.id,
          nonce: initiated.envelope.localNonce.toString(),
          envelope: serializeEnvelope(initiated.envelope),
          transfer: serializeTransfer(initiated.transfer),
        },
      },
      201,
    );
  });

  routes.get("/", requirePermission("read"), queryParams(ListTransfersQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const transfers = service.listTransfers({
      ...(query.sender !== undefined ? { sender: query.sender } : {}),
      ...(query.recipient !== undefined ? { recipient: query.recipient } : {}),
    });

    return c.json({
      data: transfers.map(serializeTransfer),
      meta: { count: transfers.length },
    });
  });

  routes.get("/:id", requirePermission("read"), pathParams(TransferIdParamSchema), (c) => {
    const service = c.get("service");
    const { id } = c.req.valid("param");

    const transfer = service.getTransfer(id);
    if (transfer === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No unconfirmed transfer with id ${id}`), 404);
    }

    return c.json({ data: serializeTransfer(transfer) });
  });

  return routes;
}
