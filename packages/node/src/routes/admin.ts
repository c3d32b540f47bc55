/**
 * Owner-gated administration.
 *
 * POST   /api/v1/admin/link         : Set the linked contract (once)
 * PUT    /api/v1/admin/link         : Replace the linked contract
 * DELETE /api/v1/admin/transfers/:id: Drop a stuck unconfirmed transfer, no refund
 *
 * The API key's role opens the route; the protocol still checks that the
 * key's address is the link owner.
 */

import { Hono } from "hono";
import { isLinkedTokenError } from "@linked-token/protocol";
import type { AppEnv } from "../types/api-contract.js";
import { LinkContractSchema, TransferIdParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { serializeTransfer } from "../types/wire.js";
import { callerAddress, requirePermission } from "../middleware/auth.js";
import { jsonBody, pathParams } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/link", jsonBody(LinkContractSchema), (c) => {
    const service = c.get("service");
    const { linkedContract } = c.req.valid("json");

    const contract = service.initializeLink(callerAddress(c), linkedContract);
    return c.json({ data: { linkedContract: contract } }, 201);
  });

  routes.put("/link", jsonBody(LinkContractSchema), (c) => {
    const service = c.get("service");
    const { linkedContract } = c.req.valid("json");

    const previous = service.reconfigureLink(callerAddress(c), linkedContract);
    return c.json({
      data: { previous, linkedContract: service.linkState().linkedContract ?? null },
    });
  });

  routes.delete("/transfers/:id", pathParams(TransferIdParamSchema), async (c) => {
    const service = c.get("service");
    const { id } = c.req.valid("param");

    try {
      const removed = await service.forceRemove(callerAddress(c), id);
      return c.json({ data: { removed: serializeTransfer(removed) } });
    } catch (err) {
      if (isLinkedTokenError(err) && err.code === "UNKNOWN_TRANSFER") {
        return c.json(createErrorEnvelope(err.code, err.message, err.details), 404);
      }
      throw err;
    }
  });

  return routes;
}
