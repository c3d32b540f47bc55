/**
 * GET /api/v1/balances/:address: Balance in the local balance book.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BalanceParamSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { pathParams } from "../middleware/validate.js";

export function createBalanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", requirePermission("read"), pathParams(BalanceParamSchema), (c) => {
    const service = c.get("service");
    const { address } = c.req.valid("param");
    return c.json({ data: service.balanceOf(address) });
  });

  return routes;
}
