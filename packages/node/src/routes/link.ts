/**
 * Link configuration.
 *
 * GET /api/v1/link: Owner, underlying token, linked subnet and contract,
 * custody mode and supply figures.
 */

import { Hono } from "hono";
import { formatSubnetId } from "@linked-token/protocol";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createLinkRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const service = c.get("service");
    const link = service.linkState();

    return c.json({
      data: {
        owner: link.owner,
        underlying: {
          subnetId: formatSubnetId(link.underlying.subnetId),
          address: link.underlying.address,
          symbol: link.underlying.symbol,
          decimals: link.underlying.decimals,
        },
        self: service.self.rawAddress,
        linkedSubnet: formatSubnetId(link.linkedSubnet),
        linkedContract: link.linkedContract ?? null,
        initialized: link.initialized,
        custody: service.custody(),
        pendingTransfers: service.listTransfers().length,
      },
    });
  });

  return routes;
}
