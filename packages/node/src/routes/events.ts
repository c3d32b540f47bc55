/**
 * Event log routes.
 *
 * GET /api/v1/events                  : Events in global order (`type`, `after`, `limit`)
 * GET /api/v1/events/verify           : Hash-chain integrity
 * GET /api/v1/events/streams/:streamId: One stream ("link", "transfer-<id>")
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { queryParams } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/", queryParams(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const events = service.readEvents({
      fromPosition: query.after + 1,
      maxCount: query.limit,
      type: query.type,
    });
    const last = events[events.length - 1];

    return c.json({
      data: events,
      meta: {
        count: events.length,
        head: service.eventStore.globalPosition(),
        nextAfter: events.length === query.limit && last !== undefined ? last.globalPosition : null,
      },
    });
  });

  routes.get("/verify", (c) => {
    const service = c.get("service");
    return c.json({ data: service.verifyEvents() });
  });

  routes.get("/streams/:streamId", (c) => {
    const service = c.get("service");
    const streamId = c.req.param("streamId");
    const events = service.readStream(streamId);
    return c.json({ data: events, meta: { count: events.length } });
  });

  return routes;
}
