/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if the server is running)
 * GET /ready : Readiness: event log chain valid, link initialized,
 *               event log replayed
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LinkedTokenService } from "../services/linked-token-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: LinkedTokenService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = service.isReady();
    const { eventStore, link, recovery } = report.subsystems;

    const subsystems: Record<string, SubsystemStatus> = {
      eventStore: eventStore.valid
        ? { status: "ok" }
        : {
            status: "down",
            detail: `chainValid=false, errors=${eventStore.errors.length}, lastVerified=${eventStore.lastVerifiedPosition}`,
          },
      link: link.initialized ? { status: "ok" } : { status: "down", detail: "linked contract not set" },
      recovery: recovery.complete ? { status: "ok" } : { status: "down", detail: "event log not replayed" },
    };

    const body = {
      status: report.ready ? "ready" : "not_ready",
      subsystems,
      timestamp: new Date().toISOString(),
    };
    return report.ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
