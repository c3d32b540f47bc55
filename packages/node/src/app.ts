/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one
 * LinkedTokenService. Separated from main.ts for testability: tests
 * create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { LinkedTokenService } from "./services/linked-token-service.js";
import type { LinkedTokenServiceConfig } from "./services/linked-token-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, unsecuredAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTransferRoutes } from "./routes/transfers.js";
import { createEnvelopeRoutes } from "./routes/envelopes.js";
import { createLinkRoutes } from "./routes/link.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";
import { createBalanceRoutes } from "./routes/balances.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** A ready service, or the configuration to build one in memory */
  readonly service: LinkedTokenService | LinkedTokenServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Logs unhandled errors */
  readonly logger?: Logger;
  /** Auth configuration. When provided, API keys are required on /api routes. */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LinkedTokenService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service =
    options.service instanceof LinkedTokenService
      ? options.service
      : new LinkedTokenService(options.service);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): caller address from X-Caller-Address
    app.use("/api/*", unsecuredAuthMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/transfers", createTransferRoutes());
  app.route("/api/v1/envelopes", createEnvelopeRoutes());
  app.route("/api/v1/link", createLinkRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/balances", createBalanceRoutes());

  return { app, service };
}
