/**
 * Request logging middleware.
 *
 * Emits one entry per request once the response is known. main.ts
 * hands the entries to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Role of the API key, "unsecured" without auth, absent on public routes */
  readonly role?: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const auth = c.get("auth");
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      ...(auth !== undefined
        ? { role: auth.type === "api-key" ? auth.role : "unsecured" }
        : {}),
    };

    log(entry);
  };
}
