/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key looked up in the configured key registry.
 * Unsecured mode (no keys configured): every request passes and the
 * caller's on-domain address comes from X-Caller-Address.
 *
 * On success, sets `c.set("auth", authContext)`.
 */

import type { Context, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Address } from "@linked-token/types";
import { isAddress } from "@linked-token/types";
import { normalizeAddress } from "@linked-token/protocol";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_ADDRESS_HEADER = "X-Caller-Address";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

// =============================================================================
// Middleware
// =============================================================================

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHENTICATED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"), 401);
    }

    c.set("auth", {
      type: "api-key",
      identity: record.key,
      role: record.role,
      address: record.address,
    });
    return next();
  };
}

export function unsecuredAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(CALLER_ADDRESS_HEADER);
    if (header !== undefined && !isAddress(header)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `${CALLER_ADDRESS_HEADER} is not an address`),
        400,
      );
    }
    c.set("auth", {
      type: "unsecured",
      address: header !== undefined ? normalizeAddress(header) : undefined,
    });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Returns 403 if the authenticated role lacks the permission.
 * Unsecured mode grants everything.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHENTICATED", "Authentication required"), 401);
    }
    if (auth.type === "api-key" && !hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
        403,
      );
    }
    return next();
  };
}

/**
 * The on-domain address acting in this request.
 *
 * @throws HTTPException 401 when unsecured mode got no X-Caller-Address
 */
export function callerAddress(c: Context<AppEnv>): Address {
  const address = c.get("auth")?.address;
  if (address === undefined) {
    throw new HTTPException(401, {
      message: `Caller address required (${CALLER_ADDRESS_HEADER} header)`,
    });
  }
  return address;
}
