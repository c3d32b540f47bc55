/**
 * Global error handler.
 *
 * Maps errors thrown by route handlers to the error envelope. Domain
 * errors keep their own code; anything without a known code becomes
 * a 500 with a generic message and is logged.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Code → HTTP Status Mapping
// =============================================================================

const ERROR_STATUSES = [400, 401, 403, 404, 409, 422, 500, 502, 504] as const;

export type ErrorStatus = (typeof ERROR_STATUSES)[number];

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Input rejection
  VALIDATION_ERROR: 400,
  ZERO_RECIPIENT: 400,
  ZERO_AMOUNT: 400,
  ZERO_ADDRESS: 400,
  UNEXPECTED_VALUE: 400,
  INVALID_AMOUNT: 400,

  // Inbound envelope authentication
  INVALID_ORIGIN_SUBNET: 401,
  INVALID_ORIGIN_CONTRACT: 401,
  INVALID_ENVELOPE: 401,

  // Owner gate
  UNAUTHORIZED: 403,

  // Link state
  NOT_INITIALIZED: 409,
  ALREADY_INITIALIZED: 409,

  // Settlement consistency
  UNKNOWN_TRANSFER: 409,
  DUPLICATE_TRANSFER: 409,

  // Balances
  INSUFFICIENT_BALANCE: 422,

  // Remote gateway
  GATEWAY_REJECTED: 502,
  GATEWAY_UNAVAILABLE: 502,
  GATEWAY_INVALID_RESPONSE: 502,
  GATEWAY_TIMEOUT: 504,
};

const HTTP_CODES: Readonly<Partial<Record<ErrorStatus, string>>> = {
  400: "VALIDATION_ERROR",
  401: "UNAUTHENTICATED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
};

export function statusForCode(code: string): ErrorStatus | undefined {
  return STATUS_MAP[code];
}

function isErrorStatus(status: number): status is ErrorStatus {
  return ERROR_STATUSES.some((s) => s === status);
}

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function detailsOf(err: Error): Readonly<Record<string, unknown>> | undefined {
  if (!("details" in err)) return undefined;
  const details = err.details;
  return typeof details === "object" && details !== null && !Array.isArray(details)
    ? Object.fromEntries(Object.entries(details))
    : undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered with Hono's `onError`.
 */
export function createErrorHandler(logger?: Logger): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      const status = isErrorStatus(err.status) ? err.status : 500;
      const code = HTTP_CODES[status] ?? "INTERNAL_ERROR";
      return c.json(createErrorEnvelope(code, status === 500 ? "Internal server error" : err.message), status);
    }

    const code = codeOf(err);
    const status = code !== undefined ? statusForCode(code) : undefined;

    if (code === undefined || status === undefined) {
      logger?.error({ err, path: c.req.path, method: c.req.method }, "Unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message, detailsOf(err)), status);
  };
}
