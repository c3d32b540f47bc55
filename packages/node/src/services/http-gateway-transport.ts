/**
 * HTTP client for a remote GMP gateway.
 *
 * Implements the protocol's transport against `POST {baseUrl}/dispatch`:
 * - Request ID header on every call
 * - Timeout via AbortController
 * - Error normalization into GatewayError
 * - Custom fetch function for testing
 *
 * A dispatch is never retried: a retried request the gateway had in fact
 * accepted would send the same transfer twice.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { CallMsg, IpcAddress, IpcEnvelope } from "@linked-token/types";
import type { GmpTransport } from "@linked-token/protocol";
import { encodeCallMsg, envelopeId, formatIpcAddress } from "@linked-token/protocol";
import { EnvelopeSchema, serializeIpcAddress } from "../types/wire.js";

// =============================================================================
// Errors
// =============================================================================

export type GatewayErrorCode =
  | "GATEWAY_TIMEOUT"
  | "GATEWAY_UNAVAILABLE"
  | "GATEWAY_REJECTED"
  | "GATEWAY_INVALID_RESPONSE";

export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  /** HTTP status returned by the gateway, 0 when none was received */
  public readonly status: number;

  constructor(code: GatewayErrorCode, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
    this.status = status;
  }
}

// =============================================================================
// Transport
// =============================================================================

export interface HttpGatewayTransportOptions {
  readonly baseUrl: string;
  /** The address outbound envelopes originate from */
  readonly origin: IpcAddress;
  readonly apiKey?: string | undefined;
  /** Default: 10000 */
  readonly timeoutMs?: number | undefined;
  readonly fetchFn?: typeof fetch | undefined;
  readonly logger?: Logger | undefined;
}

export class HttpGatewayTransport implements GmpTransport {
  private readonly baseUrl: string;
  private readonly origin: IpcAddress;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger | undefined;

  constructor(options: HttpGatewayTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.origin = options.origin;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.logger = options.logger;
  }

  async dispatch(to: IpcAddress, call: CallMsg, value: bigint): Promise<IpcEnvelope> {
    const requestId = randomUUID();
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
      "X-Request-Id": requestId,
    };
    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }

    const body = JSON.stringify({
      from: serializeIpcAddress(this.origin),
      to: serializeIpcAddress(to),
      call: { method: call.method, params: call.params },
      value: value.toString(),
    });

    const response = await this.fetchWithTimeout(`${this.baseUrl}/dispatch`, {
      method: "POST",
      headers,
      body,
    });
    const payload = await parseResponseBody(response);

    if (!response.ok) {
      throw new GatewayError(
        "GATEWAY_REJECTED",
        `Gateway rejected dispatch: ${errorMessage(payload) ?? `HTTP ${response.status}`}`,
        response.status,
      );
    }

    const envelope = this.readEnvelope(payload, response.status);
    if (
      envelope.kind !== "call" ||
      envelope.message.toLowerCase() !== encodeCallMsg(call).toLowerCase() ||
      envelope.value !== value ||
      formatIpcAddress(envelope.to) !== formatIpcAddress(to)
    ) {
      throw new GatewayError(
        "GATEWAY_INVALID_RESPONSE",
        "Gateway returned an envelope that does not match the dispatched call",
        response.status,
      );
    }

    this.logger?.debug(
      { requestId, id: envelopeId(envelope), nonce: envelope.localNonce.toString() },
      "Dispatched through gateway",
    );
    return envelope;
  }

  private readEnvelope(payload: unknown, status: number): IpcEnvelope {
    const data = isRecord(payload) ? payload["data"] : undefined;
    const result = EnvelopeSchema.safeParse(isRecord(data) ? data["envelope"] : undefined);
    if (!result.success) {
      throw new GatewayError(
        "GATEWAY_INVALID_RESPONSE",
        "Gateway response carries no valid envelope",
        status,
        { cause: result.error },
      );
    }
    return result.data;
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new GatewayError(
          "GATEWAY_TIMEOUT",
          `Gateway did not answer within ${this.timeoutMs}ms`,
          0,
          { cause: error },
        );
      }
      throw new GatewayError(
        "GATEWAY_UNAVAILABLE",
        `Gateway unreachable: ${error instanceof Error ? error.message : String(error)}`,
        0,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// =============================================================================
// Internal Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function errorMessage(payload: unknown): string | undefined {
  const error = isRecord(payload) ? payload["error"] : undefined;
  const message = isRecord(error) ? error["message"] : undefined;
  return typeof message === "string" ? message : undefined;
}
