/**
 * Protocol error taxonomy.
 *
 * Every rejection aborts the entry point with no partial state change.
 * Codes are grouped so monitoring can tell spoofing attempts
 * (authentication) from protocol bugs (consistency).
 */

export type LinkedTokenErrorCode =
  // Configuration
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "ZERO_ADDRESS"
  // Input rejection
  | "ZERO_RECIPIENT"
  | "ZERO_AMOUNT"
  | "UNEXPECTED_VALUE"
  // Authentication
  | "INVALID_ORIGIN_SUBNET"
  | "INVALID_ORIGIN_CONTRACT"
  | "INVALID_ENVELOPE"
  // Authorization
  | "UNAUTHORIZED"
  // Internal consistency
  | "UNKNOWN_TRANSFER"
  | "DUPLICATE_TRANSFER";

export type ErrorCategory =
  | "configuration"
  | "input"
  | "authentication"
  | "authorization"
  | "consistency";

const CATEGORIES: Readonly<Record<LinkedTokenErrorCode, ErrorCategory>> = {
  NOT_INITIALIZED: "configuration",
  ALREADY_INITIALIZED: "configuration",
  ZERO_ADDRESS: "configuration",
  ZERO_RECIPIENT: "input",
  ZERO_AMOUNT: "input",
  UNEXPECTED_VALUE: "input",
  INVALID_ORIGIN_SUBNET: "authentication",
  INVALID_ORIGIN_CONTRACT: "authentication",
  INVALID_ENVELOPE: "authentication",
  UNAUTHORIZED: "authorization",
  UNKNOWN_TRANSFER: "consistency",
  DUPLICATE_TRANSFER: "consistency",
};

/** Reasons carried by INVALID_ENVELOPE. */
export type InvalidEnvelopeReason =
  | "short selector"
  | "invalid selector"
  | "malformed message"
  | "unsupported kind";

export class LinkedTokenError extends Error {
  public readonly code: LinkedTokenErrorCode;
  public readonly category: ErrorCategory;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: LinkedTokenErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LinkedTokenError";
    this.code = code;
    this.category = CATEGORIES[code];
    this.details = details;
  }
}

export function invalidEnvelope(reason: InvalidEnvelopeReason, cause?: unknown): LinkedTokenError {
  return new LinkedTokenError(
    "INVALID_ENVELOPE",
    `Invalid envelope: ${reason}`,
    { reason },
    cause === undefined ? undefined : { cause },
  );
}

export function isLinkedTokenError(err: unknown): err is LinkedTokenError {
  return err instanceof LinkedTokenError;
}
