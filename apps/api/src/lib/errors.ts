import type { ErrorCode } from "@wa-gateway/shared-types";

export type { ErrorCode } from "@wa-gateway/shared-types";

/**
 * The single error type that crosses module boundaries.
 *
 * Adapters raise it directly; the retry executor inspects `code` to decide
 * whether another attempt is allowed; routes turn it into the failure envelope.
 */
export class GatewayError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;
  /** Hint for the caller (CircuitOpen) or the retry loop (RateLimited). */
  readonly retryAfterMs: number | undefined;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      details?: Record<string, unknown> | undefined;
      retryAfterMs?: number | undefined;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "GatewayError";
    this.code = code;
    this.details = options.details ?? {};
    this.retryAfterMs = options.retryAfterMs;
  }
}

const RETRYABLE: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "Transient",
  "Timeout",
  "RateLimited",
]);

/** Failures that say something about provider health, not about the input. */
const BREAKER_RELEVANT: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "Transient",
  "Timeout",
  "RateLimited",
]);

export function isRetryable(code: ErrorCode): boolean {
  return RETRYABLE.has(code);
}

export function countsTowardBreaker(code: ErrorCode): boolean {
  return BREAKER_RELEVANT.has(code);
}

/**
 * Normalises anything thrown into a GatewayError.
 * Unknown errors become `Internal` and keep the original as `cause`.
 */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : "Unknown error";
  return new GatewayError("Internal", message, { cause: err });
}

/**
 * The error an aborted signal stands for. The executor aborts attempts with a
 * GatewayError reason (Timeout); any other reason is a caller cancellation.
 */
export function abortReason(signal: AbortSignal): GatewayError {
  const reason: unknown = signal.reason;
  if (reason instanceof GatewayError) return reason;
  return new GatewayError("Cancelled", "Call cancelled by caller", {
    cause: reason,
  });
}

const HTTP_STATUS: Record<ErrorCode, number> = {
  AuthError: 502,
  RateLimited: 429,
  Transient: 503,
  Timeout: 504,
  InvalidRecipient: 400,
  PayloadTooLarge: 413,
  NotFound: 404,
  InvalidRequest: 400,
  UnsupportedOperation: 422,
  InvalidSignature: 401,
  CircuitOpen: 503,
  UnknownProvider: 404,
  ConfigurationInactive: 409,
  InvalidConfiguration: 422,
  ConfigurationConflict: 409,
  Unauthenticated: 401,
  Forbidden: 403,
  Cancelled: 503,
  Internal: 500,
};

export function httpStatusFor(code: ErrorCode): number {
  return HTTP_STATUS[code];
}
