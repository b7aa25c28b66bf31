/**
 * Error hierarchy for the ENTSO-E client
 */

// ============================================================================
// Base Error
// ============================================================================

export type EntsoeErrorCode =
  | "INVALID_PARAMETER"
  | "CONFIGURATION_ERROR"
  | "AUTHENTICATION_FAILED"
  | "NETWORK_ERROR"
  | "RATE_LIMITED"
  | "API_RESPONSE_ERROR"
  | "NO_DATA"
  | "CANCELLED";

export abstract class EntsoeError extends Error {
  abstract readonly code: EntsoeErrorCode;
  statusCode?: number;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, { cause: options?.cause });
    this.details = options?.details;
  }
}

// ============================================================================
// Local Validation Errors
// ============================================================================

/** Malformed query: naive timestamp, start >= end, unknown code */
export class InvalidParameterError extends EntsoeError {
  readonly code = "INVALID_PARAMETER" as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details });
    this.name = "InvalidParameterError";
  }
}

export class ConfigurationError extends EntsoeError {
  readonly code = "CONFIGURATION_ERROR" as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details });
    this.name = "ConfigurationError";
  }
}

// ============================================================================
// Remote Errors
// ============================================================================

export class AuthenticationError extends EntsoeError {
  readonly code = "AUTHENTICATION_FAILED" as const;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = "AuthenticationError";
    this.statusCode = statusCode;
  }
}

export class NetworkError extends EntsoeError {
  readonly code: "NETWORK_ERROR" | "RATE_LIMITED" = "NETWORK_ERROR";
  attempts: number;

  constructor(
    message: string,
    options: { attempts: number; cause?: unknown; statusCode?: number }
  ) {
    super(message, { cause: options.cause });
    this.name = "NetworkError";
    this.attempts = options.attempts;
    this.statusCode = options.statusCode;
  }
}

/** HTTP 429 persisted after every configured retry */
export class RateLimitError extends NetworkError {
  override readonly code = "RATE_LIMITED" as const;

  constructor(attempts: number) {
    super(
      `Rate limit exceeded. Gave up after ${String(attempts)} attempts.`,
      { attempts, statusCode: 429 }
    );
    this.name = "RateLimitError";
  }
}

export const DIAGNOSTIC_SNIPPET_LENGTH = 500;

export class APIResponseError extends EntsoeError {
  readonly code = "API_RESPONSE_ERROR" as const;
  snippet: string;

  constructor(
    message: string,
    options?: { snippet?: string; statusCode?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "APIResponseError";
    this.snippet = (options?.snippet ?? "").slice(0, DIAGNOSTIC_SNIPPET_LENGTH);
    this.statusCode = options?.statusCode;
  }
}

export class NoDataError extends EntsoeError {
  readonly code = "NO_DATA" as const;

  constructor(
    message = "No data available for the requested parameters.",
    details?: Record<string, unknown>
  ) {
    super(message, { details });
    this.name = "NoDataError";
  }
}

export class CancelledError extends EntsoeError {
  readonly code = "CANCELLED" as const;

  constructor(message = "Query was cancelled.") {
    super(message);
    this.name = "CancelledError";
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Whether a failure may succeed on a later attempt
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof NetworkError;
}
