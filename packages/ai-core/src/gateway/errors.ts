/**
 * Gateway Errors - Standardized Error Handling
 *
 * Provides consistent error handling across all provider calls with:
 * - Typed error codes for programmatic handling
 * - Retryable classification
 * - Billing detection across vendor error bodies
 */

// ============================================================================
// Error Codes
// ============================================================================

export type GatewayErrorCode =
  // Client errors (4xx)
  | "INVALID_REQUEST" // Malformed request
  | "RATE_LIMITED" // Too many requests
  | "QUOTA_EXCEEDED" // Billing, credit or usage quota problem
  | "UNAUTHORIZED" // Invalid or missing API key
  | "FORBIDDEN" // Permission denied
  | "CONTENT_FILTERED" // Content policy violation
  | "CONTEXT_TOO_LONG" // Input exceeds context window

  // Server errors (5xx)
  | "PROVIDER_ERROR" // Upstream provider error
  | "PROVIDER_UNAVAILABLE" // Provider temporarily unavailable
  | "PROVIDER_TIMEOUT" // Provider request timed out
  | "INTERNAL_ERROR" // Unexpected internal error

  // Cancellation
  | "CANCELLED"; // Request was cancelled

export interface GatewayErrorOptions {
  cause?: unknown;
  retryAfterMs?: number;
  provider?: string;
  model?: string;
  status?: number;
}

// ============================================================================
// Error Class
// ============================================================================

/**
 * Provider call error with context for diagnostics and user feedback.
 */
export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  /** HTTP status of the failed exchange, when there was one */
  readonly statusCode?: number;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly provider?: string;
  readonly model?: string;

  constructor(code: GatewayErrorCode, message: string, options?: GatewayErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "GatewayError";
    this.code = code;
    this.statusCode = options?.status;
    this.retryable = isRetryableCode(code);
    this.retryAfterMs = options?.retryAfterMs;
    this.provider = options?.provider;
    this.model = options?.model;
  }
}

// ============================================================================
// Retryable Classification
// ============================================================================

const RETRYABLE_CODES = new Set<GatewayErrorCode>([
  "RATE_LIMITED",
  "PROVIDER_ERROR",
  "PROVIDER_UNAVAILABLE",
  "PROVIDER_TIMEOUT",
]);

function isRetryableCode(code: GatewayErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}

/**
 * Type guard for GatewayError.
 */
export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

// ============================================================================
// Error Conversion Helpers
// ============================================================================

/**
 * Message fragments that identify billing, credit and quota failures across vendors.
 */
export const BILLING_SIGNATURES = [
  "quota",
  "billing",
  "credit balance",
  "payment required",
  "resource_exhausted",
  "insufficient_quota",
] as const;

export function matchesBillingSignature(message: string): boolean {
  const lower = message.toLowerCase();
  return BILLING_SIGNATURES.some((signature) => lower.includes(signature));
}

/**
 * Whether an error (gateway or raw) describes a billing/quota failure.
 */
export function isBillingError(error: unknown): boolean {
  if (isGatewayError(error)) {
    return error.code === "QUOTA_EXCEEDED";
  }
  return error instanceof Error && matchesBillingSignature(error.message);
}

/**
 * Convert HTTP response status to gateway error code.
 */
export function codeFromHttpStatus(status: number): GatewayErrorCode {
  switch (status) {
    case 400:
    case 404:
    case 422:
      return "INVALID_REQUEST";
    case 401:
      return "UNAUTHORIZED";
    case 402:
      return "QUOTA_EXCEEDED";
    case 403:
      return "FORBIDDEN";
    case 408:
    case 504:
      return "PROVIDER_TIMEOUT";
    case 413:
      return "CONTEXT_TOO_LONG";
    case 429:
      return "RATE_LIMITED";
    case 499:
      return "CANCELLED";
    case 503:
    case 529:
      return "PROVIDER_UNAVAILABLE";
    default:
      return status >= 500 ? "PROVIDER_ERROR" : "INVALID_REQUEST";
  }
}

/**
 * Build a gateway error for a failed HTTP exchange.
 * Billing signatures in the body win over the status code, since vendors
 * report exhausted credit as 400, 403 or 429 depending on the API.
 */
export function fromHttpStatus(
  status: number,
  message: string,
  options?: Omit<GatewayErrorOptions, "status">
): GatewayError {
  const code = matchesBillingSignature(message) ? "QUOTA_EXCEEDED" : codeFromHttpStatus(status);
  return new GatewayError(code, message, { ...options, status });
}

/**
 * Convert thrown provider errors (network failures, aborts, plain Errors) to gateway errors.
 */
export function fromProviderError(
  error: unknown,
  provider: string,
  options?: { model?: string }
): GatewayError {
  if (isGatewayError(error)) {
    return error;
  }

  const base = error instanceof Error ? error : new Error(String(error));
  const message = base.message.toLowerCase();

  if (base.name === "AbortError") {
    return new GatewayError("CANCELLED", base.message, { cause: base, provider, ...options });
  }

  if (base.name === "TimeoutError" || message.includes("timeout") || message.includes("timed out")) {
    return new GatewayError("PROVIDER_TIMEOUT", base.message, {
      cause: base,
      provider,
      ...options,
    });
  }

  if (matchesBillingSignature(message)) {
    return new GatewayError("QUOTA_EXCEEDED", base.message, { cause: base, provider, ...options });
  }

  if (message.includes("rate limit") || message.includes("too many requests")) {
    return new GatewayError("RATE_LIMITED", base.message, { cause: base, provider, ...options });
  }

  if (message.includes("unauthorized") || message.includes("invalid api key")) {
    return new GatewayError("UNAUTHORIZED", base.message, { cause: base, provider, ...options });
  }

  if (message.includes("context length") || message.includes("too long")) {
    return new GatewayError("CONTEXT_TOO_LONG", base.message, {
      cause: base,
      provider,
      ...options,
    });
  }

  if (
    message.includes("unavailable") ||
    message.includes("overloaded") ||
    message.includes("fetch failed") ||
    message.includes("econnreset")
  ) {
    return new GatewayError("PROVIDER_UNAVAILABLE", base.message, {
      cause: base,
      provider,
      ...options,
    });
  }

  return new GatewayError("PROVIDER_ERROR", base.message, { cause: base, provider, ...options });
}
