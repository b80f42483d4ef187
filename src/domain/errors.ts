/**
 * Structured errors for the shipping estimator.
 * Configuration gaps (no province, no rule) are not errors; only collaborator failures are.
 */

export type ShippingErrorCode =
  | "RULE_STORE_UNAVAILABLE"
  | "RULE_STORE_TIMEOUT"
  | "MALFORMED_RULES"
  | "CANCELLED"
  | "VALIDATION_ERROR";

export interface ShippingErrorDetails {
  code: ShippingErrorCode;
  message: string;
  /** Seller whose rule lookup failed, when applicable */
  sellerId?: string;
  /** Underlying cause for logging (e.g. original Error) */
  cause?: unknown;
}

export class ShippingEstimateError extends Error {
  readonly details: ShippingErrorDetails;

  constructor(details: ShippingErrorDetails) {
    super(details.message);
    this.name = "ShippingEstimateError";
    this.details = details;
    Object.setPrototypeOf(this, ShippingEstimateError.prototype);
  }

  get code(): ShippingErrorCode {
    return this.details.code;
  }

  get sellerId(): string | undefined {
    return this.details.sellerId;
  }

  /** Serialize for API responses or logging */
  toJSON(): ShippingErrorDetails {
    return { ...this.details, cause: undefined };
  }
}

/** Result of an operation that can fail with a structured error */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ShippingEstimateError };

/** Rule store could not be reached or read */
export function storeUnavailableError(
  sellerId: string,
  message: string,
  cause?: unknown
): ShippingEstimateError {
  return new ShippingEstimateError({
    code: "RULE_STORE_UNAVAILABLE",
    message,
    sellerId,
    cause,
  });
}

export function storeTimeoutError(sellerId: string, timeoutMs: number): ShippingEstimateError {
  return new ShippingEstimateError({
    code: "RULE_STORE_TIMEOUT",
    message: `Rule lookup for seller ${sellerId} timed out after ${timeoutMs}ms`,
    sellerId,
  });
}

export function platformTimeoutError(timeoutMs: number): ShippingEstimateError {
  return new ShippingEstimateError({
    code: "RULE_STORE_TIMEOUT",
    message: `Platform rule lookup timed out after ${timeoutMs}ms`,
  });
}

/** Stored rule set exists but cannot be parsed */
export function malformedRulesError(
  sellerId: string,
  message: string,
  cause?: unknown
): ShippingEstimateError {
  return new ShippingEstimateError({
    code: "MALFORMED_RULES",
    message,
    sellerId,
    cause,
  });
}

export function cancelledError(): ShippingEstimateError {
  return new ShippingEstimateError({
    code: "CANCELLED",
    message: "Shipping estimate was cancelled",
  });
}

/** Validation error (input validation before any lookup) */
export function validationError(message: string, cause?: unknown): ShippingEstimateError {
  return new ShippingEstimateError({
    code: "VALIDATION_ERROR",
    message,
    cause,
  });
}

export function isShippingEstimateError(e: unknown): e is ShippingEstimateError {
  return e instanceof ShippingEstimateError;
}
