/**
 * Gateway error taxonomy.
 *
 * Every failure the request path can surface is one of these; the HTTP layer
 * maps `statusCode` and `code` straight onto the response envelope. Anything
 * that is not a GatewayError is reported as a generic internal error.
 */

export type GatewayErrorCode =
  | "unauthenticated"
  | "validation_failed"
  | "not_found"
  | "rate_limited"
  | "circuit_open"
  | "publish_failed"
  | "store_unavailable";

export abstract class GatewayError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: GatewayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing, malformed, expired or wrong-type bearer token. */
export class AuthenticationError extends GatewayError {
  readonly statusCode = 401;
  readonly code = "unauthenticated" as const;

  constructor(message = "Invalid or expired token", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends GatewayError {
  readonly statusCode = 400;
  readonly code = "validation_failed" as const;

  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(message);
  }
}

export class NotFoundError extends GatewayError {
  readonly statusCode = 404;
  readonly code = "not_found" as const;
}

export class RateLimitExceededError extends GatewayError {
  readonly statusCode = 429;
  readonly code = "rate_limited" as const;

  constructor(
    public readonly limit: number,
    public readonly resetSeconds: number
  ) {
    super("Rate limit exceeded. Please try again later.");
  }
}

/** Raised by the circuit breaker without invoking the protected operation. */
export class CircuitOpenError extends GatewayError {
  readonly statusCode = 503;
  readonly code = "circuit_open" as const;

  constructor(public readonly retryAfterSeconds: number) {
    super("Service temporarily unavailable (circuit breaker open)");
  }
}

/** The broker publish was attempted and failed. */
export class PublishFailedError extends GatewayError {
  readonly statusCode = 503;
  readonly code = "publish_failed" as const;

  constructor(cause: unknown) {
    super("Notification service temporarily unavailable", { cause });
  }
}

/** The key-value store could not serve a read or write the caller depends on. */
export class StoreUnavailableError extends GatewayError {
  readonly statusCode = 503;
  readonly code = "store_unavailable" as const;

  constructor(operation: string, cause: unknown) {
    super(`Status store unavailable during ${operation}`, { cause });
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}
