export type PlotvaultErrorKind =
  | "validation"
  | "permission_denied"
  | "not_found"
  | "authentication"
  | "rate_limited"
  | "storage_failure"
  | "config";

export abstract class PlotvaultError extends Error {
  abstract readonly kind: PlotvaultErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends PlotvaultError {
  readonly kind = "validation";
}

export class PermissionDeniedError extends PlotvaultError {
  readonly kind = "permission_denied";

  constructor(
    message: string,
    readonly resource?: string,
    readonly action?: string
  ) {
    super(message);
  }
}

export class NotFoundError extends PlotvaultError {
  readonly kind = "not_found";
}

export class StorageFailureError extends PlotvaultError {
  readonly kind = "storage_failure";
}

export class ConfigError extends PlotvaultError {
  readonly kind = "config";
}

export type AuthFailureReason =
  | "malformed"
  | "invalid_signature"
  | "expired"
  | "unknown_token"
  | "revoked"
  | "fingerprint_mismatch";

/**
 * Every token failure surfaces as the same client-facing category.
 * `reason` is for the audit log only.
 */
export class AuthenticationError extends PlotvaultError {
  readonly kind = "authentication";

  constructor(
    readonly reason: AuthFailureReason,
    detail?: string
  ) {
    super(detail ? `${reason}: ${detail}` : reason);
  }
}

export class RateLimitExceededError extends PlotvaultError {
  readonly kind = "rate_limited";

  constructor(
    readonly limit: number,
    readonly window: number,
    readonly retryAfter: number
  ) {
    super(
      `Rate limit exceeded: ${limit} requests per ${window}s. Retry after ${retryAfter.toFixed(1)}s`
    );
  }
}

export function isPlotvaultError(err: unknown): err is PlotvaultError {
  return err instanceof PlotvaultError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
