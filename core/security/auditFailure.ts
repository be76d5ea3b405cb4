import { AuthenticationError, PermissionDeniedError, RateLimitExceededError } from "../errors.js";
import { SanitizationError } from "./sanitizer.js";
import type { SecurityAuditor } from "./securityAuditor.js";

/**
 * Records a request failure in the security log when it is a security
 * outcome (auth failure, rate limit, permission denial, rejected input).
 * Returns whether anything was recorded.
 */
export function auditFailure(
  auditor: SecurityAuditor | undefined,
  err: unknown,
  clientId: string,
  endpoint: string
): boolean {
  if (!auditor) return false;

  if (err instanceof AuthenticationError) {
    auditor.logAuthFailure(clientId, err.reason, endpoint);
    return true;
  }
  if (err instanceof RateLimitExceededError) {
    auditor.logRateLimit(clientId, endpoint, err.limit, err.window);
    return true;
  }
  if (err instanceof PermissionDeniedError) {
    auditor.logPermissionDenied(clientId, err.resource ?? endpoint, err.action ?? "access", endpoint);
    return true;
  }
  if (err instanceof SanitizationError) {
    auditor.logSanitizationFailure(clientId, err.inputType, err.message, endpoint);
    return true;
  }
  return false;
}
