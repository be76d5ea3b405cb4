import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { type PlotvaultErrorKind, RateLimitExceededError, isPlotvaultError } from "../errors.js";
import { type AppLogger, logWith } from "../logging/createLogger.js";
import { auditFailure } from "../security/auditFailure.js";
import type { SecurityAuditor } from "../security/securityAuditor.js";

export interface PublicErrorBody {
  error: string;
  code?: string;
}

export class PublicError extends Error {
  constructor(
    message: string,
    readonly statusCode: number = 400,
    readonly code: string = "BAD_REQUEST"
  ) {
    super(message);
    this.name = "PublicError";
  }
}

const KIND_STATUS: Record<PlotvaultErrorKind, { status: number; code: string }> = {
  validation: { status: 400, code: "VALIDATION_ERROR" },
  permission_denied: { status: 403, code: "PERMISSION_DENIED" },
  not_found: { status: 404, code: "NOT_FOUND" },
  authentication: { status: 401, code: "AUTH_FAILED" },
  rate_limited: { status: 429, code: "RATE_LIMIT_EXCEEDED" },
  storage_failure: { status: 500, code: "STORAGE_FAILURE" },
  config: { status: 500, code: "CONFIG_ERROR" },
};

/**
 * Maps domain errors to their HTTP form. Returns null for anything else,
 * which the error handler treats as an internal error.
 */
export function toPublicError(err: unknown): PublicError | null {
  if (err instanceof PublicError) return err;
  if (!isPlotvaultError(err)) return null;

  const { status, code } = KIND_STATUS[err.kind];

  // never tell the client which token check failed
  if (err.kind === "authentication") {
    return new PublicError("Authentication failed", status, code);
  }
  if (status >= 500) {
    return new PublicError("Internal server error", status, code);
  }
  return new PublicError(err.message, status, code);
}

function hasStatusCode(err: unknown): err is { statusCode: number } {
  return (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    typeof err.statusCode === "number"
  );
}

/* ----------------------------------
 * Express wiring
 * ---------------------------------- */

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function clientIdOf(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? "unknown";
}

export function endpointOf(req: Request): string {
  return req.originalUrl.split("?")[0];
}

/**
 * Terminal error middleware: audits security outcomes, logs every error and
 * answers `{ error, code? }`.
 */
export function createErrorHandler(options: {
  logger?: AppLogger;
  auditor?: SecurityAuditor;
  isProd?: boolean;
}): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const mapped = toPublicError(err);

    auditFailure(options.auditor, err, clientIdOf(req), endpointOf(req));

    // body-parser errors carry their own 4xx status
    const status = mapped?.statusCode ?? (hasStatusCode(err) ? err.statusCode : 500);
    const message = err instanceof Error ? err.message : String(err);

    logWith(options.logger, status >= 500 ? "error" : "warn", "HTTP handler error", {
      method: req.method,
      path: req.originalUrl,
      status,
      error: message,
      kind: isPlotvaultError(err) ? err.kind : undefined,
    });

    if (res.headersSent) {
      res.end();
      return;
    }

    if (err instanceof RateLimitExceededError) {
      res.setHeader("Retry-After", String(Math.ceil(err.retryAfter)));
    }

    const body: PublicErrorBody = mapped
      ? { error: mapped.message, code: mapped.code }
      : {
        error:
          status < 500 || !options.isProd ? message : "Internal server error",
      };

    res.status(status).json(body);
  };
}
