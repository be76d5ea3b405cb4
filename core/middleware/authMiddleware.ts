import type { Request, RequestHandler, Response } from "express";
import type { AuthService, TokenInfo } from "../auth/authService.js";
import { deviceFingerprint } from "../auth/fingerprint.js";
import { AuthenticationError } from "../errors.js";
import type { SecurityAuditor } from "../security/securityAuditor.js";
import { asyncHandler, clientIdOf, endpointOf } from "./publicErrorHandler.js";

const AUTH_LOCAL = "plotvaultAuth";

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header || !header.startsWith("Bearer ")) return undefined;
  const token = header.slice("Bearer ".length).trim();
  return token || undefined;
}

export function requestFingerprint(req: Request): string {
  return deviceFingerprint(req.get("user-agent"), clientIdOf(req));
}

function isTokenInfo(value: unknown): value is TokenInfo {
  return (
    typeof value === "object" &&
    value !== null &&
    "group" in value &&
    typeof value.group === "string"
  );
}

export function getAuth(res: Response): TokenInfo | undefined {
  const value: unknown = res.locals[AUTH_LOCAL];
  return isTokenInfo(value) ? value : undefined;
}

// undefined when authentication is disabled: storage access is then ungated
export function getGroup(res: Response): string | undefined {
  return getAuth(res)?.group;
}

/**
 * Verifies the Bearer token, bound to the caller's device fingerprint.
 * Without an AuthService every request passes through unauthenticated.
 */
export function createAuthMiddleware(options: {
  auth?: AuthService;
  auditor?: SecurityAuditor;
}): RequestHandler {
  const { auth, auditor } = options;

  return asyncHandler(async (req, res, next) => {
    if (!auth) {
      next();
      return;
    }

    const token = bearerToken(req);
    if (!token) {
      throw new AuthenticationError("malformed", "missing bearer token");
    }

    const info = await auth.verifyToken(token, requestFingerprint(req));
    res.locals[AUTH_LOCAL] = info;

    auditor?.logAuthSuccess(clientIdOf(req), info.group, endpointOf(req));
    next();
  });
}
