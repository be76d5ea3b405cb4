import jwt, { type JwtPayload } from "jsonwebtoken";
import { AuthenticationError, ConfigError, ValidationError, errorMessage } from "../errors.js";
import { type AppLogger, type LogLevel, logWith } from "../logging/createLogger.js";
import type { SecurityAuditor } from "../security/securityAuditor.js";
import type { Clock } from "../utils/clock.js";
import { isValidGuid, newGuid } from "../utils/guid.js";
import { secretFingerprint } from "./fingerprint.js";
import type { TokenRecord, TokenStore } from "./tokenStore.js";

const ALGORITHM = "HS256";

export interface TokenInfo {
  tokenId: string;
  group: string;
  issuedAt: number; // unix seconds
  expiresAt: number; // unix seconds
}

export interface TokenSummary extends TokenInfo {
  revoked: boolean;
  fingerprintBound: boolean;
}

export interface AuthServiceOptions {
  secret: string;
  store: TokenStore;
  auditor?: SecurityAuditor;
  logger?: AppLogger;
  clock?: Clock;
}

type VerifiedClaims = {
  jti: string;
  group: string;
  iat: number;
  exp: number;
};

function hasClaims(payload: string | JwtPayload): payload is JwtPayload & VerifiedClaims {
  return (
    typeof payload === "object" &&
    typeof payload.jti === "string" &&
    typeof payload.group === "string" &&
    typeof payload.iat === "number" &&
    typeof payload.exp === "number"
  );
}

/**
 * Issues HS256 tokens and checks them against a persistent token store.
 *
 * Signature and expiry are checked before the store is touched. The store is
 * then reloaded on every verification, so tokens created or revoked by
 * another process sharing the store are seen without a restart.
 *
 * Every failure is an `AuthenticationError`; its `reason` tells the audit log
 * which check failed.
 */
export class AuthService {
  private readonly secret: string;
  private readonly store: TokenStore;
  private readonly clock: Clock;

  constructor(private options: AuthServiceOptions) {
    if (!options.secret) {
      throw new ConfigError("JWT secret must be a non-empty string");
    }
    this.secret = options.secret;
    this.store = options.store;
    this.clock = options.clock ?? Date.now;
  }

  private log(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    logWith(this.options.logger, level, msg, fields);
  }

  private nowSeconds() {
    return Math.floor(this.clock() / 1000);
  }

  async createToken(
    group: string,
    expiresInSeconds: number,
    options: { fingerprint?: string } = {}
  ): Promise<string> {
    if (typeof group !== "string" || group.trim() === "") {
      throw new ValidationError("group must be a non-empty string");
    }
    if (!Number.isInteger(expiresInSeconds) || expiresInSeconds <= 0) {
      throw new ValidationError(`expiresInSeconds must be a positive integer, got ${expiresInSeconds}`);
    }

    const tokenId = newGuid();
    const issuedAt = this.nowSeconds();
    const expiresAt = issuedAt + expiresInSeconds;

    // exp is derived from the iat we pass, so the injected clock governs both
    const token = jwt.sign({ group, iat: issuedAt }, this.secret, {
      algorithm: ALGORITHM,
      expiresIn: expiresInSeconds,
      jwtid: tokenId,
    });

    const record: TokenRecord = {
      group,
      issued_at: issuedAt,
      expires_at: expiresAt,
      revoked: false,
    };
    if (options.fingerprint) record.fingerprint = options.fingerprint;

    await this.store.update((records) => {
      records.set(tokenId, record);
    });

    this.log("info", "Token created", {
      event: "TOKEN_CREATED",
      tokenId,
      group,
      expiresAt,
      fingerprintBound: Boolean(options.fingerprint),
    });

    return token;
  }

  private verifySignature(token: string, ignoreExpiration = false): VerifiedClaims {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
        ignoreExpiration,
      });
    } catch (err) {
      // TokenExpiredError extends JsonWebTokenError, so it goes first
      if (err instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError("expired", err.message);
      }
      if (err instanceof jwt.JsonWebTokenError && err.message === "invalid signature") {
        throw new AuthenticationError("invalid_signature", err.message);
      }
      throw new AuthenticationError("malformed", errorMessage(err));
    }

    if (!hasClaims(payload)) {
      throw new AuthenticationError("malformed", "missing required claims");
    }
    return { jti: payload.jti, group: payload.group, iat: payload.iat, exp: payload.exp };
  }

  /**
   * A fingerprint bound at issuance is enforced only when the caller supplies
   * one; callers without request context (tool calls) verify without it.
   */
  async verifyToken(token: string, fingerprint?: string): Promise<TokenInfo> {
    if (typeof token !== "string" || token.trim() === "") {
      throw new AuthenticationError("malformed", "empty token");
    }

    const claims = this.verifySignature(token);

    const records = await this.store.load();
    const record = records.get(claims.jti);

    if (!record) {
      throw new AuthenticationError("unknown_token", claims.jti);
    }
    if (record.revoked) {
      throw new AuthenticationError("revoked", claims.jti);
    }
    if (record.fingerprint && fingerprint !== undefined && record.fingerprint !== fingerprint) {
      throw new AuthenticationError("fingerprint_mismatch", claims.jti);
    }

    return {
      tokenId: claims.jti,
      group: claims.group,
      issuedAt: claims.iat,
      expiresAt: claims.exp,
    };
  }

  /**
   * Marks a token revoked. Accepts the signed token or its token id. The
   * record stays in the store as a tombstone. Returns false when the store
   * has no such token.
   */
  async revokeToken(tokenOrId: string, reason = "revoked by administrator"): Promise<boolean> {
    const tokenId = isValidGuid(tokenOrId)
      ? tokenOrId
      : this.verifySignature(tokenOrId, true).jti;

    const revoked = await this.store.update((records) => {
      const record = records.get(tokenId);
      if (!record) return null;

      records.set(tokenId, { ...record, revoked: true });
      return record;
    });

    if (!revoked) {
      this.log("warn", "Revocation of unknown token", { event: "TOKEN_REVOKE_UNKNOWN", tokenId });
      return false;
    }

    this.options.auditor?.logTokenRevoked(revoked.group, reason, tokenId);
    this.log("info", "Token revoked", { event: "TOKEN_REVOKED", tokenId, group: revoked.group, reason });
    return true;
  }

  async listTokens(): Promise<TokenSummary[]> {
    const records = await this.store.load();

    return [...records]
      .map(([tokenId, record]) => ({
        tokenId,
        group: record.group,
        issuedAt: record.issued_at,
        expiresAt: record.expires_at,
        revoked: record.revoked,
        fingerprintBound: Boolean(record.fingerprint),
      }))
      .sort((a, b) => a.issuedAt - b.issuedAt || a.tokenId.localeCompare(b.tokenId));
  }

  getSecretFingerprint(): string {
    return secretFingerprint(this.secret);
  }
}
