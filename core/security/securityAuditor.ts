import fs from "fs";
import path from "path";
import { type AppLogger, logWith } from "../logging/createLogger.js";

/* ----------------------------------
 * Security levels
 * ---------------------------------- */

export const SECURITY_LEVELS = ["INFO", "WARNING", "ERROR", "CRITICAL"] as const;
export type SecurityLevel = typeof SECURITY_LEVELS[number];

export function isSecurityLevel(value: string): value is SecurityLevel {
  return (SECURITY_LEVELS as readonly string[]).includes(value);
}

/* ----------------------------------
 * Event record (wire format)
 * ---------------------------------- */

export interface SecurityEvent {
  timestamp: string;
  level: SecurityLevel;
  event_type: string;
  client_id: string;
  endpoint: string | null;
  message: string;
  details: Record<string, unknown> | null;
}

export interface SecurityAuditorOptions {
  logFile?: string;
  console?: boolean;
  minLevel?: SecurityLevel;
  // receives sink failures; auditing never throws into the caller
  fallbackLogger?: AppLogger;
}

/**
 * Append-only security event log. Each event is one JSON line in the log
 * file and/or a prefixed console line. File lines go through a single append
 * stream; `close` flushes it.
 */
export class SecurityAuditor {
  private readonly logFile?: string;
  private readonly stream?: fs.WriteStream;
  private readonly console: boolean;
  private readonly minLevel: SecurityLevel;
  private readonly fallbackLogger?: AppLogger;

  constructor(options: SecurityAuditorOptions = {}) {
    this.logFile = options.logFile ? path.resolve(options.logFile) : undefined;
    this.console = options.console ?? true;
    this.minLevel = options.minLevel ?? "INFO";
    this.fallbackLogger = options.fallbackLogger;

    if (this.logFile) {
      try {
        fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
      } catch (err) {
        this.reportSinkFailure("Failed to create security log directory", err);
      }

      this.stream = fs.createWriteStream(this.logFile, { flags: "a" });
      this.stream.on("error", (err) => {
        this.reportSinkFailure("Failed to write security log", err);
      });
    }
  }

  private shouldLog(level: SecurityLevel) {
    return SECURITY_LEVELS.indexOf(level) >= SECURITY_LEVELS.indexOf(this.minLevel);
  }

  private reportSinkFailure(msg: string, err: unknown) {
    const error = err instanceof Error ? err.message : String(err);
    if (this.fallbackLogger) {
      logWith(this.fallbackLogger, "error", msg, { error, logFile: this.logFile });
    } else {
      console.error(`${msg}: ${error}`);
    }
  }

  private write(event: SecurityEvent) {
    if (!this.shouldLog(event.level)) return;

    const line = JSON.stringify(event);

    if (this.stream && !this.stream.destroyed) {
      this.stream.write(line + "\n");
    }

    if (this.console) {
      console.log(`[SECURITY:${event.level}] ${event.message} | ${line}`);
    }
  }

  /**
   * Flushes pending file lines and releases the stream. Resolves once the
   * file is closed, including after a sink failure.
   */
  close(): Promise<void> {
    const stream = this.stream;
    if (!stream || stream.closed) return Promise.resolve();

    return new Promise((resolve) => {
      stream.once("close", () => resolve());
      stream.end();
    });
  }

  logEvent(
    level: SecurityLevel,
    eventType: string,
    clientId: string,
    message: string,
    endpoint?: string,
    details?: Record<string, unknown>
  ): void {
    this.write({
      timestamp: new Date().toISOString(),
      level,
      event_type: eventType,
      client_id: clientId,
      endpoint: endpoint ?? null,
      message,
      details: details && Object.keys(details).length > 0 ? details : null,
    });
  }

  // ===== SCENARIO WRAPPERS =====

  logAuthFailure(
    clientId: string,
    reason: string,
    endpoint?: string,
    details?: Record<string, unknown>
  ): void {
    this.logEvent("WARNING", "auth_failure", clientId, `Authentication failed: ${reason}`, endpoint, {
      reason,
      ...details,
    });
  }

  logAuthSuccess(clientId: string, user?: string, endpoint?: string): void {
    this.logEvent(
      "INFO",
      "auth_success",
      clientId,
      `Authentication successful for ${user ?? "unknown"}`,
      endpoint,
      { user: user ?? null }
    );
  }

  logRateLimit(clientId: string, endpoint: string, limit: number, window: number): void {
    this.logEvent(
      "WARNING",
      "rate_limit_exceeded",
      clientId,
      `Rate limit exceeded: ${limit} requests per ${window}s`,
      endpoint,
      { limit, window }
    );
  }

  logSanitizationFailure(
    clientId: string,
    inputType: string,
    reason: string,
    endpoint?: string
  ): void {
    this.logEvent(
      "ERROR",
      "sanitization_failure",
      clientId,
      `Input sanitization failed for ${inputType}: ${reason}`,
      endpoint,
      { input_type: inputType, reason }
    );
  }

  logSuspiciousPattern(
    clientId: string,
    patternType: string,
    description: string,
    endpoint?: string
  ): void {
    this.logEvent(
      "ERROR",
      "suspicious_pattern",
      clientId,
      `Suspicious ${patternType} pattern detected: ${description}`,
      endpoint,
      { pattern_type: patternType, description }
    );
  }

  logTokenRevoked(clientId: string, reason: string, tokenId?: string): void {
    this.logEvent("INFO", "token_revoked", clientId, `Token revoked: ${reason}`, undefined, {
      reason,
      token_id: tokenId ?? null,
    });
  }

  logPermissionDenied(
    clientId: string,
    resource: string,
    action: string,
    endpoint?: string
  ): void {
    this.logEvent(
      "WARNING",
      "permission_denied",
      clientId,
      `Permission denied: ${action} on ${resource}`,
      endpoint,
      { resource, action }
    );
  }

  logCriticalEvent(
    clientId: string,
    description: string,
    endpoint?: string,
    details?: Record<string, unknown>
  ): void {
    this.logEvent("CRITICAL", "critical_security_event", clientId, `CRITICAL: ${description}`, endpoint, {
      description,
      ...details,
    });
  }
}
