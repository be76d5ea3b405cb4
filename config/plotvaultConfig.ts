import path from "path";
import { secretFingerprint } from "../core/auth/fingerprint.js";
import { ConfigError } from "../core/errors.js";
import {
  type LogLevel,
  type LoggerMode,
  isLogLevel,
  isLoggerMode,
} from "../core/logging/createLogger.js";
import { type SecurityLevel, isSecurityLevel } from "../core/security/securityAuditor.js";

export interface PlotvaultConfig {
  nodeEnv: string;
  host: string;
  port: number;
  dataDir: string;
  storageDir: string;
  maxImageBytes: number;
  logger: LoggerMode;
  logFile: string;
  logLevel: LogLevel;
  auth: {
    enabled: boolean;
    secret?: string;
    tokenStore: string;
  };
  audit: {
    logFile?: string;
    console: boolean;
    minLevel: SecurityLevel;
  };
  rateLimit: {
    enabled: boolean;
    defaultLimit: number;
    window: number; // seconds
    renderLimit: number;
  };
}

type Env = Record<string, string | undefined>;

// absent, empty or non-finite values fall back to the default
function numberVar(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function positiveVar(env: Env, name: string, fallback: number): number {
  const value = numberVar(env, name, fallback);
  if (value <= 0) {
    throw new ConfigError(`PLOTVAULT_${name} must be positive, got ${value}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): PlotvaultConfig {
  const vars: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("PLOTVAULT_")) vars[key.slice("PLOTVAULT_".length)] = value;
  }

  const dataDir = path.resolve(vars.DATA_DIR ?? "./data");

  const logger = vars.LOGGER ?? "console";
  if (!isLoggerMode(logger)) {
    throw new ConfigError(`PLOTVAULT_LOGGER must be one of none, console, file; got ${logger}`);
  }
  const logLevel = vars.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`PLOTVAULT_LOG_LEVEL must be one of error, warn, info, debug; got ${logLevel}`);
  }
  const auditMinLevel = (vars.AUDIT_MIN_LEVEL ?? "INFO").toUpperCase();
  if (!isSecurityLevel(auditMinLevel)) {
    throw new ConfigError(`PLOTVAULT_AUDIT_MIN_LEVEL is not a security level: ${auditMinLevel}`);
  }

  const authEnabled = vars.AUTH !== "off";
  const secret = vars.JWT_SECRET || undefined;
  if (authEnabled && !secret) {
    throw new ConfigError(
      "Authentication is enabled but PLOTVAULT_JWT_SECRET is not set (set PLOTVAULT_AUTH=off to disable)"
    );
  }

  return {
    nodeEnv: env.NODE_ENV ?? "development",
    host: vars.HOST ?? "0.0.0.0",
    port: numberVar(vars, "SERVER_PORT", 8000),
    dataDir,
    storageDir: path.join(dataDir, "storage"),
    maxImageBytes: positiveVar(vars, "MAX_IMAGE_BYTES", 10 * 1024 * 1024),
    logger,
    logFile: vars.LOG_FILE ?? "./logs/plotvault.log",
    logLevel,
    auth: {
      enabled: authEnabled,
      secret,
      tokenStore: path.resolve(vars.TOKEN_STORE ?? path.join(dataDir, "auth", "tokens.json")),
    },
    audit: {
      logFile: vars.AUDIT_LOG_FILE || undefined,
      console: vars.AUDIT_CONSOLE !== "off",
      minLevel: auditMinLevel,
    },
    rateLimit: {
      enabled: vars.RATE_LIMIT !== "off", // on unless PLOTVAULT_RATE_LIMIT=off
      defaultLimit: positiveVar(vars, "RL_DEFAULT_LIMIT", 100),
      window: positiveVar(vars, "RL_WINDOW", 60),
      renderLimit: positiveVar(vars, "RL_RENDER_LIMIT", 10),
    },
  };
}

/**
 * Startup summary that is safe to log: the secret appears only as its
 * fingerprint.
 */
export function describeConfig(config: PlotvaultConfig): Record<string, unknown> {
  return {
    nodeEnv: config.nodeEnv,
    host: config.host,
    port: config.port,
    storageDir: config.storageDir,
    authEnabled: config.auth.enabled,
    tokenStore: config.auth.tokenStore,
    secret: secretFingerprint(config.auth.secret),
    rateLimitEnabled: config.rateLimit.enabled,
  };
}
