import fs from "fs";
import path from "path";

/* ----------------------------------
 * Log levels
 * ---------------------------------- */

export const LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = typeof LEVELS[number];

export const LOGGER_MODES = ["none", "console", "file"] as const;
export type LoggerMode = typeof LOGGER_MODES[number];

function levelRank(level: LogLevel) {
  return LEVELS.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

export function isLoggerMode(value: string): value is LoggerMode {
  return (LOGGER_MODES as readonly string[]).includes(value);
}

/* ----------------------------------
 * Log entry + logger types
 * ---------------------------------- */

export interface LogEntry {
  level: LogLevel;
  msg: string;
  time?: number;
  [key: string]: unknown;
}

export type AppLogger = (entry: LogEntry) => void;

/**
 * Calls an optional logger without letting a failing sink reach the caller.
 * Every component logs through this.
 */
export function logWith(
  logger: AppLogger | undefined,
  level: LogLevel,
  msg: string,
  fields?: Record<string, unknown>
) {
  if (!logger) return;

  try {
    logger({
      level,
      msg,
      time: Date.now(),
      ...fields,
    });
  } catch (err) {
    console.error("logger failed:", err);
  }
}

/* ----------------------------------
 * Logger factory
 * ---------------------------------- */

export function createLogger(
  mode: LoggerMode,
  options?: {
    filePath?: string;
    level?: LogLevel;
  }
): AppLogger | undefined {
  if (mode === "none") return undefined;

  const minLevel = options?.level ?? "info";

  const shouldLog = (entry: LogEntry) =>
    levelRank(entry.level) <= levelRank(minLevel);

  const normalize = (entry: LogEntry) => ({
    time: entry.time ?? Date.now(),
    ...entry,
  });

  /* ---------- console logger ---------- */

  if (mode === "console") {
    return (entry) => {
      if (!shouldLog(entry)) return;
      console.log(JSON.stringify(normalize(entry)));
    };
  }

  /* ---------- file logger ---------- */

  if (!options?.filePath) {
    console.warn("File logger disabled: filePath not set");
    return undefined;
  }

  try {
    const dir = path.dirname(options.filePath);
    fs.mkdirSync(dir, { recursive: true });

    const stream = fs.createWriteStream(
      path.resolve(options.filePath),
      { flags: "a" }
    );
    stream.on("error", (err) => {
      console.error("File logger stream error:", err);
    });

    return (entry) => {
      if (!shouldLog(entry)) return;
      try {
        stream.write(JSON.stringify(normalize(entry)) + "\n");
      } catch (err) {
        console.error("File logger write failed:", err);
      }
    };
  } catch (err) {
    console.warn("Failed to initialize file logger:", err);
    return undefined;
  }
}
