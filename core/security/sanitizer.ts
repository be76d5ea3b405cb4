import { ValidationError } from "../errors.js";
import { newGuid } from "../utils/guid.js";

export class SanitizationError extends ValidationError {
  constructor(
    readonly inputType: string,
    message: string
  ) {
    super(message);
  }
}

export const CHART_TYPES = ["line", "scatter", "bar"] as const;
export type ChartType = typeof CHART_TYPES[number];

export const IMAGE_FORMATS = ["png", "jpg", "jpeg", "svg", "pdf"] as const;
export type ImageFormat = typeof IMAGE_FORMATS[number];

export const THEME_NAMES = ["light", "dark", "bizlight", "bizdark"] as const;
export type ThemeName = typeof THEME_NAMES[number];

const SQL_INJECTION_PATTERNS = [
  /\b(SELECT|INSERT|UPDATE|DELETE|DROP|CREATE|ALTER|EXEC|EXECUTE)\b/i,
  /(--|#|\/\*|\*\/)/,
  /\bOR\b.*=.*\bOR\b/i,
  /\bUNION\b.*\bSELECT\b/i,
];

const XSS_PATTERNS = [
  /<script[^>]*>.*?<\/script>/is,
  /javascript:/i,
  /onerror\s*=/i,
  /onload\s*=/i,
  /onclick\s*=/i,
];

function oneOf<T extends string>(
  inputType: string,
  allowed: readonly T[],
  value: unknown
): T {
  if (typeof value !== "string") {
    throw new SanitizationError(inputType, `${inputType} must be a string, got ${typeof value}`);
  }

  const normalized = value.toLowerCase().trim();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new SanitizationError(
      inputType,
      `Invalid ${inputType}: ${normalized}. Allowed: ${allowed.join(", ")}`
    );
  }
  return match;
}

export function sanitizeChartType(value: unknown): ChartType {
  return oneOf("chart type", CHART_TYPES, value);
}

export function sanitizeFormat(value: unknown): ImageFormat {
  return oneOf("format", IMAGE_FORMATS, value);
}

export function sanitizeTheme(value: unknown): ThemeName {
  return oneOf("theme", THEME_NAMES, value);
}

export function sanitizeString(
  value: unknown,
  options: {
    maxLength?: number;
    allowNewlines?: boolean;
    strict?: boolean;
    // chart titles legitimately contain words like "update"
    checkSql?: boolean;
  } = {}
): string {
  const { maxLength = 1000, allowNewlines = true, strict = true, checkSql = true } = options;

  if (typeof value !== "string") {
    throw new SanitizationError("string", `Text must be a string, got ${typeof value}`);
  }

  let text = value;
  if (text.length > maxLength) {
    if (strict) {
      throw new SanitizationError("string", `String too long: ${text.length} > ${maxLength}`);
    }
    text = text.slice(0, maxLength);
  }

  if (checkSql && SQL_INJECTION_PATTERNS.some((pattern) => pattern.test(text))) {
    throw new SanitizationError("string", "Suspicious SQL pattern detected");
  }
  if (XSS_PATTERNS.some((pattern) => pattern.test(text))) {
    throw new SanitizationError("string", "Suspicious XSS pattern detected");
  }

  if (!allowNewlines) {
    text = text.replace(/[\r\n]/g, " ");
  }

  return text.trim();
}

export function escapeForSvg(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

export function sanitizeNumericRange(value: unknown, min?: number, max?: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SanitizationError("number", `Value must be a finite number, got ${String(value)}`);
  }
  if (min !== undefined && value < min) {
    throw new SanitizationError("number", `Value ${value} below minimum ${min}`);
  }
  if (max !== undefined && value > max) {
    throw new SanitizationError("number", `Value ${value} above maximum ${max}`);
  }
  return value;
}

/* ----------------------------------
 * Download filenames
 * ---------------------------------- */

const MAX_FILENAME_LENGTH = 128;
const UNSAFE_CHARS = /[^a-zA-Z0-9._-]+/g;
const CONTROL_CHARS = /[\x00-\x1F\x7F]/g;
const PATH_SEPARATORS = /[\\/]/;

export type SanitizedFilename = {
  filename: string;
  original: string;
  sanitized: boolean;
  reason?: "empty" | "path_separators" | "nothing_left";
};

export interface DownloadNameOptions {
  // format of the served image; the name always ends in it
  format?: string;
  maxLength?: number;
  // refuse names with path separators instead of flattening them
  strict?: boolean;
}

function canonicalExtension(ext: string) {
  const lower = ext.toLowerCase();
  return lower === "jpeg" ? "jpg" : lower;
}

function isImageExtension(ext: string) {
  return (IMAGE_FORMATS as readonly string[]).includes(ext.toLowerCase());
}

// "report" -> "report.svg", "report.png" -> "report.svg", "q3.final" -> "q3.final.svg"
function withFormatExtension(stem: string, format: string): string {
  const dot = stem.lastIndexOf(".");
  const ext = dot > 0 ? stem.slice(dot + 1) : "";
  if (ext && canonicalExtension(ext) === canonicalExtension(format)) return stem;

  const base = ext && isImageExtension(ext) ? stem.slice(0, dot) : stem;
  return `${base}.${format}`;
}

function generatedName(format?: string) {
  return format ? `chart_${newGuid()}.${format}` : `chart_${newGuid()}`;
}

/**
 * Turns a client-supplied download name into a safe `Content-Disposition`
 * filename that carries the image's real extension.
 */
export function sanitizeFilename(
  input: string | undefined | null,
  options: DownloadNameOptions = {}
): SanitizedFilename {
  const original = input ?? "";
  const { format, maxLength = MAX_FILENAME_LENGTH, strict = false } = options;

  const fallback = (reason: SanitizedFilename["reason"]): SanitizedFilename => ({
    filename: generatedName(format),
    original,
    sanitized: true,
    reason,
  });

  if (!original) return fallback("empty");

  let name = original.normalize("NFKC").replace(CONTROL_CHARS, "");

  if (PATH_SEPARATORS.test(name)) {
    if (strict) return fallback("path_separators");
    // keep only the last path segment
    name = name.split(PATH_SEPARATORS).filter(Boolean).pop() ?? "";
  }

  name = name.replace(UNSAFE_CHARS, "_").replace(/^[_.]+|[_.]+$/g, "");

  // room for the extension
  const budget = format ? maxLength - format.length - 1 : maxLength;
  if (name.length > budget) {
    name = name.slice(0, budget).replace(/[_.]+$/, "");
  }

  if (!name) return fallback("nothing_left");

  const filename = format ? withFormatExtension(name, format) : name;
  return {
    filename,
    original,
    sanitized: filename !== original,
  };
}
