import { z } from "zod";
import { ValidationError } from "../errors.js";
import {
  SanitizationError,
  sanitizeChartType,
  sanitizeFormat,
  sanitizeString,
  sanitizeTheme,
} from "../security/sanitizer.js";
import type { Dataset, GraphParams } from "./types.js";

export const MAX_POINTS = 10_000;
const MAX_TEXT = 200;

const NAMED_COLORS = [
  "red", "blue", "green", "yellow", "orange", "purple", "pink",
  "black", "white", "gray", "brown", "cyan", "magenta",
];

const series = z.array(z.number().finite()).min(1).max(MAX_POINTS);
const text = z.string().max(MAX_TEXT);
const bound = z.number().finite().optional();

/**
 * Wire shape of a render request (REST body or tool arguments). `y` is an
 * alias of `y1`.
 */
export const graphInputSchema = z.object({
  title: text.default(""),
  x: series.optional(),
  y: series.optional(),
  y1: series.optional(),
  y2: series.optional(),
  y3: series.optional(),
  y4: series.optional(),
  y5: series.optional(),
  label1: text.optional(),
  label2: text.optional(),
  label3: text.optional(),
  label4: text.optional(),
  label5: text.optional(),
  color1: z.string().optional(),
  color2: z.string().optional(),
  color3: z.string().optional(),
  color4: z.string().optional(),
  color5: z.string().optional(),
  xlabel: text.default(""),
  ylabel: text.default(""),
  type: z.string().default("line"),
  format: z.string().default("svg"),
  theme: z.string().default("light"),
  proxy: z.boolean().default(false),
  line_width: z.number().positive().finite().default(2),
  marker_size: z.number().positive().finite().default(36),
  alpha: z.number().min(0).max(1).default(1),
  xmin: bound,
  xmax: bound,
  ymin: bound,
  ymax: bound,
});

export type GraphInput = z.input<typeof graphInputSchema>;

export function isColor(value: string): boolean {
  const color = value.trim();
  if (/^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/.test(color)) return true;
  if (/^rgba?\(\s*[\d.]+\s*(,\s*[\d.]+\s*){2,3}\)$/.test(color)) return true;
  return NAMED_COLORS.includes(color.toLowerCase());
}

function cleanText(value: string): string {
  return sanitizeString(value, { maxLength: MAX_TEXT, allowNewlines: false, checkSql: false });
}

function cleanColor(field: string, value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (!isColor(value)) {
    throw new SanitizationError(
      "color",
      `Invalid ${field} '${value}': use hex (#FF5733), rgb(r,g,b), rgba(r,g,b,a) or a color name`
    );
  }
  return value.trim();
}

function checkRange(axis: string, min?: number, max?: number) {
  if (min !== undefined && max !== undefined && min >= max) {
    throw new ValidationError(`${axis}min must be less than ${axis}max`);
  }
}

/**
 * Validates an untyped render request into `GraphParams`. Throws
 * ValidationError (or SanitizationError for rejected text and enums).
 */
export function parseGraphParams(input: unknown): GraphParams {
  const parsed = graphInputSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "request";
    throw new ValidationError(`Invalid ${where}: ${issue.message}`);
  }
  const raw = parsed.data;

  if (raw.y !== undefined && raw.y1 !== undefined) {
    throw new ValidationError("Provide either y or y1, not both");
  }

  const candidates = [
    { values: raw.y1 ?? raw.y, label: raw.label1, color: raw.color1 },
    { values: raw.y2, label: raw.label2, color: raw.color2 },
    { values: raw.y3, label: raw.label3, color: raw.color3 },
    { values: raw.y4, label: raw.label4, color: raw.color4 },
    { values: raw.y5, label: raw.label5, color: raw.color5 },
  ];

  const datasets: Dataset[] = [];
  candidates.forEach((candidate, index) => {
    if (candidate.values === undefined) return;
    datasets.push({
      values: candidate.values,
      label: candidate.label !== undefined ? cleanText(candidate.label) || undefined : undefined,
      color: cleanColor(`color${index + 1}`, candidate.color),
    });
  });

  if (datasets.length === 0) {
    throw new ValidationError("At least one dataset (y1) is required");
  }

  const length = datasets[0].values.length;
  datasets.forEach((dataset, index) => {
    if (dataset.values.length !== length) {
      throw new ValidationError(
        `All datasets must have the same length: the first has ${length} points, dataset ${index + 1} has ${dataset.values.length}`
      );
    }
  });

  if (raw.x !== undefined && raw.x.length !== length) {
    throw new ValidationError(`x has ${raw.x.length} points, datasets have ${length}`);
  }

  const type = sanitizeChartType(raw.type);
  if (type === "line" && length < 2) {
    throw new ValidationError("Line charts require at least 2 data points");
  }

  checkRange("x", raw.xmin, raw.xmax);
  checkRange("y", raw.ymin, raw.ymax);

  return {
    title: cleanText(raw.title),
    x: raw.x,
    datasets,
    xlabel: cleanText(raw.xlabel),
    ylabel: cleanText(raw.ylabel),
    type,
    format: sanitizeFormat(raw.format),
    theme: sanitizeTheme(raw.theme),
    proxy: raw.proxy,
    lineWidth: raw.line_width,
    markerSize: raw.marker_size,
    alpha: raw.alpha,
    xmin: raw.xmin,
    xmax: raw.xmax,
    ymin: raw.ymin,
    ymax: raw.ymax,
  };
}
