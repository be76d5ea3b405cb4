import { ValidationError } from "../errors.js";
import { type AppLogger, logWith } from "../logging/createLogger.js";
import { type ImageFormat, escapeForSvg } from "../security/sanitizer.js";
import { type Theme, getTheme } from "./themes.js";
import type { ChartRenderer, GraphParams, RenderedImage } from "./types.js";

const WIDTH = 640;
const HEIGHT = 480;
const MARGIN = { top: 50, right: 24, bottom: 60, left: 72 };
const TICKS = 5;

type Range = { min: number; max: number };

/* ----------------------------------
 * Geometry helpers
 * ---------------------------------- */

function fmt(n: number): string {
  return String(Number(n.toFixed(2)));
}

function tickLabel(n: number): string {
  return String(Number(n.toPrecision(4)));
}

function widen(range: Range): Range {
  if (range.max > range.min) return range;
  return { min: range.min - 1, max: range.max + 1 };
}

function extent(values: number[]): Range {
  return { min: Math.min(...values), max: Math.max(...values) };
}

function smallestStep(xs: number[]): number {
  const sorted = [...new Set(xs)].sort((a, b) => a - b);
  let step = Infinity;
  for (let i = 1; i < sorted.length; i++) {
    step = Math.min(step, sorted[i] - sorted[i - 1]);
  }
  return Number.isFinite(step) ? step : 1;
}

function scale(range: Range, from: number, to: number) {
  return (value: number) => from + ((value - range.min) / (range.max - range.min)) * (to - from);
}

/* ----------------------------------
 * Renderer
 * ---------------------------------- */

/**
 * Draws line, scatter and bar charts as standalone SVG documents.
 * Raster and PDF output need an external graphics library and are rejected.
 */
export class SvgChartRenderer implements ChartRenderer {
  readonly supportedFormats: readonly ImageFormat[] = ["svg"];

  constructor(private logger?: AppLogger) { }

  render(params: GraphParams): RenderedImage {
    if (!this.supportedFormats.includes(params.format)) {
      throw new ValidationError(
        `Format '${params.format}' is not supported by this renderer. Supported: ${this.supportedFormats.join(", ")}`
      );
    }

    const svg = this.draw(params, getTheme(params.theme));

    logWith(this.logger, "debug", "Chart drawn", {
      event: "RENDER_DRAW",
      type: params.type,
      theme: params.theme,
      datasets: params.datasets.length,
      points: params.datasets[0].values.length,
      bytes: Buffer.byteLength(svg),
    });

    return { data: Buffer.from(svg, "utf8"), format: "svg" };
  }

  private draw(params: GraphParams, theme: Theme): string {
    const n = params.datasets[0].values.length;
    const xs = params.x ?? Array.from({ length: n }, (_, i) => i);
    const isBar = params.type === "bar";

    // bars need half a slot of room on either side
    const slot = isBar ? smallestStep(xs) * 0.8 : 0;
    let xRange = extent(xs);
    xRange = { min: xRange.min - slot / 2, max: xRange.max + slot / 2 };

    let yRange = extent(params.datasets.flatMap((d) => d.values));
    if (isBar) yRange = { min: Math.min(0, yRange.min), max: Math.max(0, yRange.max) };

    xRange = widen({ min: params.xmin ?? xRange.min, max: params.xmax ?? xRange.max });
    yRange = widen({ min: params.ymin ?? yRange.min, max: params.ymax ?? yRange.max });

    const left = MARGIN.left;
    const right = WIDTH - MARGIN.right;
    const top = MARGIN.top;
    const bottom = HEIGHT - MARGIN.bottom;
    const sx = scale(xRange, left, right);
    const sy = scale(yRange, bottom, top);

    const parts: string[] = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">`,
      `<rect width="${WIDTH}" height="${HEIGHT}" fill="${theme.background}"/>`,
      `<rect x="${left}" y="${top}" width="${right - left}" height="${bottom - top}" fill="${theme.plotBackground}"/>`,
      `<clipPath id="plot"><rect x="${left}" y="${top}" width="${right - left}" height="${bottom - top}"/></clipPath>`,
    ];

    // ---- grid and ticks ----
    for (let i = 0; i <= TICKS; i++) {
      const xv = xRange.min + ((xRange.max - xRange.min) * i) / TICKS;
      const yv = yRange.min + ((yRange.max - yRange.min) * i) / TICKS;
      const px = fmt(sx(xv));
      const py = fmt(sy(yv));
      parts.push(
        `<line x1="${px}" y1="${top}" x2="${px}" y2="${bottom}" stroke="${theme.grid}"/>`,
        `<line x1="${left}" y1="${py}" x2="${right}" y2="${py}" stroke="${theme.grid}"/>`,
        `<text x="${px}" y="${bottom + 18}" fill="${theme.text}" font-size="11" text-anchor="middle">${tickLabel(xv)}</text>`,
        `<text x="${left - 8}" y="${py}" fill="${theme.text}" font-size="11" text-anchor="end" dominant-baseline="middle">${tickLabel(yv)}</text>`
      );
    }

    parts.push(
      `<line x1="${left}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="${theme.axis}"/>`,
      `<line x1="${left}" y1="${top}" x2="${left}" y2="${bottom}" stroke="${theme.axis}"/>`
    );

    // ---- series ----
    parts.push(`<g clip-path="url(#plot)">`);
    params.datasets.forEach((dataset, index) => {
      const color = dataset.color ?? theme.palette[index % theme.palette.length];
      const points = dataset.values.map((y, i) => ({ x: xs[i], y }));

      if (params.type === "line") {
        const path = points.map((p) => `${fmt(sx(p.x))},${fmt(sy(p.y))}`).join(" ");
        parts.push(
          `<polyline points="${path}" fill="none" stroke="${color}" stroke-width="${fmt(params.lineWidth)}" stroke-opacity="${fmt(params.alpha)}"/>`
        );
      } else if (params.type === "scatter") {
        const r = fmt(Math.sqrt(params.markerSize) / 2);
        for (const p of points) {
          parts.push(
            `<circle cx="${fmt(sx(p.x))}" cy="${fmt(sy(p.y))}" r="${r}" fill="${color}" fill-opacity="${fmt(params.alpha)}"/>`
          );
        }
      } else {
        const count = params.datasets.length;
        const barWidth = slot / count;
        const offset = (index - count / 2 + 0.5) * barWidth;
        const base = sy(Math.max(yRange.min, Math.min(0, yRange.max)));

        for (const p of points) {
          const x0 = sx(p.x + offset - barWidth / 2);
          const x1 = sx(p.x + offset + barWidth / 2);
          const yTop = sy(p.y);
          parts.push(
            `<rect x="${fmt(x0)}" y="${fmt(Math.min(yTop, base))}" width="${fmt(x1 - x0)}" height="${fmt(Math.abs(base - yTop))}" fill="${color}" fill-opacity="${fmt(params.alpha)}"/>`
          );
        }
      }
    });
    parts.push(`</g>`);

    // ---- labels ----
    if (params.title) {
      parts.push(
        `<text x="${WIDTH / 2}" y="${top / 2 + 6}" fill="${theme.text}" font-size="16" text-anchor="middle">${escapeForSvg(params.title)}</text>`
      );
    }
    if (params.xlabel) {
      parts.push(
        `<text x="${(left + right) / 2}" y="${HEIGHT - 16}" fill="${theme.text}" font-size="12" text-anchor="middle">${escapeForSvg(params.xlabel)}</text>`
      );
    }
    if (params.ylabel) {
      const cy = (top + bottom) / 2;
      parts.push(
        `<text x="18" y="${cy}" fill="${theme.text}" font-size="12" text-anchor="middle" transform="rotate(-90 18 ${cy})">${escapeForSvg(params.ylabel)}</text>`
      );
    }

    // ---- legend ----
    const labelled = params.datasets
      .map((dataset, index) => ({ label: dataset.label, color: dataset.color ?? theme.palette[index % theme.palette.length] }))
      .filter((entry) => entry.label);

    labelled.forEach((entry, i) => {
      const y = top + 14 + i * 18;
      parts.push(
        `<rect x="${right - 130}" y="${y - 8}" width="12" height="12" fill="${entry.color}"/>`,
        `<text x="${right - 112}" y="${y + 2}" fill="${theme.text}" font-size="11">${escapeForSvg(entry.label ?? "")}</text>`
      );
    });

    parts.push("</svg>");
    return parts.join("\n");
  }
}
