import type { ChartType, ImageFormat, ThemeName } from "../security/sanitizer.js";

export interface Dataset {
  values: number[];
  label?: string;
  color?: string;
}

/**
 * Validated chart request. Produced by `parseGraphParams`; renderers may
 * assume every invariant it checks (equal series lengths, finite numbers,
 * sanitized text).
 */
export interface GraphParams {
  title: string;
  x?: number[];
  datasets: Dataset[]; // y1..y5 in order, at least one
  xlabel: string;
  ylabel: string;
  type: ChartType;
  format: ImageFormat;
  theme: ThemeName;
  proxy: boolean;
  lineWidth: number;
  markerSize: number; // marker area, in points squared
  alpha: number;
  xmin?: number;
  xmax?: number;
  ymin?: number;
  ymax?: number;
}

export interface RenderedImage {
  data: Buffer;
  format: ImageFormat;
}

export interface ChartRenderer {
  readonly supportedFormats: readonly ImageFormat[];
  render(params: GraphParams): RenderedImage | Promise<RenderedImage>;
}
