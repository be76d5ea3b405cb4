import { errorMessage } from "../errors.js";
import { type AppLogger, type LogLevel, logWith } from "../logging/createLogger.js";
import type { ImageFormat } from "../security/sanitizer.js";
import type { ImageStorage } from "../storage/imageStorage.js";
import type { ImageGuid } from "../storage/types.js";
import type { ChartRenderer, GraphParams, RenderedImage } from "./types.js";

export type RenderResult =
  | { kind: "guid"; guid: ImageGuid; format: ImageFormat }
  | { kind: "inline"; data: Buffer; format: ImageFormat };

export const CHART_DESCRIPTIONS: Record<GraphParams["type"], string> = {
  line: "Line chart for trends over ordered data; one line per dataset",
  scatter: "Scatter plot of individual points; one marker colour per dataset",
  bar: "Bar chart for comparing categories; multiple datasets are grouped side by side",
};

/**
 * Renders a chart and either returns the bytes or, in proxy mode, stores
 * them under the caller's group and returns the GUID.
 */
export class RenderService {
  constructor(
    private renderer: ChartRenderer,
    private storage: ImageStorage,
    private logger?: AppLogger
  ) { }

  private log(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    logWith(this.logger, level, msg, fields);
  }

  async render(params: GraphParams, group?: string): Promise<RenderResult> {
    this.log("info", "Starting render", {
      event: "RENDER_START",
      type: params.type,
      format: params.format,
      theme: params.theme,
      datasets: params.datasets.length,
      points: params.datasets[0].values.length,
    });

    // no storage lock is held while drawing
    let image: RenderedImage;
    try {
      image = await this.renderer.render(params);
    } catch (err) {
      this.log("error", "Render failed", { event: "RENDER_FAIL", type: params.type, error: errorMessage(err) });
      throw err;
    }

    if (!params.proxy) {
      this.log("info", "Render completed", { event: "RENDER_SUCCESS", format: image.format, size: image.data.length });
      return { kind: "inline", data: image.data, format: image.format };
    }

    const guid = await this.storage.saveImage(image.data, image.format, group);
    this.log("info", "Render completed (proxy mode)", {
      event: "RENDER_SUCCESS",
      format: image.format,
      size: image.data.length,
      guid,
      group,
    });
    return { kind: "guid", guid, format: image.format };
  }
}
