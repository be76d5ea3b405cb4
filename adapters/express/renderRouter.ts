import express, { type Router } from "express";
import { getGroup } from "../../core/middleware/authMiddleware.js";
import { asyncHandler } from "../../core/middleware/publicErrorHandler.js";
import { parseGraphParams } from "../../core/render/parseGraphParams.js";
import type { RenderService } from "../../core/render/renderService.js";
import { mimeTypeFor } from "../../core/storage/types.js";

export interface RenderRouterOptions {
  renderService: RenderService;
  proxyBasePath?: string;
}

export function createRenderRouter(options: RenderRouterOptions): Router {
  const router = express.Router();
  const { renderService, proxyBasePath = "/proxy" } = options;

  // --- Render a chart ---
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const params = parseGraphParams(req.body);
      const result = await renderService.render(params, getGroup(res));

      if (result.kind === "guid") {
        res.status(201).json({
          guid: result.guid,
          format: result.format,
          url: `${proxyBasePath}/${result.guid}`,
        });
        return;
      }

      res.setHeader("Content-Type", mimeTypeFor(result.format));
      res.setHeader("Content-Length", String(result.data.length));
      res.send(result.data);
    })
  );

  return router;
}
