import express, { type Router } from "express";
import { asyncHandler, clientIdOf } from "../../core/middleware/publicErrorHandler.js";
import type { ToolDispatcher } from "../../core/tools/toolDispatcher.js";

export interface ToolsRouterOptions {
  tools: ToolDispatcher;
}

/**
 * Tool interface over HTTP. Tool failures are part of the result body
 * (`isError: true`), so a completed call always answers 200.
 */
export function createToolsRouter(options: ToolsRouterOptions): Router {
  const router = express.Router();
  const { tools } = options;

  router.get("/", (_req, res) => {
    res.json({ tools: tools.listTools() });
  });

  router.post(
    "/:name",
    asyncHandler(async (req, res) => {
      const result = await tools.call(req.params.name, req.body, clientIdOf(req));
      res.json(result);
    })
  );

  return router;
}
