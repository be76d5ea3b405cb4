import express from "express";
import { createImagesRouter, createProxyRouter } from "../adapters/express/imagesRouter.js";
import { createRenderRouter } from "../adapters/express/renderRouter.js";
import { createToolsRouter } from "../adapters/express/toolsRouter.js";
import type { PlotvaultConfig } from "../config/plotvaultConfig.js";
import { AuthService } from "../core/auth/authService.js";
import { JsonFileTokenStore } from "../core/auth/tokenStore.js";
import type { AppLogger } from "../core/logging/createLogger.js";
import { createAuthMiddleware } from "../core/middleware/authMiddleware.js";
import { PublicError, createErrorHandler } from "../core/middleware/publicErrorHandler.js";
import { createRateLimit } from "../core/middleware/rateLimitMiddleware.js";
import { RateLimiter } from "../core/rateLimiter/rateLimiter.js";
import { RenderService } from "../core/render/renderService.js";
import { SvgChartRenderer } from "../core/render/svgRenderer.js";
import { SecurityAuditor } from "../core/security/securityAuditor.js";
import { type ImageStorage, createFileImageStorage } from "../core/storage/imageStorage.js";
import { ToolDispatcher } from "../core/tools/toolDispatcher.js";

export interface AppServices {
  storage: ImageStorage;
  renderService: RenderService;
  tools: ToolDispatcher;
  limiter: RateLimiter;
  auth?: AuthService; // absent when authentication is off
  auditor?: SecurityAuditor;
  logger?: AppLogger;
}

/**
 * One instance of each service per server, passed by reference into the
 * routers.
 */
export async function createServices(config: PlotvaultConfig, logger?: AppLogger): Promise<AppServices> {
  const auditor = new SecurityAuditor({
    logFile: config.audit.logFile,
    console: config.audit.console,
    minLevel: config.audit.minLevel,
    fallbackLogger: logger,
  });

  const storage = await createFileImageStorage(config.storageDir, {
    logger,
    maxImageBytes: config.maxImageBytes,
  });

  const auth = config.auth.enabled && config.auth.secret
    ? new AuthService({
      secret: config.auth.secret,
      store: new JsonFileTokenStore(config.auth.tokenStore, logger),
      auditor,
      logger,
    })
    : undefined;

  const limiter = new RateLimiter({
    enabled: config.rateLimit.enabled,
    defaultLimit: config.rateLimit.defaultLimit,
    window: config.rateLimit.window,
  });
  limiter.setEndpointLimit("/render", config.rateLimit.renderLimit);
  limiter.setEndpointLimit("tool:render_graph", config.rateLimit.renderLimit);

  const renderService = new RenderService(new SvgChartRenderer(logger), storage, logger);
  const tools = new ToolDispatcher({ renderService, storage, auth, auditor, limiter, logger });

  return { storage, renderService, tools, limiter, auth, auditor, logger };
}

export function createApp(services: AppServices, options: { isProd?: boolean } = {}): express.Express {
  const { storage, renderService, tools, limiter, auth, auditor, logger } = services;

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "3mb" }));

  const requireAuth = createAuthMiddleware({ auth, auditor });

  // ---- Health ----
  app.get("/ping", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      auth: auth ? "enabled" : "disabled",
      secret: auth?.getSecretFingerprint() ?? "none",
      rateLimit: limiter.getStats().enabled ? "enabled" : "disabled",
    });
  });

  // ---- Charts and stored images ----
  app.use("/render", createRateLimit(limiter, "/render"), requireAuth, createRenderRouter({ renderService }));
  app.use("/proxy", createRateLimit(limiter, "/proxy"), requireAuth, createProxyRouter({ storage }));
  app.use("/images", createRateLimit(limiter, "/images"), requireAuth, createImagesRouter({ storage }));

  // ---- Tool interface (tokens travel as arguments) ----
  app.use("/tools", createToolsRouter({ tools }));

  app.use((req, _res, next) => {
    next(new PublicError(`Route not found: ${req.method} ${req.path}`, 404, "NOT_FOUND"));
  });

  app.use(createErrorHandler({ logger, auditor, isProd: options.isProd }));

  return app;
}

