import "dotenv/config";
import http from "http";

import { describeConfig, loadConfig } from "../config/plotvaultConfig.js";
import { createLogger, logWith } from "../core/logging/createLogger.js";
import { createApp, createServices } from "./createApp.js";

const BUCKET_SWEEP_MS = 10 * 60 * 1000;

async function startServer() {
  // a ConfigError here is fatal: nothing is listening yet
  const config = loadConfig();

  const logger = createLogger(config.logger, {
    filePath: config.logFile,
    level: config.logLevel,
  });

  logWith(logger, "info", "server environment", describeConfig(config));

  const services = await createServices(config, logger);
  const app = createApp(services, { isProd: config.nodeEnv === "production" });

  // ---- Rate limiter housekeeping ----
  const sweep = setInterval(() => {
    const removed = services.limiter.cleanupStaleBuckets();
    if (removed > 0) {
      logWith(logger, "debug", "Stale rate-limit buckets removed", { removed });
    }
  }, BUCKET_SWEEP_MS);
  sweep.unref();

  // ---- HTTP server ----
  const server = http.createServer(app);

  server.listen(config.port, config.host, () => {
    logWith(logger, "info", "Chart server started", {
      host: config.host,
      port: config.port,
      auth: config.auth.enabled,
    });
  });

  // ---- Graceful shutdown ----
  const shutdown = (signal: string) => {
    logWith(logger, "info", "Shutdown initiated", { signal });
    clearInterval(sweep);

    server.close((err) => {
      if (err) {
        logWith(logger, "error", "Error while closing HTTP server", { error: err.message });
      }
      logWith(logger, "info", "HTTP server closed");

      // pending audit lines reach the file before exit
      const flushed = services.auditor ? services.auditor.close() : Promise.resolve();
      flushed.then(
        () => process.exit(0),
        (closeErr: unknown) => {
          logWith(logger, "error", "Error while closing security log", { error: String(closeErr) });
          process.exit(1);
        }
      );
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

startServer().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
