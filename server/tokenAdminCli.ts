#!/usr/bin/env node
import "dotenv/config";

import { loadConfig } from "../config/plotvaultConfig.js";
import { AuthService } from "../core/auth/authService.js";
import { JsonFileTokenStore } from "../core/auth/tokenStore.js";
import { createLogger } from "../core/logging/createLogger.js";
import { SecurityAuditor } from "../core/security/securityAuditor.js";
import { runTokenAdmin } from "./tokenAdmin.js";

async function main() {
  const config = loadConfig();
  if (!config.auth.secret) {
    console.error("PLOTVAULT_JWT_SECRET must be set to manage tokens");
    return 1;
  }

  const logger = createLogger(config.logger === "console" ? "none" : config.logger, {
    filePath: config.logFile,
    level: config.logLevel,
  });

  const auth = new AuthService({
    secret: config.auth.secret,
    store: new JsonFileTokenStore(config.auth.tokenStore, logger),
    auditor: new SecurityAuditor({
      logFile: config.audit.logFile,
      console: false,
      minLevel: config.audit.minLevel,
      fallbackLogger: logger,
    }),
    logger,
  });

  return runTokenAdmin(process.argv.slice(2), auth, (line) => console.log(line));
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error("Token admin failed:", err);
    process.exit(1);
  }
);
