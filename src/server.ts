import "dotenv/config";
import { config } from "./config/env.js";
import { logger, setLogLevel } from "./lib/logger.js";
import { createApp } from "./app.js";

// ============================================
// Startup
// ============================================

setLogLevel(config.logLevel);

const app = createApp({
  checkMode: config.checkMode,
  bodyLimit: config.bodyLimit,
});

logger.info("Starting card check service", {
  stage: "startup",
  port: config.port,
  checkMode: config.checkMode,
});

const server = app.listen(config.port, () => {
  logger.info("Server listening", { stage: "startup", port: config.port });
});

server.on("error", (err) => {
  logger.error("Server failed", { stage: "startup", port: config.port, error: err });
  process.exit(1);
});

// ============================================
// Shutdown
// ============================================

function shutdown(signal: NodeJS.Signals): void {
  logger.info("Shutting down", { stage: "shutdown", signal });
  server.close((err) => {
    if (err) {
      logger.error("Server close failed", { stage: "shutdown", error: err });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.once("SIGTERM", shutdown);
process.once("SIGINT", shutdown);
