// =============================================================================
// @triage/server — Entry point
// =============================================================================
// Loads config, creates the Express + MCP server, starts the cron scheduler,
// and starts listening.
// =============================================================================

import { createLogger, errorMessage, formatConfigError } from "@triage/shared";
import { createApp, type AppInstance } from "./server.js";
import { registerQueueTools } from "./tools/queue.js";
import { registerTriageTools } from "./tools/triage.js";
import { startScheduler } from "./scheduler.js";

let instance: AppInstance;
try {
  instance = createApp();
} catch (err) {
  createLogger().fatal("Invalid configuration", {
    error: formatConfigError(err),
  });
  process.exit(1);
}

const { httpServer, deps, shutdown } = instance;
const { config, logger } = deps;

instance.addToolRegistrar(registerQueueTools);
instance.addToolRegistrar(registerTriageTools);

const scheduler = startScheduler(deps);

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("Triage server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    cronEnabled: config.CRON_ENABLED,
  });
});

// Signal handlers registered here (not in createApp) to avoid accumulation
// if createApp is called multiple times (e.g., in tests).
function handleShutdown() {
  scheduler.stop();
  shutdown()
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error("Shutdown error", { error: errorMessage(err) });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);

export type { ToolRegistrar, AppDependencies, AppInstance } from "./server.js";
export { createApp } from "./server.js";
