#!/usr/bin/env node
// =============================================================================
// @triage/worker — One-shot CLI
// =============================================================================
// Runs a single triage pass and exits. Meant to be invoked by an external
// scheduler (cron, a CI schedule) that guarantees runs never overlap.
//
// Usage:
//   GEMINI_API_KEY=... NOTIFY_WEBHOOK_URL=https://... npm run triage
//
// Exits 1 when configuration is missing or invalid, or when the run aborts.
// =============================================================================

import {
  type Config,
  createLogger,
  errorMessage,
  formatConfigError,
  loadConfig,
} from "@triage/shared";
import { createTriageDependencies } from "./deps.js";
import { runTriage } from "./orchestrator.js";

async function main(config: Config): Promise<void> {
  const logger = createLogger({ level: config.LOG_LEVEL });
  try {
    const report = await runTriage(createTriageDependencies(config, logger));
    logger.info("Triage run complete", {
      runId: report.runId,
      relevant: report.relevant,
      sent: report.sent,
      queueRemaining: report.queueRemaining,
    });
  } catch (err) {
    logger.fatal("Triage run aborted", {
      error: errorMessage(err),
    });
    process.exitCode = 1;
  }
}

let config: Config | undefined;
try {
  config = loadConfig();
} catch (err) {
  createLogger().fatal("Invalid configuration", {
    error: formatConfigError(err),
  });
}

if (config) {
  await main(config);
} else {
  process.exitCode = 1;
}
