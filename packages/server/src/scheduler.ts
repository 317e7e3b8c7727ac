// =============================================================================
// @triage/server — Cron scheduler for triage runs
// =============================================================================
// Wraps node-cron to trigger a triage run on a configurable schedule.
// Controlled via env vars: CRON_ENABLED (kill switch) and CRON_SCHEDULE.
// Ticks go through the run coordinator, so a tick that lands while the
// previous run is still going is skipped rather than overlapping it.
// =============================================================================

import cron from "node-cron";
import type { AppDependencies } from "./server.js";

export interface SchedulerHandle {
  stop(): void;
}

export function startScheduler(deps: AppDependencies): SchedulerHandle {
  const { config, logger, coordinator } = deps;

  if (!config.CRON_ENABLED) {
    logger.info("Cron scheduler disabled (CRON_ENABLED=false)");
    return { stop() {} };
  }

  if (!cron.validate(config.CRON_SCHEDULE)) {
    logger.error("Invalid CRON_SCHEDULE, scheduler not started", {
      schedule: config.CRON_SCHEDULE,
    });
    return { stop() {} };
  }

  const task = cron.schedule(config.CRON_SCHEDULE, async () => {
    const start = performance.now();
    logger.info("Cron job starting: triage_run");
    const result = await coordinator.trigger("cron");
    const durationMs = Math.round(performance.now() - start);
    if (result.status === "failed") {
      logger.error("Cron job failed: triage_run", {
        durationMs,
        error: result.error,
      });
    } else {
      logger.info("Cron job finished: triage_run", {
        durationMs,
        status: result.status,
      });
    }
  });

  logger.info("Cron scheduler started", { schedule: config.CRON_SCHEDULE });

  return {
    stop() {
      task.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
