// =============================================================================
// @triage/server — Single-run coordinator
// =============================================================================
// The queue and checkpoint files are read-modify-written whole, so two runs
// interleaving would lose updates. Every trigger (cron tick, MCP tool) goes
// through this coordinator, which refuses to start a run while one is active.
// =============================================================================

import { type Logger, errorMessage } from "@triage/shared";
import type { RunReport } from "@triage/worker";

export type TriggerResult =
  | { status: "completed"; report: RunReport }
  | { status: "skipped"; reason: "run_in_progress" }
  | { status: "failed"; error: string };

export interface LastRun {
  trigger: string;
  startedAt: string;
  finishedAt: string;
  result: TriggerResult;
}

export interface RunCoordinator {
  /** Start a run unless one is active. Never rejects. */
  trigger(source: string): Promise<TriggerResult>;
  isRunning(): boolean;
  lastRun(): LastRun | undefined;
}

export function createRunCoordinator(
  run: () => Promise<RunReport>,
  logger: Logger,
): RunCoordinator {
  let active = false;
  let last: LastRun | undefined;

  return {
    async trigger(source) {
      if (active) {
        logger.warn("Run already in progress, trigger ignored", {
          trigger: source,
        });
        return { status: "skipped", reason: "run_in_progress" };
      }

      active = true;
      const startedAt = new Date().toISOString();
      let result: TriggerResult;
      try {
        result = { status: "completed", report: await run() };
      } catch (err) {
        const error = errorMessage(err);
        logger.error("Run failed", { trigger: source, error });
        result = { status: "failed", error };
      } finally {
        active = false;
      }

      last = {
        trigger: source,
        startedAt,
        finishedAt: new Date().toISOString(),
        result,
      };
      return result;
    },

    isRunning() {
      return active;
    },

    lastRun() {
      return last;
    },
  };
}
