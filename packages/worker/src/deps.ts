// =============================================================================
// @triage/worker — Production wiring
// =============================================================================
// Builds the orchestrator's collaborators from validated configuration and
// the watchlist file. Tests assemble TriageDependencies by hand instead.
// =============================================================================

import {
  type Config,
  type Logger,
  type Watchlist,
  createProviders,
  loadWatchlist,
} from "@triage/shared";
import { createBatchClassifier } from "./batch-classifier.js";
import { createCheckpointStore } from "./checkpoint-store.js";
import { createWebhookNotifier } from "./notifier.js";
import type { TriageDependencies } from "./orchestrator.js";
import { createPrefilter } from "./prefilter.js";
import { createPromptBuilder } from "./prompt.js";
import { createQueueStore } from "./queue-store.js";
import { createRedditSource } from "./sources/reddit.js";

export function createTriageDependencies(
  config: Config,
  logger: Logger,
  watchlist: Watchlist = loadWatchlist(config.WATCHLIST_FILE),
): TriageDependencies {
  return {
    source: createRedditSource({ watchlist, logger }),
    prefilter: createPrefilter({
      excludeKeywords: watchlist.exclude_keywords,
      maxAgeDays: config.MAX_AGE_DAYS,
      logger: logger.child({ component: "prefilter" }),
    }),
    queue: createQueueStore({
      path: config.QUEUE_FILE,
      relevanceKeywords: watchlist.relevance_keywords,
      logger,
    }),
    checkpoint: createCheckpointStore({
      path: config.CHECKPOINT_FILE,
      maxIds: config.MAX_PROCESSED_IDS,
      logger,
    }),
    classifier: createBatchClassifier({
      providers: createProviders(config),
      prompt: createPromptBuilder({ product: watchlist.product }),
      logger,
      quotaRetryLimit: config.QUOTA_RETRY_LIMIT,
      quotaBackoffMs: config.QUOTA_BACKOFF_MS,
    }),
    notifier: createWebhookNotifier({
      webhookUrl: config.NOTIFY_WEBHOOK_URL,
      logger,
    }),
    logger,
    settings: {
      itemsPerRun: config.ITEMS_PER_RUN,
      chunkSize: config.CHUNK_SIZE,
      chunkDelayMs: config.CHUNK_DELAY_MS,
    },
  };
}
