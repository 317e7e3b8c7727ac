// =============================================================================
// @triage/worker — Run orchestrator
// =============================================================================
// Drives one triage pass:
//
//   FETCH → PREFILTER → ENQUEUE → RECONCILE → DEQUEUE → CLASSIFY_LOOP → ACK
//   → SUMMARIZE → DONE
//
// Everything runs sequentially. Relevant items are notified per chunk, and
// the checkpoint is saved after every classified chunk, so a crash loses at
// most the current chunk. An entry is acknowledged only once a save that
// includes its id has succeeded. Queue removal happens once, after the loop;
// entries checkpointed by a run that died before its ACK are removed by
// RECONCILE on the next run. A checkpoint file that exists but cannot be read
// stops the run before FETCH. Nothing here retries: retry and failover live
// in the batch classifier.
//
// At most one run may be active against the same queue and checkpoint files.
// The run harness enforces that, not this module.
// =============================================================================

import {
  type Item,
  type ItemType,
  type Logger,
  type QueueEntry,
  type RunSummary,
  createRunId,
  errorMessage,
} from "@triage/shared";
import {
  type BatchClassifier,
  type ChunkOutcome,
  createClassifierSession,
  selectRelevant,
} from "./batch-classifier.js";
import type { CheckpointStore } from "./checkpoint-store.js";
import type { Notifier } from "./notifier.js";
import type { Prefilter, PrefilterReport } from "./prefilter.js";
import type { QueueStore } from "./queue-store.js";
import type { ContentSource } from "./sources/reddit.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunSettings {
  /** Entries dequeued per run */
  itemsPerRun: number;
  /** Entries per classification request */
  chunkSize: number;
  /** Pause between chunks */
  chunkDelayMs: number;
}

export interface TriageDependencies {
  source: ContentSource;
  prefilter: Prefilter;
  queue: QueueStore;
  checkpoint: CheckpointStore;
  classifier: BatchClassifier;
  notifier: Notifier;
  logger: Logger;
  settings: RunSettings;
  sleep?: (ms: number) => Promise<void>;
}

export interface ChunkReport {
  chunk: number;
  size: number;
  outcome: ChunkOutcome;
  provider?: string;
  relevant: number;
  sent: number;
}

export interface RunReport {
  runId: string;
  fetched: number;
  prefilter: PrefilterReport;
  enqueued: number;
  reconciled: number;
  dequeued: number;
  chunks: ChunkReport[];
  /** Entries whose chunk was classified */
  classified: number;
  relevant: number;
  sent: number;
  acknowledged: number;
  summarySent: boolean;
  queueRemaining: number;
  durationMs: number;
  /** Set when the run stopped early without touching either store */
  aborted?: "checkpoint_unreadable";
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function chunkList<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function emptyTypeCounts(): Record<ItemType, number> {
  return { post: 0, comment: 0, search: 0 };
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export async function runTriage(deps: TriageDependencies): Promise<RunReport> {
  const { source, prefilter, queue, checkpoint, classifier, notifier, settings } =
    deps;
  const sleep = deps.sleep ?? defaultSleep;
  const runId = createRunId();
  const logger = deps.logger.child({ runId });
  const start = performance.now();

  const report: RunReport = {
    runId,
    fetched: 0,
    prefilter: { kept: 0, droppedByAge: 0, droppedByKeyword: 0 },
    enqueued: 0,
    reconciled: 0,
    dequeued: 0,
    chunks: [],
    classified: 0,
    relevant: 0,
    sent: 0,
    acknowledged: 0,
    summarySent: false,
    queueRemaining: 0,
    durationMs: 0,
  };

  function finish(): RunReport {
    report.durationMs = Math.round(performance.now() - start);
    logger.info("Run finished", {
      fetched: report.fetched,
      enqueued: report.enqueued,
      dequeued: report.dequeued,
      classified: report.classified,
      relevant: report.relevant,
      sent: report.sent,
      queueRemaining: report.queueRemaining,
      durationMs: report.durationMs,
    });
    return report;
  }

  logger.info("Run started", { ...settings });
  const processed = await checkpoint.load();
  if (checkpoint.unreadable()) {
    // Nothing is known to be done, so anything classified now could be a repeat.
    report.aborted = "checkpoint_unreadable";
    report.queueRemaining = (await queue.stats()).total;
    logger.error("Checkpoint unreadable, run stopped before fetch");
    return finish();
  }

  // --- FETCH ---
  let fetchedItems: Item[];
  try {
    fetchedItems = await source.fetchAllNewItems();
  } catch (err) {
    logger.error("Content fetch failed, continuing with no new items", {
      error: errorMessage(err),
    });
    fetchedItems = [];
  }
  report.fetched = fetchedItems.length;

  // --- PREFILTER + ENQUEUE ---
  if (fetchedItems.length > 0) {
    const filtered = prefilter.filter(fetchedItems);
    report.prefilter = filtered.report;
    if (filtered.items.length > 0) {
      report.enqueued = await queue.enqueue(filtered.items, processed);
    }
  }

  // --- RECONCILE ---
  const queued = await queue.list();
  const zombies = queued
    .filter((entry) => processed.has(entry.id))
    .map((entry) => entry.id);
  if (zombies.length > 0) {
    report.reconciled = await queue.remove(zombies);
    logger.warn("Removed entries already checkpointed by an earlier run", {
      removed: report.reconciled,
    });
  }

  const before = await queue.stats();
  logger.info("Queue status", { ...before });

  // --- DEQUEUE ---
  const batch = await queue.peek(settings.itemsPerRun);
  report.dequeued = batch.length;
  if (batch.length === 0) {
    report.queueRemaining = before.total;
    logger.info("Queue empty, nothing to classify");
    return finish();
  }

  // --- CLASSIFY_LOOP ---
  const session = createClassifierSession();
  const chunks = chunkList(batch, settings.chunkSize);
  const acknowledged: string[] = [];
  // Classified ids not yet covered by a successful checkpoint save
  let pending: string[] = [];
  const relevantByType = emptyTypeCounts();

  for (let i = 0; i < chunks.length; i++) {
    const chunk: QueueEntry[] = chunks[i] ?? [];
    const chunkNumber = i + 1;
    const result = await classifier.classify(chunk, session, chunkNumber);
    const chunkReport: ChunkReport = {
      chunk: chunkNumber,
      size: chunk.length,
      outcome: result.outcome,
      provider: result.provider,
      relevant: 0,
      sent: 0,
    };
    report.chunks.push(chunkReport);

    if (result.outcome === "classified") {
      const relevant = selectRelevant(chunk, result.verdicts);
      if (relevant.length > 0) {
        chunkReport.relevant = relevant.length;
        chunkReport.sent = await notifier.sendBatch(relevant);
        for (const item of relevant) relevantByType[item.type]++;
      }

      for (const entry of chunk) {
        processed.add(entry.id);
        pending.push(entry.id);
      }
      if (await checkpoint.save(processed)) {
        acknowledged.push(...pending);
        pending = [];
      } else {
        logger.warn("Checkpoint not saved, entries stay queued", {
          pending: pending.length,
        });
      }

      report.classified += chunk.length;
      report.relevant += chunkReport.relevant;
      report.sent += chunkReport.sent;
      logger.info("Chunk done", { ...chunkReport });
    } else {
      logger.warn("Chunk not classified, entries stay queued", {
        ...chunkReport,
      });
    }

    if (chunkNumber < chunks.length && settings.chunkDelayMs > 0) {
      await sleep(settings.chunkDelayMs);
    }
  }

  // --- ACK ---
  if (acknowledged.length > 0) {
    report.acknowledged = await queue.remove(acknowledged);
  }
  report.queueRemaining = (await queue.stats()).total;

  // --- SUMMARIZE ---
  if (report.relevant > 0) {
    const summary: RunSummary = {
      total: batch.length,
      relevant: report.relevant,
      sent: report.sent,
      queue_remaining: report.queueRemaining,
      relevant_by_type: relevantByType,
    };
    report.summarySent = await notifier.sendSummary(summary);
  }

  return finish();
}
