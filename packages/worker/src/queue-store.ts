// =============================================================================
// @triage/worker — Priority queue store
// =============================================================================
// Durable, score-ordered holding area for items awaiting classification.
// The file on disk is the source of truth: every operation reads it, and
// every mutation writes the whole queue back through an atomic rename. A
// failed write leaves the previous file in place and the mutation reports
// zero affected entries. A file that exists but cannot be read or parsed is
// never overwritten: reads see an empty queue, mutations are refused.
//
// File format: { "queue": QueueEntry[], "last_updated": ISO timestamp }
// =============================================================================

import {
  type Item,
  type ItemType,
  type Logger,
  type QueueEntry,
  type QueueStats,
  QueueEntrySchema,
  QueueFileSchema,
  errorMessage,
} from "@triage/shared";
import { readJsonFile, writeJsonAtomic } from "./atomic-file.js";
import { relevanceScore } from "./prefilter.js";

export const HIGH_SCORE_THRESHOLD = 3;

export interface QueueStoreOptions {
  path: string;
  relevanceKeywords: readonly string[];
  logger: Logger;
  now?: () => Date;
}

export interface QueueStore {
  /** Add unseen items; returns how many were actually added. */
  enqueue(
    items: readonly Item[],
    alreadyProcessed: ReadonlySet<string>,
  ): Promise<number>;
  /** First `n` entries in priority order. Does not modify the store. */
  peek(n: number): Promise<QueueEntry[]>;
  /** Delete entries by id; absent ids are ignored. Returns the number removed. */
  remove(ids: Iterable<string>): Promise<number>;
  stats(): Promise<QueueStats>;
  /** Every entry, in priority order. */
  list(): Promise<QueueEntry[]>;
}

/** Native id when present, otherwise the link. Empty string when neither exists. */
export function itemId(item: Pick<Item, "id" | "link">): string {
  return item.id || item.link;
}

export function scoreBucket(score: number): "high" | "medium" | "low" {
  if (score >= HIGH_SCORE_THRESHOLD) return "high";
  if (score >= 1) return "medium";
  return "low";
}

export function computeStats(entries: readonly QueueEntry[]): QueueStats {
  const byType: Partial<Record<ItemType, number>> = {};
  const byScore = { high: 0, medium: 0, low: 0 };

  for (const entry of entries) {
    byType[entry.type] = (byType[entry.type] ?? 0) + 1;
    byScore[scoreBucket(entry.relevance_score)]++;
  }

  return { total: entries.length, by_type: byType, by_score: byScore };
}

export function createQueueStore(options: QueueStoreOptions): QueueStore {
  const { path, relevanceKeywords } = options;
  const logger = options.logger.child({ store: "queue", path });
  const now = options.now ?? (() => new Date());

  /** Current entries, or undefined when the file exists but is unusable. */
  async function load(): Promise<QueueEntry[] | undefined> {
    let raw: unknown;
    try {
      raw = await readJsonFile(path);
    } catch (err) {
      logger.error("Failed to read queue file", { error: errorMessage(err) });
      return undefined;
    }
    if (raw === undefined) return [];

    const file = QueueFileSchema.safeParse(raw);
    if (!file.success) {
      logger.error("Queue file has an unexpected shape", {
        error: file.error.message,
      });
      return undefined;
    }

    const entries: QueueEntry[] = [];
    let dropped = 0;
    for (const candidate of file.data.queue) {
      const parsed = QueueEntrySchema.safeParse(candidate);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      logger.warn("Dropped invalid queue entries", { dropped });
    }
    return entries;
  }

  async function commit(queue: QueueEntry[]): Promise<boolean> {
    try {
      await writeJsonAtomic(path, {
        queue,
        last_updated: now().toISOString(),
      });
      return true;
    } catch (err) {
      logger.error("Failed to persist queue, previous state kept", {
        error: errorMessage(err),
        entries: queue.length,
      });
      return false;
    }
  }

  function toEntry(item: Item, id: string, addedAt: string): QueueEntry {
    const entry: QueueEntry = {
      id,
      type: item.type,
      subreddit: item.subreddit,
      title: item.title,
      content: item.content,
      link: item.link,
      author: item.author,
      relevance_score: relevanceScore(item, relevanceKeywords),
      added_at: addedAt,
    };
    if (item.search_keyword) entry.search_keyword = item.search_keyword;
    if (item.published) entry.published = item.published;
    return entry;
  }

  /** Reads degrade to an empty queue; the file itself is left alone. */
  async function loadOrEmpty(): Promise<QueueEntry[]> {
    return (await load()) ?? [];
  }

  return {
    async enqueue(items, alreadyProcessed) {
      const queue = await load();
      if (!queue) {
        logger.error("Queue file unreadable, enqueue refused", {
          items: items.length,
        });
        return 0;
      }
      const known = new Set(queue.map((entry) => entry.id));
      const addedAt = now().toISOString();
      let added = 0;
      let missingId = 0;

      for (const item of items) {
        const id = itemId(item);
        if (!id) {
          missingId++;
          continue;
        }
        if (known.has(id) || alreadyProcessed.has(id)) continue;

        known.add(id);
        queue.push(toEntry(item, id, addedAt));
        added++;
      }

      if (missingId > 0) {
        logger.warn("Skipped items without id or link", { count: missingId });
      }
      if (added === 0) return 0;

      // Array.prototype.sort is stable: equal scores keep their queue order.
      queue.sort((a, b) => b.relevance_score - a.relevance_score);

      if (!(await commit(queue))) return 0;
      logger.info("Enqueued items", { added, total: queue.length });
      return added;
    },

    async peek(n) {
      if (n <= 0) return [];
      const queue = await loadOrEmpty();
      return queue.slice(0, n);
    },

    async remove(ids) {
      const targets = new Set(ids);
      if (targets.size === 0) return 0;

      const queue = await load();
      if (!queue) {
        logger.error("Queue file unreadable, remove refused", {
          ids: targets.size,
        });
        return 0;
      }
      const remaining = queue.filter((entry) => !targets.has(entry.id));
      const removed = queue.length - remaining.length;
      if (removed === 0) return 0;

      if (!(await commit(remaining))) return 0;
      logger.info("Removed processed entries", {
        removed,
        total: remaining.length,
      });
      return removed;
    },

    async stats() {
      return computeStats(await loadOrEmpty());
    },

    async list() {
      return loadOrEmpty();
    },
  };
}
