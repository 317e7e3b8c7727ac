// =============================================================================
// @triage/shared — TypeScript types for the triage pipeline
// =============================================================================
// Covers raw items produced by content sources, queued entries, classifier
// verdicts, store statistics, and the notifier summary payload.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Kind of content an item came from */
export type ItemType = "post" | "comment" | "search";

/** Classifier backends, in failover order */
export type ProviderName = "gemini" | "anthropic";

/** Score bucket used by queue statistics */
export type ScoreBucket = "high" | "medium" | "low";

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

/**
 * A short text item as produced by a content source. `id` is the native
 * identifier when the source has one; otherwise `link` identifies the item.
 */
export interface Item {
  id?: string;
  type: ItemType;
  subreddit: string;
  title: string;
  content: string;
  link: string;
  author: string;
  /** Present only for search hits */
  search_keyword?: string;
  /** Origin timestamp, RFC-2822 style. Absent means never age-filtered. */
  published?: string;
}

/** An item held in the priority queue, awaiting classification. */
export interface QueueEntry extends Item {
  id: string;
  /** Count of relevance keywords found in title + content */
  relevance_score: number;
  /** ISO timestamp of enqueue */
  added_at: string;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export interface ClassificationVerdict {
  /** Position of the item in the chunk it was classified with */
  index: number;
  is_relevant: boolean;
  reason: string;
  reply_draft: string;
}

export interface Analysis {
  is_relevant: true;
  reason: string;
  reply_draft: string;
}

/** A queue entry the classifier judged worth a reply. */
export interface AnalyzedItem extends QueueEntry {
  analysis: Analysis;
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

export interface QueueStats {
  total: number;
  by_type: Partial<Record<ItemType, number>>;
  by_score: Record<ScoreBucket, number>;
}

/** Aggregate sent to the notifier at the end of a run. */
export interface RunSummary {
  total: number;
  relevant: number;
  sent: number;
  queue_remaining: number;
  relevant_by_type: Record<ItemType, number>;
}
