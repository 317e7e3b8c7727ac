// =============================================================================
// @triage/shared — Zod schemas for persisted state and model output
// =============================================================================
// Everything read back from disk or returned by a classifier passes through
// one of these schemas so downstream code can trust the shape it receives.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Reusable field schemas
// ---------------------------------------------------------------------------

export const ItemTypeSchema = z.enum(["post", "comment", "search"]);

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

export const ItemSchema = z.object({
  id: z.string().min(1).optional(),
  type: ItemTypeSchema.default("post"),
  subreddit: z.string().default(""),
  title: z.string().default(""),
  content: z.string().default(""),
  link: z.string().default(""),
  author: z.string().default(""),
  search_keyword: z.string().optional(),
  published: z.string().optional(),
});

export const QueueEntrySchema = ItemSchema.extend({
  id: z.string().min(1),
  relevance_score: z.number().int().min(0),
  added_at: z.string(),
});

/** Queue file: `{ queue: QueueEntry[], last_updated }`. Entries are checked one by one. */
export const QueueFileSchema = z.object({
  queue: z.array(z.unknown()).default([]),
  last_updated: z.string().optional(),
});

/** Checkpoint file: a bare id array or an object wrapping one. */
export const CheckpointFileSchema = z.union([
  z.array(z.string()),
  z.object({ ids: z.array(z.string()) }).passthrough(),
]);

// ---------------------------------------------------------------------------
// Classifier output
// ---------------------------------------------------------------------------

/**
 * One entry of the classifier's JSON array. `index` and `is_relevant` are
 * mandatory; text fields fall back to empty strings.
 */
export const VerdictSchema = z.object({
  index: z.number().int().min(0),
  is_relevant: z.boolean(),
  reason: z.string().catch(""),
  reply_draft: z.string().catch(""),
});

// ---------------------------------------------------------------------------
// Watchlist
// ---------------------------------------------------------------------------

export const WatchlistSchema = z.object({
  product: z.object({
    name: z.string().min(1),
    description: z.string().min(1),
  }),
  subreddits: z.array(z.string().min(1)).default([]),
  posts_per_subreddit: z.number().int().min(1).max(100).default(10),
  monitor_comments: z.boolean().default(false),
  comments_per_subreddit: z.number().int().min(1).max(100).default(25),
  enable_keyword_search: z.boolean().default(true),
  search_keywords: z.array(z.string().min(1)).default([]),
  search_results_per_keyword: z.number().int().min(1).max(100).default(10),
  relevance_keywords: z.array(z.string().min(1)).default([]),
  exclude_keywords: z.array(z.string().min(1)).default([]),
});
export type Watchlist = z.infer<typeof WatchlistSchema>;
