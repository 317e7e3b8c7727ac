// =============================================================================
// @triage/worker — Prefilter
// =============================================================================
// Cheap rule-based rejection before classification. Rules run per item, first
// match wins: too old, then excluded phrase. Anything else is kept, whether or
// not it mentions a relevance keyword; relevance only affects queue priority.
// =============================================================================

import type { Item, Logger } from "@triage/shared";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PrefilterOptions {
  excludeKeywords: readonly string[];
  maxAgeDays: number;
  now?: () => Date;
  logger?: Logger;
}

export interface PrefilterReport {
  kept: number;
  droppedByAge: number;
  droppedByKeyword: number;
}

export interface PrefilterResult {
  items: Item[];
  report: PrefilterReport;
}

export interface Prefilter {
  filter(items: readonly Item[]): PrefilterResult;
}

/** Lower-cased `title + " " + content`, the text every keyword rule matches on. */
export function searchableText(item: Pick<Item, "title" | "content">): string {
  return `${item.title} ${item.content}`.toLowerCase();
}

/** Number of keywords that occur in the item's text, case-insensitively. */
export function relevanceScore(
  item: Pick<Item, "title" | "content">,
  keywords: readonly string[],
): number {
  const text = searchableText(item);
  let score = 0;
  for (const kw of keywords) {
    if (text.includes(kw.toLowerCase())) score++;
  }
  return score;
}

/**
 * True when `published` parses and lies more than `maxAgeDays` before `now`.
 * Missing or unparseable timestamps are never too old.
 */
export function isTooOld(
  published: string | undefined,
  maxAgeDays: number,
  now: Date,
): boolean {
  if (!published) return false;
  const publishedMs = Date.parse(published);
  if (Number.isNaN(publishedMs)) return false;
  return now.getTime() - publishedMs > maxAgeDays * DAY_MS;
}

export function createPrefilter(options: PrefilterOptions): Prefilter {
  const excludes = options.excludeKeywords.map((kw) => kw.toLowerCase());
  const now = options.now ?? (() => new Date());

  return {
    filter(items: readonly Item[]): PrefilterResult {
      const kept: Item[] = [];
      let droppedByAge = 0;
      let droppedByKeyword = 0;
      const reference = now();

      for (const item of items) {
        if (isTooOld(item.published, options.maxAgeDays, reference)) {
          droppedByAge++;
          continue;
        }

        const text = searchableText(item);
        if (excludes.some((kw) => text.includes(kw))) {
          droppedByKeyword++;
          continue;
        }

        kept.push(item);
      }

      const report = { kept: kept.length, droppedByAge, droppedByKeyword };
      options.logger?.info("Prefilter complete", {
        ...report,
        maxAgeDays: options.maxAgeDays,
      });
      return { items: kept, report };
    },
  };
}
