// =============================================================================
// @triage/worker — Reddit content source
// =============================================================================
// Collects new items from Reddit's public JSON listings: newest posts per
// subreddit, optionally newest comments per subreddit, and site-wide keyword
// search. Requests run one after another. A failing listing is logged and
// skipped; the rest of the fetch continues.
// =============================================================================

import { z } from "zod";
import {
  type Item,
  type ItemType,
  type Logger,
  type Watchlist,
  errorMessage,
  logExternalCall,
} from "@triage/shared";
import type { FetchLike } from "../fetch.js";

const DEFAULT_BASE_URL = "https://www.reddit.com";
const DEFAULT_USER_AGENT = "triage-worker/0.1 (reply triage)";
const DEFAULT_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ContentSource {
  fetchAllNewItems(): Promise<Item[]>;
}

export interface RedditSourceOptions {
  watchlist: Watchlist;
  logger: Logger;
  fetch?: FetchLike;
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Listing schema
// ---------------------------------------------------------------------------

const ThingSchema = z.object({
  kind: z.string(),
  data: z
    .object({
      id: z.string(),
      name: z.string().optional(),
      subreddit: z.string().default(""),
      author: z.string().default(""),
      title: z.string().optional(),
      link_title: z.string().optional(),
      selftext: z.string().optional(),
      body: z.string().optional(),
      permalink: z.string().default(""),
      created_utc: z.number().optional(),
    })
    .passthrough(),
});
type Thing = z.infer<typeof ThingSchema>;

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.unknown()).default([]),
  }),
});

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/** RFC-1123 date string for a Unix timestamp in seconds. */
export function toPublished(createdUtc: number | undefined): string | undefined {
  if (createdUtc === undefined) return undefined;
  return new Date(createdUtc * 1000).toUTCString();
}

export function thingToItem(
  thing: Thing,
  type: ItemType,
  baseUrl: string,
  searchKeyword?: string,
): Item {
  const d = thing.data;
  const isComment = thing.kind === "t1";
  const item: Item = {
    id: d.name ?? `${thing.kind}_${d.id}`,
    type,
    subreddit: d.subreddit,
    title: (isComment ? d.link_title : d.title) ?? "",
    content: (isComment ? d.body : d.selftext) ?? "",
    link: d.permalink ? `${baseUrl}${d.permalink}` : "",
    author: d.author,
  };
  const published = toPublished(d.created_utc);
  if (published) item.published = published;
  if (searchKeyword) item.search_keyword = searchKeyword;
  return item;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createRedditSource(options: RedditSourceOptions): ContentSource {
  const { watchlist } = options;
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const logger = options.logger.child({ component: "source" });

  async function fetchListing(
    url: string,
    type: ItemType,
    label: string,
    searchKeyword?: string,
  ): Promise<Item[]> {
    const start = performance.now();
    try {
      const response = await fetchImpl(url, {
        headers: {
          "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} for ${label}`);
      }

      const listing = ListingSchema.parse(await response.json());
      const items: Item[] = [];
      for (const child of listing.data.children) {
        const thing = ThingSchema.safeParse(child);
        if (thing.success) {
          items.push(thingToItem(thing.data, type, baseUrl, searchKeyword));
        }
      }

      logExternalCall(logger, "reddit", label, performance.now() - start);
      return items;
    } catch (err) {
      logExternalCall(
        logger,
        "reddit",
        label,
        performance.now() - start,
        errorMessage(err),
      );
      return [];
    }
  }

  return {
    async fetchAllNewItems() {
      const collected: Item[] = [];

      for (const sub of watchlist.subreddits) {
        const name = encodeURIComponent(sub);
        collected.push(
          ...(await fetchListing(
            `${baseUrl}/r/${name}/new.json?limit=${watchlist.posts_per_subreddit}`,
            "post",
            `r/${sub}/new`,
          )),
        );

        if (watchlist.monitor_comments) {
          collected.push(
            ...(await fetchListing(
              `${baseUrl}/r/${name}/comments.json?limit=${watchlist.comments_per_subreddit}`,
              "comment",
              `r/${sub}/comments`,
            )),
          );
        }
      }

      if (watchlist.enable_keyword_search) {
        for (const keyword of watchlist.search_keywords) {
          collected.push(
            ...(await fetchListing(
              `${baseUrl}/search.json?q=${encodeURIComponent(keyword)}&sort=new&limit=${watchlist.search_results_per_keyword}`,
              "search",
              `search:${keyword}`,
              keyword,
            )),
          );
        }
      }

      // The same thread can show up in a subreddit listing and a search.
      const seen = new Set<string>();
      const unique = collected.filter((item) => {
        const key = item.id ?? item.link;
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });

      logger.info("Fetch complete", {
        fetched: collected.length,
        unique: unique.length,
      });
      return unique;
    },
  };
}
