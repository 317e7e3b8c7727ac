// =============================================================================
// @triage/shared — Watchlist loader
// =============================================================================
// The watchlist names what to fetch (subreddits, search keywords), the keyword
// tables the prefilter and queue scoring use, and the product the classifier
// prompt is written for. It lives in a JSON file beside the package so it can
// be edited without touching code; WATCHLIST_FILE points at an override.
// =============================================================================

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { WatchlistSchema, type Watchlist } from "./schemas.js";

export const DEFAULT_WATCHLIST_PATH = fileURLToPath(
  new URL("../data/watchlist.json", import.meta.url),
);

/**
 * Read and validate a watchlist file. Throws when the file is missing, is
 * not JSON, or fails schema validation.
 */
export function loadWatchlist(path: string = DEFAULT_WATCHLIST_PATH): Watchlist {
  const raw = readFileSync(path, "utf-8");
  return WatchlistSchema.parse(JSON.parse(raw));
}
