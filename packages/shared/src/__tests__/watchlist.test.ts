import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadWatchlist } from "../watchlist.js";

const dirs: string[] = [];

function writeTemp(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "watchlist-"));
  dirs.push(dir);
  const path = join(dir, "watchlist.json");
  writeFileSync(path, content, "utf-8");
  return path;
}

describe("loadWatchlist", () => {
  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it("loads the bundled watchlist", () => {
    const watchlist = loadWatchlist();
    expect(watchlist.product.name).toBe("Sketchplay");
    expect(watchlist.subreddits).toContain("gamedev");
    expect(watchlist.monitor_comments).toBe(false);
  });

  it("fills defaults for omitted fields", () => {
    const path = writeTemp(
      JSON.stringify({ product: { name: "Tool", description: "Does things" } }),
    );
    const watchlist = loadWatchlist(path);

    expect(watchlist.subreddits).toEqual([]);
    expect(watchlist.posts_per_subreddit).toBe(10);
    expect(watchlist.comments_per_subreddit).toBe(25);
    expect(watchlist.enable_keyword_search).toBe(true);
    expect(watchlist.exclude_keywords).toEqual([]);
  });

  it("throws on a file without a product", () => {
    const path = writeTemp(JSON.stringify({ subreddits: ["gamedev"] }));
    expect(() => loadWatchlist(path)).toThrow();
  });

  it("throws on malformed JSON", () => {
    const path = writeTemp("{ not json");
    expect(() => loadWatchlist(path)).toThrow();
  });
});
