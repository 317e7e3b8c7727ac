import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  computeStats,
  createQueueStore,
  itemId,
  scoreBucket,
  type QueueStore,
} from "../queue-store.js";
import {
  makeEntry,
  makeItem,
  removeTempDirs,
  silentLogger,
  tempDir,
} from "./helpers.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, readFile: vi.fn(actual.readFile) };
});

afterEach(removeTempDirs);

const KEYWORDS = ["alpha", "beta", "gamma", "delta", "epsilon"];
const NOW = new Date("2026-03-10T12:00:00.000Z");

describe("queue helpers", () => {
  it("identifies items by native id, then link", () => {
    expect(itemId({ id: "t3_a", link: "https://x" })).toBe("t3_a");
    expect(itemId({ link: "https://x" })).toBe("https://x");
    expect(itemId({ link: "" })).toBe("");
  });

  it("buckets scores", () => {
    expect(scoreBucket(0)).toBe("low");
    expect(scoreBucket(1)).toBe("medium");
    expect(scoreBucket(2)).toBe("medium");
    expect(scoreBucket(3)).toBe("high");
    expect(scoreBucket(9)).toBe("high");
  });

  it("computes stats by type and bucket", () => {
    const stats = computeStats([
      makeEntry({ id: "a", relevance_score: 5 }),
      makeEntry({ id: "b", relevance_score: 1, type: "comment" }),
      makeEntry({ id: "c", relevance_score: 0, type: "search" }),
      makeEntry({ id: "d", relevance_score: 0 }),
    ]);
    expect(stats).toEqual({
      total: 4,
      by_type: { post: 2, comment: 1, search: 1 },
      by_score: { high: 1, medium: 1, low: 2 },
    });
  });
});

describe("createQueueStore", () => {
  let path: string;
  let store: QueueStore;

  beforeEach(async () => {
    path = join(await tempDir(), "queue.json");
    store = createQueueStore({
      path,
      relevanceKeywords: KEYWORDS,
      logger: silentLogger(),
      now: () => NOW,
    });
  });

  it("orders by score descending and keeps arrival order among ties", async () => {
    const added = await store.enqueue(
      [
        makeItem({ id: "two-a", title: "alpha beta" }),
        makeItem({ id: "five", title: "alpha beta gamma delta epsilon" }),
        makeItem({ id: "two-b", title: "gamma", content: "delta" }),
        makeItem({ id: "zero", title: "nothing relevant" }),
      ],
      new Set(),
    );

    expect(added).toBe(4);
    const entries = await store.list();
    expect(entries.map((e) => [e.id, e.relevance_score])).toEqual([
      ["five", 5],
      ["two-a", 2],
      ["two-b", 2],
      ["zero", 0],
    ]);
  });

  it("keeps earlier entries ahead of later ones with the same score", async () => {
    await store.enqueue([makeItem({ id: "first", title: "alpha" })], new Set());
    await store.enqueue([makeItem({ id: "second", title: "beta" })], new Set());

    const entries = await store.list();
    expect(entries.map((e) => e.id)).toEqual(["first", "second"]);
  });

  it("skips duplicates, processed ids and items without identity", async () => {
    const added = await store.enqueue(
      [
        makeItem({ id: "a" }),
        makeItem({ id: "a" }),
        makeItem({ id: "done" }),
        makeItem({ id: undefined, link: "https://reddit.test/r/x/1" }),
        makeItem({ id: undefined, link: "" }),
      ],
      new Set(["done"]),
    );

    expect(added).toBe(2);
    expect((await store.list()).map((e) => e.id)).toEqual([
      "a",
      "https://reddit.test/r/x/1",
    ]);

    expect(await store.enqueue([makeItem({ id: "a" })], new Set())).toBe(0);
  });

  it("writes the queue file with entries and a timestamp", async () => {
    await store.enqueue(
      [makeItem({ id: "a", title: "alpha", search_keyword: "kw", type: "search" })],
      new Set(),
    );

    const file: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(file).toEqual({
      queue: [
        {
          id: "a",
          type: "search",
          subreddit: "gamedev",
          title: "alpha",
          content: "",
          link: "https://reddit.test/r/gamedev/comments/default/",
          author: "someone",
          relevance_score: 1,
          added_at: "2026-03-10T12:00:00.000Z",
          search_keyword: "kw",
        },
      ],
      last_updated: "2026-03-10T12:00:00.000Z",
    });
  });

  it("peeks without removing", async () => {
    await store.enqueue(
      [makeItem({ id: "a" }), makeItem({ id: "b" }), makeItem({ id: "c" })],
      new Set(),
    );

    const first = await store.peek(2);
    const second = await store.peek(2);

    expect(first.map((e) => e.id)).toEqual(["a", "b"]);
    expect(second).toEqual(first);
    expect((await store.stats()).total).toBe(3);
    expect(await store.peek(0)).toEqual([]);
    expect(await store.peek(10)).toHaveLength(3);
  });

  it("removes exactly the named ids and ignores absent ones", async () => {
    await store.enqueue(
      [makeItem({ id: "a" }), makeItem({ id: "b" }), makeItem({ id: "c" })],
      new Set(),
    );

    expect(await store.remove(["b", "missing"])).toBe(1);
    expect((await store.list()).map((e) => e.id)).toEqual(["a", "c"]);
    expect(await store.remove(["b"])).toBe(0);
    expect(await store.remove([])).toBe(0);
  });

  it("survives a new store instance on the same file", async () => {
    await store.enqueue([makeItem({ id: "a" }), makeItem({ id: "b" })], new Set());

    const reopened = createQueueStore({
      path,
      relevanceKeywords: KEYWORDS,
      logger: silentLogger(),
    });
    expect((await reopened.list()).map((e) => e.id)).toEqual(["a", "b"]);
  });

  it("treats a corrupt file as empty and drops invalid entries", async () => {
    await writeFile(path, "{ not json", "utf-8");
    expect(await store.list()).toEqual([]);

    await writeFile(
      path,
      JSON.stringify({
        queue: [
          makeEntry({ id: "ok" }),
          { id: "bad", relevance_score: -1 },
          "junk",
        ],
      }),
      "utf-8",
    );
    expect((await store.list()).map((e) => e.id)).toEqual(["ok"]);
  });

  it("refuses to overwrite a file it cannot parse", async () => {
    await writeFile(path, "{ not json", "utf-8");

    expect(await store.enqueue([makeItem({ id: "new" })], new Set())).toBe(0);
    expect(await store.remove(["anything"])).toBe(0);
    expect(await readFile(path, "utf-8")).toBe("{ not json");

    await writeFile(path, JSON.stringify(["t3_x"]), "utf-8");
    expect(await store.enqueue([makeItem({ id: "new" })], new Set())).toBe(0);
    expect(await readFile(path, "utf-8")).toBe('["t3_x"]');
  });

  it("keeps every entry when a read fails during enqueue", async () => {
    const existing = Array.from({ length: 30 }, (_, i) => makeItem({ id: `t3_${i}` }));
    expect(await store.enqueue(existing, new Set())).toBe(30);

    vi.mocked(readFile).mockRejectedValueOnce(
      Object.assign(new Error("EMFILE: too many open files"), { code: "EMFILE" }),
    );
    expect(await store.enqueue([makeItem({ id: "t3_new" })], new Set())).toBe(0);

    expect(await store.list()).toHaveLength(30);
    expect(await store.enqueue([makeItem({ id: "t3_new" })], new Set())).toBe(1);
    expect((await store.stats()).total).toBe(31);
  });

  it("keeps every entry when a read fails during remove", async () => {
    await store.enqueue([makeItem({ id: "a" }), makeItem({ id: "b" })], new Set());

    vi.mocked(readFile).mockRejectedValueOnce(
      Object.assign(new Error("EMFILE: too many open files"), { code: "EMFILE" }),
    );
    expect(await store.remove(["a"])).toBe(0);
    expect((await store.list()).map((e) => e.id)).toEqual(["a", "b"]);
  });

  it("reports zero when the file cannot be written", async () => {
    const dir = await tempDir();
    const blocker = join(dir, "not-a-dir");
    await writeFile(blocker, "", "utf-8");

    const broken = createQueueStore({
      path: join(blocker, "queue.json"),
      relevanceKeywords: KEYWORDS,
      logger: silentLogger(),
    });

    expect(await broken.enqueue([makeItem({ id: "a" })], new Set())).toBe(0);
    expect(await broken.list()).toEqual([]);
  });
});
