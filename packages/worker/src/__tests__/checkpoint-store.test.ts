import { describe, it, expect, vi, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { capIds, createCheckpointStore } from "../checkpoint-store.js";
import { removeTempDirs, silentLogger, tempDir } from "./helpers.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, readFile: vi.fn(actual.readFile) };
});

afterEach(removeTempDirs);

const NOW = new Date("2026-03-10T12:00:00.000Z");

async function storeAt(maxIds = 5000) {
  const path = join(await tempDir(), "processed.json");
  const store = createCheckpointStore({
    path,
    maxIds,
    logger: silentLogger(),
    now: () => NOW,
  });
  return { path, store };
}

describe("capIds", () => {
  it("keeps the most recent ids in order", () => {
    expect(capIds(["a", "b", "c", "d"], 2)).toEqual(["c", "d"]);
    expect(capIds(new Set(["a", "b"]), 5)).toEqual(["a", "b"]);
  });
});

describe("createCheckpointStore", () => {
  it("loads an empty set when no file exists", async () => {
    const { store } = await storeAt();
    expect((await store.load()).size).toBe(0);
  });

  it("saves the capped id list with a timestamp", async () => {
    const { path, store } = await storeAt(2);

    expect(await store.save(new Set(["a", "b", "c"]))).toBe(true);

    const file: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(file).toEqual({
      ids: ["b", "c"],
      last_updated: "2026-03-10T12:00:00.000Z",
    });
    expect([...(await store.load())]).toEqual(["b", "c"]);
  });

  it("accepts a bare array file", async () => {
    const { path, store } = await storeAt();
    await writeFile(path, JSON.stringify(["x", "y"]), "utf-8");
    expect([...(await store.load())]).toEqual(["x", "y"]);
  });

  it("starts empty on a file of the wrong shape or broken JSON", async () => {
    const { path, store } = await storeAt();

    await writeFile(path, JSON.stringify({ posts: ["x"] }), "utf-8");
    expect((await store.load()).size).toBe(0);

    await writeFile(path, "[\"x\",", "utf-8");
    expect((await store.load()).size).toBe(0);
  });

  it("refuses to save over a file of the wrong shape", async () => {
    const { path, store } = await storeAt();
    await writeFile(path, JSON.stringify({ posts: ["x"] }), "utf-8");

    await store.load();
    expect(store.unreadable()).toBe(true);
    expect(await store.save(["y"])).toBe(false);
    expect(await readFile(path, "utf-8")).toBe('{"posts":["x"]}');
  });

  it("keeps the saved history when a load fails", async () => {
    const { path, store } = await storeAt();
    const ids = Array.from({ length: 100 }, (_, i) => `t3_${i}`);
    expect(await store.save(ids)).toBe(true);

    vi.mocked(readFile).mockRejectedValueOnce(
      Object.assign(new Error("EMFILE: too many open files"), { code: "EMFILE" }),
    );
    const loaded = await store.load();
    expect(loaded.size).toBe(0);
    expect(store.unreadable()).toBe(true);
    expect(await store.save([...loaded, "t3_new"])).toBe(false);

    const reloaded = await store.load();
    expect(store.unreadable()).toBe(false);
    expect(reloaded.size).toBe(100);
    expect(await store.save([...reloaded, "t3_new"])).toBe(true);

    const file: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(file).toMatchObject({ ids: [...ids, "t3_new"] });
  });

  it("reports a failed write and keeps the previous file", async () => {
    const dir = await tempDir();
    const blocker = join(dir, "not-a-dir");
    await writeFile(blocker, "", "utf-8");

    const store = createCheckpointStore({
      path: join(blocker, "processed.json"),
      maxIds: 10,
      logger: silentLogger(),
    });
    expect(await store.save(["a"])).toBe(false);
  });
});
