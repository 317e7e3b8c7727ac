// Shared fixtures for worker tests.

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type Item, type Logger, type QueueEntry, createLogger } from "@triage/shared";

/** Logger that drops everything. */
export function silentLogger(): Logger {
  return createLogger({ level: "fatal", sink: () => {} });
}

/** Logger that keeps parsed entries for assertions. */
export function capturingLogger(): { logger: Logger; lines: unknown[] } {
  const lines: unknown[] = [];
  const logger = createLogger({
    level: "trace",
    sink: (line) => lines.push(JSON.parse(line)),
  });
  return { logger, lines };
}

const createdDirs: string[] = [];

/** Fresh directory under the OS temp dir, removed by {@link removeTempDirs}. */
export async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "triage-"));
  createdDirs.push(dir);
  return dir;
}

/** Register with `afterEach` in every file that calls {@link tempDir}. */
export async function removeTempDirs(): Promise<void> {
  const dirs = createdDirs.splice(0);
  await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
}

export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    id: "t3_default",
    type: "post",
    subreddit: "gamedev",
    title: "Untitled",
    content: "",
    link: "https://reddit.test/r/gamedev/comments/default/",
    author: "someone",
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<QueueEntry> = {}): QueueEntry {
  return {
    id: "t3_default",
    type: "post",
    subreddit: "gamedev",
    title: "Untitled",
    content: "",
    link: "https://reddit.test/r/gamedev/comments/default/",
    author: "someone",
    relevance_score: 0,
    added_at: "2026-03-01T00:00:00.000Z",
    ...overrides,
  };
}
