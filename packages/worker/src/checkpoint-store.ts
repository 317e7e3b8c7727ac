import {
  type Logger,
  CheckpointFileSchema,
  errorMessage,
} from "@triage/shared";
import { readJsonFile, writeJsonAtomic } from "./atomic-file.js";

export interface CheckpointStoreOptions {
  path: string;
  /** Most ids kept on disk; the oldest are evicted first. */
  maxIds: number;
  logger: Logger;
  now?: () => Date;
}

/**
 * Durable set of ids that finished classification. Used as a membership test
 * when enqueueing; it never gates peek or remove.
 *
 * A file that exists but cannot be read or parsed loads as an empty set and
 * marks the store unreadable. Until a later load succeeds, `save` refuses to
 * replace that file.
 */
export interface CheckpointStore {
  load(): Promise<Set<string>>;
  /** Overwrite the file with `ids` (insertion order, capped). */
  save(ids: Iterable<string>): Promise<boolean>;
  /** True when the last load found a file it could not use. */
  unreadable(): boolean;
}

/** Keep the last `max` ids, preserving order. */
export function capIds(ids: Iterable<string>, max: number): string[] {
  const all = [...ids];
  return all.length > max ? all.slice(all.length - max) : all;
}

export function createCheckpointStore(
  options: CheckpointStoreOptions,
): CheckpointStore {
  const { path, maxIds } = options;
  const logger = options.logger.child({ store: "checkpoint", path });
  const now = options.now ?? (() => new Date());
  let loadFailed = false;

  return {
    async load() {
      loadFailed = true;
      let raw: unknown;
      try {
        raw = await readJsonFile(path);
      } catch (err) {
        logger.error("Failed to read checkpoint", { error: errorMessage(err) });
        return new Set();
      }

      if (raw === undefined) {
        loadFailed = false;
        return new Set();
      }

      const parsed = CheckpointFileSchema.safeParse(raw);
      if (!parsed.success) {
        logger.error("Checkpoint file has an unexpected shape", {
          error: parsed.error.message,
        });
        return new Set();
      }

      loadFailed = false;
      const ids = Array.isArray(parsed.data) ? parsed.data : parsed.data.ids;
      return new Set(ids);
    },

    async save(ids) {
      if (loadFailed) {
        logger.error("Checkpoint file unreadable, save refused");
        return false;
      }
      const kept = capIds(ids, maxIds);
      try {
        await writeJsonAtomic(path, {
          ids: kept,
          last_updated: now().toISOString(),
        });
        logger.debug("Checkpoint saved", { ids: kept.length });
        return true;
      } catch (err) {
        logger.error("Failed to persist checkpoint, previous state kept", {
          error: errorMessage(err),
          ids: kept.length,
        });
        return false;
      }
    },

    unreadable() {
      return loadFailed;
    },
  };
}
