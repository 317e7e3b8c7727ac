// =============================================================================
// @triage/worker — Batch classifier with provider failover
// =============================================================================
// Sends one prompt per chunk to a classifier backend and turns the reply into
// index-correlated verdicts.
//
// Provider choice lives in a ClassifierSession the caller owns (one per run),
// not in module state. Quota errors from the primary are retried in a bounded
// loop with linear backoff; once the loop is spent the primary is marked
// exhausted for the rest of the session and the chunk goes to the secondary
// once. Any other error skips the chunk.
// =============================================================================

import {
  type AnalyzedItem,
  type ClassificationVerdict,
  type ClassifierProvider,
  type Logger,
  type ProviderName,
  type ProviderPair,
  type QueueEntry,
  VerdictSchema,
  errorMessage,
  isQuotaError,
  logExternalCall,
} from "@triage/shared";
import type { PromptBuilder } from "./prompt.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Per-run provider state, threaded through every classify call. */
export interface ClassifierSession {
  primaryExhausted: boolean;
  attempts: Record<ProviderName, number>;
  lastProvider?: ProviderName;
}

/**
 * - classified: at least one verdict was honoured
 * - parse_failed: the backend answered but no usable verdict came out
 * - skipped: no backend could be used (missing credentials)
 * - failed: the backend call errored
 */
export type ChunkOutcome = "classified" | "parse_failed" | "skipped" | "failed";

export interface ChunkClassification {
  outcome: ChunkOutcome;
  verdicts: ClassificationVerdict[];
  provider?: ProviderName;
}

export interface BatchClassifierOptions {
  providers: ProviderPair;
  prompt: PromptBuilder;
  logger: Logger;
  /** Most primary attempts per chunk when the primary reports quota errors. */
  quotaRetryLimit: number;
  /** Wait before retry n is `quotaBackoffMs * n`. */
  quotaBackoffMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchClassifier {
  classify(
    chunk: readonly QueueEntry[],
    session: ClassifierSession,
    chunkNumber: number,
  ): Promise<ChunkClassification>;
}

export function createClassifierSession(): ClassifierSession {
  return { primaryExhausted: false, attempts: { gemini: 0, anthropic: 0 } };
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extract the JSON array from a model reply. Code fences are stripped first;
 * if the remainder is not an array, the first `[...]` span is tried. Returns
 * null when neither yields an array.
 */
export function parseVerdictArray(text: string): unknown[] | null {
  const cleaned = text
    .replace(/```json\s*/gi, "")
    .replace(/```\s*/g, "")
    .trim();

  const direct = tryParseJson(cleaned);
  if (Array.isArray(direct)) return direct;

  const match = cleaned.match(/\[[\s\S]*\]/);
  if (match) {
    const embedded = tryParseJson(match[0]);
    if (Array.isArray(embedded)) return embedded;
  }

  return null;
}

/**
 * Keep entries with an integer `index` inside the chunk and a boolean
 * `is_relevant`. Malformed entries are dropped one by one; a repeated index
 * keeps its first verdict.
 */
export function validateVerdicts(
  rawVerdicts: readonly unknown[],
  chunkLength: number,
): { verdicts: ClassificationVerdict[]; dropped: number } {
  const verdicts: ClassificationVerdict[] = [];
  const seen = new Set<number>();
  let dropped = 0;

  for (const raw of rawVerdicts) {
    const parsed = VerdictSchema.safeParse(raw);
    if (
      !parsed.success ||
      parsed.data.index >= chunkLength ||
      seen.has(parsed.data.index)
    ) {
      dropped++;
      continue;
    }
    seen.add(parsed.data.index);
    verdicts.push(parsed.data);
  }

  return { verdicts, dropped };
}

/** Merge each relevant verdict into the chunk entry it points at. */
export function selectRelevant(
  chunk: readonly QueueEntry[],
  verdicts: readonly ClassificationVerdict[],
): AnalyzedItem[] {
  const relevant: AnalyzedItem[] = [];
  for (const verdict of verdicts) {
    const entry = chunk[verdict.index];
    if (!entry || !verdict.is_relevant) continue;
    relevant.push({
      ...entry,
      analysis: {
        is_relevant: true,
        reason: verdict.reason,
        reply_draft: verdict.reply_draft,
      },
    });
  }
  return relevant;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createBatchClassifier(
  options: BatchClassifierOptions,
): BatchClassifier {
  const { providers, quotaRetryLimit, quotaBackoffMs } = options;
  const sleep = options.sleep ?? defaultSleep;

  async function callProvider(
    provider: ClassifierProvider,
    prompt: string,
    session: ClassifierSession,
    log: Logger,
  ): Promise<string> {
    session.attempts[provider.name]++;
    session.lastProvider = provider.name;
    const start = performance.now();
    try {
      const text = await provider.complete(prompt);
      logExternalCall(log, provider.name, "classify", performance.now() - start);
      return text;
    } catch (err) {
      logExternalCall(
        log,
        provider.name,
        "classify",
        performance.now() - start,
        errorMessage(err),
      );
      throw err;
    }
  }

  function interpret(
    text: string,
    chunkLength: number,
    provider: ProviderName,
    log: Logger,
  ): ChunkClassification {
    const raw = parseVerdictArray(text);
    if (raw === null) {
      log.warn("Classifier reply is not a JSON array, chunk left queued", {
        preview: text.slice(0, 120),
      });
      return { outcome: "parse_failed", verdicts: [], provider };
    }

    const { verdicts, dropped } = validateVerdicts(raw, chunkLength);
    if (dropped > 0) {
      log.warn("Dropped malformed verdicts", { dropped, kept: verdicts.length });
    }
    if (verdicts.length === 0) {
      log.warn("Classifier reply held no usable verdicts, chunk left queued");
      return { outcome: "parse_failed", verdicts: [], provider };
    }

    log.info("Chunk classified", {
      verdicts: verdicts.length,
      relevant: verdicts.filter((v) => v.is_relevant).length,
    });
    return { outcome: "classified", verdicts, provider };
  }

  async function classifyWithSecondary(
    prompt: string,
    chunkLength: number,
    session: ClassifierSession,
    log: Logger,
  ): Promise<ChunkClassification> {
    const secondary = providers.secondary;
    if (!secondary) {
      log.warn("No classifier credentials available, chunk skipped");
      return { outcome: "skipped", verdicts: [] };
    }

    const scoped = log.child({ provider: secondary.name });
    try {
      const text = await callProvider(secondary, prompt, session, scoped);
      return interpret(text, chunkLength, secondary.name, scoped);
    } catch (err) {
      scoped.error("Classifier call failed, chunk skipped", {
        error: errorMessage(err),
      });
      return { outcome: "failed", verdicts: [], provider: secondary.name };
    }
  }

  return {
    async classify(chunk, session, chunkNumber) {
      const log = options.logger.child({
        component: "classifier",
        chunk: chunkNumber,
      });
      if (chunk.length === 0) {
        return { outcome: "skipped", verdicts: [] };
      }

      const prompt = options.prompt.buildBatchPrompt(chunk);
      const primary = providers.primary;

      if (!primary || session.primaryExhausted) {
        return classifyWithSecondary(prompt, chunk.length, session, log);
      }

      const scoped = log.child({ provider: primary.name });
      for (let attempt = 1; attempt <= quotaRetryLimit; attempt++) {
        try {
          const text = await callProvider(primary, prompt, session, scoped);
          return interpret(text, chunk.length, primary.name, scoped);
        } catch (err) {
          if (!isQuotaError(err)) {
            scoped.error("Classifier call failed, chunk skipped", {
              error: errorMessage(err),
            });
            return { outcome: "failed", verdicts: [], provider: primary.name };
          }
          if (attempt < quotaRetryLimit) {
            const waitMs = quotaBackoffMs * attempt;
            scoped.warn("Quota limit hit, retrying", {
              attempt,
              retryLimit: quotaRetryLimit,
              waitMs,
            });
            await sleep(waitMs);
          }
        }
      }

      if (!providers.secondary) {
        scoped.warn("Quota retries exhausted and no secondary configured, chunk skipped", {
          attempts: quotaRetryLimit,
        });
        return { outcome: "skipped", verdicts: [], provider: primary.name };
      }

      session.primaryExhausted = true;
      scoped.warn("Quota retries exhausted, failing over for the rest of the run", {
        attempts: quotaRetryLimit,
        secondary: providers.secondary.name,
      });
      return classifyWithSecondary(prompt, chunk.length, session, log);
    },
  };
}
