import { describe, it, expect, vi } from "vitest";
import type { ClassifierProvider, ProviderName } from "@triage/shared";
import {
  createBatchClassifier,
  createClassifierSession,
  parseVerdictArray,
  selectRelevant,
  validateVerdicts,
} from "../batch-classifier.js";
import type { PromptBuilder } from "../prompt.js";
import { makeEntry, silentLogger } from "./helpers.js";

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

const prompt: PromptBuilder = {
  buildBatchPrompt: (chunk) => `classify ${chunk.length} items`,
};

function fakeProvider(
  name: ProviderName,
  impl: (prompt: string) => Promise<string>,
) {
  const complete = vi.fn(impl);
  const provider: ClassifierProvider = { name, model: "test-model", complete };
  return { provider, complete };
}

function quotaError(): Error {
  return Object.assign(new Error("429 Too Many Requests"), { status: 429 });
}

const CHUNK = [
  makeEntry({ id: "a", title: "first game" }),
  makeEntry({ id: "b", title: "shader math" }),
];

const GOOD_REPLY = JSON.stringify([
  { index: 0, is_relevant: true, reason: "beginner", reply_draft: "try it" },
  { index: 1, is_relevant: false, reason: "advanced", reply_draft: "" },
]);

function classifierWith(
  primary: ClassifierProvider | undefined,
  secondary: ClassifierProvider | undefined,
  quotaRetryLimit = 2,
) {
  const sleep = vi.fn(async (_ms: number) => {});
  const classifier = createBatchClassifier({
    providers: { primary, secondary },
    prompt,
    logger: silentLogger(),
    quotaRetryLimit,
    quotaBackoffMs: 100,
    sleep,
  });
  return { classifier, sleep };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe("parseVerdictArray", () => {
  it("strips code fences", () => {
    const text = '```json\n[{"index": 0, "is_relevant": true}]\n```';
    expect(parseVerdictArray(text)).toEqual([{ index: 0, is_relevant: true }]);
  });

  it("finds an array embedded in prose", () => {
    const text = 'Here you go: [{"index": 1, "is_relevant": false}] hope it helps';
    expect(parseVerdictArray(text)).toEqual([{ index: 1, is_relevant: false }]);
  });

  it("returns null when there is no array", () => {
    expect(parseVerdictArray("I cannot help with that")).toBeNull();
    expect(parseVerdictArray('{"index": 0}')).toBeNull();
    expect(parseVerdictArray("[not json]")).toBeNull();
  });
});

describe("validateVerdicts", () => {
  it("keeps well-formed in-range verdicts and drops the rest", () => {
    const { verdicts, dropped } = validateVerdicts(
      [
        { index: 0, is_relevant: true, reason: "fits", reply_draft: "hey" },
        { index: 5, is_relevant: true },
        { index: 0, is_relevant: false },
        { index: 1, is_relevant: "yes" },
        { index: 1, is_relevant: false, reason: 7 },
        "junk",
      ],
      2,
    );

    expect(verdicts).toEqual([
      { index: 0, is_relevant: true, reason: "fits", reply_draft: "hey" },
      { index: 1, is_relevant: false, reason: "", reply_draft: "" },
    ]);
    expect(dropped).toBe(4);
  });
});

describe("selectRelevant", () => {
  it("merges relevant verdicts into their entries", () => {
    const relevant = selectRelevant(CHUNK, [
      { index: 1, is_relevant: true, reason: "r", reply_draft: "d" },
      { index: 0, is_relevant: false, reason: "", reply_draft: "" },
    ]);

    expect(relevant).toHaveLength(1);
    expect(relevant[0]?.id).toBe("b");
    expect(relevant[0]?.analysis).toEqual({
      is_relevant: true,
      reason: "r",
      reply_draft: "d",
    });
  });
});

// ---------------------------------------------------------------------------
// Classification and failover
// ---------------------------------------------------------------------------

describe("createBatchClassifier", () => {
  it("classifies a chunk with the primary", async () => {
    const primary = fakeProvider("gemini", async () => "```json\n" + GOOD_REPLY + "\n```");
    const { classifier } = classifierWith(primary.provider, undefined);
    const session = createClassifierSession();

    const result = await classifier.classify(CHUNK, session, 1);

    expect(result.outcome).toBe("classified");
    expect(result.provider).toBe("gemini");
    expect(result.verdicts).toHaveLength(2);
    expect(primary.complete).toHaveBeenCalledWith("classify 2 items");
    expect(session.attempts).toEqual({ gemini: 1, anthropic: 0 });
    expect(session.lastProvider).toBe("gemini");
  });

  it("reports parse_failed for a malformed reply", async () => {
    const primary = fakeProvider("gemini", async () => "sorry, no");
    const { classifier } = classifierWith(primary.provider, undefined);

    const result = await classifier.classify(CHUNK, createClassifierSession(), 1);

    expect(result).toEqual({ outcome: "parse_failed", verdicts: [], provider: "gemini" });
  });

  it("reports parse_failed for an empty array", async () => {
    const primary = fakeProvider("gemini", async () => "[]");
    const { classifier } = classifierWith(primary.provider, undefined);

    const result = await classifier.classify(CHUNK, createClassifierSession(), 1);
    expect(result.outcome).toBe("parse_failed");
  });

  it("retries quota errors with linear backoff, then fails over for the session", async () => {
    const primary = fakeProvider("gemini", async () => {
      throw quotaError();
    });
    const secondary = fakeProvider("anthropic", async () => GOOD_REPLY);
    const { classifier, sleep } = classifierWith(
      primary.provider,
      secondary.provider,
      3,
    );
    const session = createClassifierSession();

    const first = await classifier.classify(CHUNK, session, 1);

    expect(first.outcome).toBe("classified");
    expect(first.provider).toBe("anthropic");
    expect(primary.complete).toHaveBeenCalledTimes(3);
    expect(secondary.complete).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(session.primaryExhausted).toBe(true);

    const second = await classifier.classify(CHUNK, session, 2);

    expect(second.provider).toBe("anthropic");
    expect(primary.complete).toHaveBeenCalledTimes(3);
    expect(secondary.complete).toHaveBeenCalledTimes(2);
    expect(session.attempts).toEqual({ gemini: 3, anthropic: 2 });
  });

  it("recovers when a quota retry succeeds", async () => {
    let calls = 0;
    const primary = fakeProvider("gemini", async () => {
      calls++;
      if (calls === 1) throw quotaError();
      return GOOD_REPLY;
    });
    const { classifier, sleep } = classifierWith(primary.provider, undefined);
    const session = createClassifierSession();

    const result = await classifier.classify(CHUNK, session, 1);

    expect(result.outcome).toBe("classified");
    expect(result.provider).toBe("gemini");
    expect(sleep.mock.calls).toEqual([[100]]);
    expect(session.primaryExhausted).toBe(false);
  });

  it("skips without marking the primary when no secondary exists", async () => {
    const primary = fakeProvider("gemini", async () => {
      throw new Error("RESOURCE_EXHAUSTED");
    });
    const { classifier } = classifierWith(primary.provider, undefined);
    const session = createClassifierSession();

    const result = await classifier.classify(CHUNK, session, 1);

    expect(result).toEqual({ outcome: "skipped", verdicts: [], provider: "gemini" });
    expect(primary.complete).toHaveBeenCalledTimes(2);
    expect(session.primaryExhausted).toBe(false);
  });

  it("does not retry or fail over on other errors", async () => {
    const primary = fakeProvider("gemini", async () => {
      throw new Error("invalid api key");
    });
    const secondary = fakeProvider("anthropic", async () => GOOD_REPLY);
    const { classifier, sleep } = classifierWith(primary.provider, secondary.provider);
    const session = createClassifierSession();

    const result = await classifier.classify(CHUNK, session, 1);

    expect(result).toEqual({ outcome: "failed", verdicts: [], provider: "gemini" });
    expect(primary.complete).toHaveBeenCalledTimes(1);
    expect(secondary.complete).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
    expect(session.primaryExhausted).toBe(false);
  });

  it("uses the secondary when no primary is configured", async () => {
    const secondary = fakeProvider("anthropic", async () => GOOD_REPLY);
    const { classifier } = classifierWith(undefined, secondary.provider);

    const result = await classifier.classify(CHUNK, createClassifierSession(), 1);

    expect(result.outcome).toBe("classified");
    expect(result.provider).toBe("anthropic");
  });

  it("reports a failing secondary as failed", async () => {
    const secondary = fakeProvider("anthropic", async () => {
      throw new Error("overloaded");
    });
    const { classifier } = classifierWith(undefined, secondary.provider);

    const result = await classifier.classify(CHUNK, createClassifierSession(), 1);
    expect(result).toEqual({ outcome: "failed", verdicts: [], provider: "anthropic" });
  });

  it("skips when no provider is configured", async () => {
    const { classifier } = classifierWith(undefined, undefined);
    const result = await classifier.classify(CHUNK, createClassifierSession(), 1);
    expect(result).toEqual({ outcome: "skipped", verdicts: [] });
  });

  it("skips an empty chunk without calling anything", async () => {
    const primary = fakeProvider("gemini", async () => GOOD_REPLY);
    const { classifier } = classifierWith(primary.provider, undefined);

    const result = await classifier.classify([], createClassifierSession(), 1);

    expect(result).toEqual({ outcome: "skipped", verdicts: [] });
    expect(primary.complete).not.toHaveBeenCalled();
  });
});
