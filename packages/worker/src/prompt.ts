// =============================================================================
// @triage/worker — Classification prompt builder
// =============================================================================
// Loads the instruction template from the filesystem and renders a chunk of
// queue entries into one numbered prompt. Titles and contents are truncated
// here, at prompt construction, never in storage.
// =============================================================================

import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { QueueEntry, Watchlist } from "@triage/shared";

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(
  new URL("../templates", import.meta.url),
);
export const DEFAULT_TEMPLATE = "classify_v1";

export const TITLE_LIMIT = 200;
export const CONTENT_LIMIT = 500;

const FALLBACK_TEMPLATE = [
  "Decide for each item below whether its author could use {PRODUCT_NAME} ({PRODUCT_DESCRIPTION}).",
  'Answer with a JSON array only: [{"index": 0, "is_relevant": true, "reason": "...", "reply_draft": "..."}]',
  "",
  "ITEMS:",
].join("\n");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PromptBuilder {
  /** Instructions followed by every entry of the chunk, numbered from 0. */
  buildBatchPrompt(chunk: readonly QueueEntry[]): string;
}

export interface PromptBuilderOptions {
  product: Watchlist["product"];
  templateDir?: string;
  templateName?: string;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function formatItemForPrompt(index: number, entry: QueueEntry): string {
  const lines = [
    "",
    `[Item ${index}]`,
    `Type: ${entry.type}`,
    `Subreddit: r/${entry.subreddit}`,
    `Title: ${entry.title.slice(0, TITLE_LIMIT)}`,
    `Content: ${entry.content.slice(0, CONTENT_LIMIT)}`,
  ];
  if (entry.search_keyword) {
    lines.push(`Search Keyword: ${entry.search_keyword}`);
  }
  return lines.join("\n") + "\n";
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPromptBuilder(
  options: PromptBuilderOptions,
): PromptBuilder {
  const templateDir = options.templateDir ?? DEFAULT_TEMPLATE_DIR;
  const templateName = options.templateName ?? DEFAULT_TEMPLATE;
  const cache = new Map<string, string>();

  function loadTemplates(): void {
    let files: string[];
    try {
      files = readdirSync(templateDir).filter((f) => f.endsWith(".txt"));
    } catch {
      files = [];
    }

    for (const file of files) {
      const content = readFileSync(join(templateDir, file), "utf-8");
      cache.set(file.replace(/\.txt$/, ""), content);
    }
  }

  loadTemplates();

  return {
    buildBatchPrompt(chunk) {
      const template = cache.get(templateName) ?? FALLBACK_TEMPLATE;
      let prompt = template
        .replaceAll("{PRODUCT_NAME}", options.product.name)
        .replaceAll("{PRODUCT_DESCRIPTION}", options.product.description);

      chunk.forEach((entry, index) => {
        prompt += formatItemForPrompt(index, entry);
      });
      return prompt;
    },
  };
}
