// =============================================================================
// @triage/worker — Webhook notifier
// =============================================================================
// Posts Lark/Feishu-style interactive cards to an incoming-webhook URL: one
// card per relevant item, and one summary card per run. A failed delivery is
// logged and counted; it never throws out of sendBatch or sendSummary.
// =============================================================================

import { z } from "zod";
import {
  type AnalyzedItem,
  type ItemType,
  type Logger,
  type RunSummary,
  errorMessage,
  logExternalCall,
} from "@triage/shared";
import type { FetchLike } from "./fetch.js";

const CONTENT_PREVIEW_LIMIT = 300;
const DEFAULT_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Notifier {
  /** Deliver one message per item; returns how many were accepted. */
  sendBatch(items: readonly AnalyzedItem[]): Promise<number>;
  /** Deliver the run summary. Suppressed (and true) when nothing was relevant. */
  sendSummary(summary: RunSummary): Promise<boolean>;
}

export interface WebhookNotifierOptions {
  webhookUrl: string;
  logger: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
}

interface TypeStyle {
  label: string;
  color: string;
  titleLabel: string;
}

const TYPE_STYLES: Record<ItemType, TypeStyle> = {
  post: { label: "Post", color: "blue", titleLabel: "Post title" },
  comment: { label: "Comment", color: "purple", titleLabel: "Thread" },
  search: { label: "Search hit", color: "orange", titleLabel: "Post title" },
};

/** Both `code` and `StatusCode` are used by the webhook API for the result. */
const WebhookResponseSchema = z
  .object({
    code: z.number().optional(),
    StatusCode: z.number().optional(),
    msg: z.string().optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Card rendering
// ---------------------------------------------------------------------------

/**
 * Google search scoped to the item's subreddit with the exact title quoted.
 * Opening the thread through search avoids hitting Reddit directly.
 */
export function googleSearchUrl(title: string, subreddit = ""): string {
  if (!title) return "https://www.google.com/search?q=site:reddit.com";
  const scope = subreddit ? `site:reddit.com/r/${subreddit}` : "site:reddit.com";
  return `https://www.google.com/search?q=${encodeURIComponent(`${scope} "${title}"`)}`;
}

function markdown(content: string): Record<string, unknown> {
  return { tag: "div", text: { tag: "lark_md", content } };
}

function shortField(content: string): Record<string, unknown> {
  return { is_short: true, text: { tag: "lark_md", content } };
}

export function buildItemCard(item: AnalyzedItem): Record<string, unknown> {
  const style = TYPE_STYLES[item.type];
  const preview =
    item.content.length > CONTENT_PREVIEW_LIMIT
      ? item.content.slice(0, CONTENT_PREVIEW_LIMIT) + "..."
      : item.content;

  const fields = [
    shortField(`**Author**: u/${item.author || "unknown"}`),
    shortField(`**Community**: r/${item.subreddit}`),
  ];
  if (item.search_keyword) {
    fields.push(shortField(`**Keyword**: ${item.search_keyword}`));
  }

  return {
    msg_type: "interactive",
    card: {
      config: { wide_screen_mode: true },
      header: {
        title: {
          tag: "plain_text",
          content: `Reply candidate [${style.label}] - r/${item.subreddit}`,
        },
        template: style.color,
      },
      elements: [
        markdown(`**${style.titleLabel}**\n${item.title}`),
        markdown(`**Preview**\n${preview}`),
        { tag: "hr" },
        markdown(`**Why it fits**\n${item.analysis.reason}`),
        markdown(`**Draft reply**\n\`\`\`\n${item.analysis.reply_draft}\n\`\`\``),
        { tag: "hr" },
        { tag: "div", fields },
        {
          tag: "action",
          actions: [
            {
              tag: "button",
              text: { tag: "plain_text", content: "Open thread (via Google)" },
              type: "primary",
              url: googleSearchUrl(item.title, item.subreddit),
            },
          ],
        },
      ],
    },
  };
}

export function buildSummaryCard(summary: RunSummary): Record<string, unknown> {
  const lines = [
    `• Scanned: **${summary.total}**`,
    `• Relevant: **${summary.relevant}**`,
    `• Delivered: **${summary.sent}**`,
    `• Still queued: **${summary.queue_remaining}**`,
    "",
    "By type:",
    `• Posts: ${summary.relevant_by_type.post}`,
    `• Comments: ${summary.relevant_by_type.comment}`,
    `• Search hits: ${summary.relevant_by_type.search}`,
  ];

  return {
    msg_type: "interactive",
    card: {
      header: {
        title: { tag: "plain_text", content: "Triage run summary" },
        template: "green",
      },
      elements: [markdown(lines.join("\n"))],
    },
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createWebhookNotifier(
  options: WebhookNotifierOptions,
): Notifier {
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger.child({ component: "notifier" });

  async function post(
    card: Record<string, unknown>,
    operation: string,
  ): Promise<boolean> {
    const start = performance.now();
    try {
      const response = await fetchImpl(options.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(card),
        signal: AbortSignal.timeout(timeoutMs),
      });
      const body = WebhookResponseSchema.safeParse(await response.json());
      const accepted =
        body.success && (body.data.code === 0 || body.data.StatusCode === 0);

      logExternalCall(
        logger,
        "webhook",
        operation,
        performance.now() - start,
        accepted ? undefined : `rejected (HTTP ${response.status})`,
      );
      return accepted;
    } catch (err) {
      logExternalCall(
        logger,
        "webhook",
        operation,
        performance.now() - start,
        errorMessage(err),
      );
      return false;
    }
  }

  return {
    async sendBatch(items) {
      let sent = 0;
      for (const item of items) {
        if (await post(buildItemCard(item), "send_item")) {
          sent++;
        } else {
          logger.warn("Item notification not delivered", {
            id: item.id,
            title: item.title.slice(0, 40),
          });
        }
      }
      logger.info("Notifications delivered", { sent, total: items.length });
      return sent;
    },

    async sendSummary(summary) {
      if (summary.relevant === 0) return true;
      return post(buildSummaryCard(summary), "send_summary");
    },
  };
}
