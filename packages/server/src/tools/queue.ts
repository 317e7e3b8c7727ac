// =============================================================================
// @triage/server — Queue inspection tools
// =============================================================================
// - queue_stats: totals by item type and score bucket
// - queue_peek: the next entries a run would dequeue, without removing them
// =============================================================================

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, logToolCall } from "@triage/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";

const QueuePeekInput = z.object({
  limit: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(10)
    .describe("How many entries to return, in priority order"),
});

export const registerQueueTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { triage, logger } = deps;

  server.tool("queue_stats", {}, async () => {
    const start = performance.now();
    try {
      const stats = await triage.queue.stats();
      logToolCall(logger, "queue_stats", {}, performance.now() - start);
      return {
        content: [
          { type: "text" as const, text: JSON.stringify(stats, null, 2) },
        ],
      };
    } catch (err) {
      const message = errorMessage(err);
      logToolCall(logger, "queue_stats", {}, performance.now() - start, message);
      return {
        content: [{ type: "text" as const, text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  server.tool("queue_peek", QueuePeekInput.shape, async (input) => {
    const start = performance.now();
    try {
      const entries = await triage.queue.peek(input.limit);
      const rows = entries.map((entry) => ({
        id: entry.id,
        type: entry.type,
        subreddit: entry.subreddit,
        title: entry.title,
        relevance_score: entry.relevance_score,
        added_at: entry.added_at,
      }));
      logToolCall(logger, "queue_peek", input, performance.now() - start);
      return {
        content: [
          { type: "text" as const, text: JSON.stringify(rows, null, 2) },
        ],
      };
    } catch (err) {
      const message = errorMessage(err);
      logToolCall(logger, "queue_peek", input, performance.now() - start, message);
      return {
        content: [{ type: "text" as const, text: `Error: ${message}` }],
        isError: true,
      };
    }
  });
};
