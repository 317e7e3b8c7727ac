// =============================================================================
// @triage/server — Run control tools
// =============================================================================
// - run_triage: start a run now and wait for its report
// - last_run: outcome of the most recent run, whichever trigger started it
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logToolCall } from "@triage/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";

export const registerTriageTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { coordinator, logger } = deps;

  server.tool("run_triage", {}, async () => {
    const start = performance.now();
    const result = await coordinator.trigger("mcp");
    logToolCall(
      logger,
      "run_triage",
      {},
      performance.now() - start,
      result.status === "failed" ? result.error : undefined,
    );
    return {
      content: [
        { type: "text" as const, text: JSON.stringify(result, null, 2) },
      ],
      ...(result.status === "failed" ? { isError: true } : {}),
    };
  });

  server.tool("last_run", {}, async () => {
    const last = coordinator.lastRun();
    logToolCall(logger, "last_run", {}, 0);
    return {
      content: [
        {
          type: "text" as const,
          text: last ? JSON.stringify(last, null, 2) : "No run has finished yet",
        },
      ],
    };
  });
};
