// =============================================================================
// @triage/server — Run harness: Express app + MCP Streamable HTTP transport
// =============================================================================
// Creates an Express application with a health check and a stateless,
// authenticated MCP endpoint through which operators can inspect the queue
// and trigger runs. Every run, scheduled or manual, goes through one
// RunCoordinator so at most one is active against the stores.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, { type Express, type Request, type Response } from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type Logger,
  type ServerConfig,
  createLogger,
  errorMessage,
  loadServerConfig,
} from "@triage/shared";
import {
  type TriageDependencies,
  createTriageDependencies,
  runTriage,
} from "@triage/worker";
import { createAuthMiddleware } from "./auth.js";
import { type RunCoordinator, createRunCoordinator } from "./run-coordinator.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Registers MCP tools on a per-request McpServer instance. */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

export interface AppDependencies {
  config: ServerConfig;
  logger: Logger;
  triage: TriageDependencies;
  coordinator: RunCoordinator;
}

/** Replacements for the production wiring, used by tests. */
export interface AppOverrides {
  logger?: Logger;
  triage?: TriageDependencies;
}

export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Graceful shutdown: waits for an active run, then closes the HTTP server. */
  shutdown: () => Promise<void>;
}

const SHUTDOWN_POLL_MS = 500;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createApp(
  env?: Record<string, string | undefined>,
  overrides: AppOverrides = {},
): AppInstance {
  // --- Configuration & dependencies ---
  const config = loadServerConfig(env);
  const logger = overrides.logger ?? createLogger({ level: config.LOG_LEVEL });
  const triage = overrides.triage ?? createTriageDependencies(config, logger);
  const coordinator = createRunCoordinator(
    () => runTriage(triage),
    logger.child({ component: "coordinator" }),
  );

  const deps: AppDependencies = { config, logger, triage, coordinator };
  const toolRegistrars: ToolRegistrar[] = [];

  // --- Express app ---
  const app = express();
  app.use(express.json());

  // --- Health endpoint (unauthenticated) ---
  app.get("/health", async (_req: Request, res: Response) => {
    try {
      const queue = await triage.queue.stats();
      const last = coordinator.lastRun();
      res.json({
        status: "ok",
        running: coordinator.isRunning(),
        queue,
        lastRun: last
          ? {
              trigger: last.trigger,
              finishedAt: last.finishedAt,
              status: last.result.status,
            }
          : null,
        uptime: process.uptime(),
      });
    } catch (err) {
      logger.error("Health check failed", { error: errorMessage(err) });
      res.status(503).json({ status: "unhealthy", uptime: process.uptime() });
    }
  });

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  const authMiddleware = createAuthMiddleware(config.API_KEYS);

  app.post("/mcp", authMiddleware, async (req: Request, res: Response) => {
    try {
      const server = new McpServer({ name: "triage", version: "0.1.0" });
      for (const registrar of toolRegistrars) {
        registrar(server, deps);
      }

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined, // stateless
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error("MCP request failed", { error: errorMessage(err) });
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  // Reject GET and DELETE for stateless server
  app.get("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  // --- HTTP server ---
  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    // A run checkpoints per chunk; let the active one finish its writes.
    while (coordinator.isRunning()) {
      await new Promise((resolve) => setTimeout(resolve, SHUTDOWN_POLL_MS));
    }

    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    logger.info("Shutdown complete");
  }

  return {
    app,
    httpServer,
    deps,
    addToolRegistrar: (registrar: ToolRegistrar) => {
      toolRegistrars.push(registrar);
    },
    shutdown,
  };
}
