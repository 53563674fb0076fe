#!/usr/bin/env node
/**
 * Health Trends MCP Server
 *
 * Trend analysis, anomaly detection, forecasting and data-quality checks
 * for time-stamped health measurements, exposed as MCP tools.
 *
 * Usage:
 *   node dist/src/index.js --transport stdio   # Local MCP clients
 *   node dist/src/index.js --transport http    # HTTP server on PORT (default 3300)
 */

import { serve } from "@hono/node-server";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createTrendAnalyzer } from "./analysis/index.js";
import { createHttpApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createMcpServer } from "./mcp/server.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const analyzer = createTrendAnalyzer({ logger: logger.child({ component: "analysis" }) });

const newServer = () => createMcpServer({ analyzer, analysis: config.analysis });

if (config.server.transport === "stdio") {
  await startStdio();
} else {
  startHttp();
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio() {
  const server = newServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ transport: "stdio" }, "Health trends MCP server ready");

  process.on("SIGINT", () => {
    server
      .close()
      .catch((err: unknown) => logger.error({ err }, "Error while closing server"))
      .finally(() => process.exit(0));
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

function startHttp() {
  const { app, sweepSessions, closeAll } = createHttpApp({
    config,
    logger,
    createServer: newServer,
  });

  const sweep = setInterval(() => {
    sweepSessions().catch((err: unknown) => logger.error({ err }, "Session sweep failed"));
  }, 5 * 60_000);
  sweep.unref();

  const port = config.server.port;
  const httpServer = serve({ fetch: app.fetch, port }, (info) => {
    logger.info(
      { transport: "http", port: info.port, auth: Boolean(config.auth.apiToken) },
      "Health trends MCP server listening (POST /mcp, GET /health)",
    );
  });

  process.on("SIGINT", () => {
    clearInterval(sweep);
    closeAll()
      .catch((err: unknown) => logger.error({ err }, "Error while closing sessions"))
      .finally(() => httpServer.close(() => process.exit(0)));
  });
}
