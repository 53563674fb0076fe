import { randomUUID } from "node:crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { Logger } from "pino";
import type { Config } from "./config.js";
import { SERVER_NAME, SERVER_VERSION } from "./mcp/server.js";
import { HttpTransport } from "./mcp/transport.js";
import { auditLog } from "./middleware/audit.js";
import { bearerAuth } from "./middleware/auth.js";
import { rateLimit } from "./middleware/rate-limit.js";

export interface HttpAppDeps {
  config: Config;
  logger: Logger;
  createServer: () => McpServer;
}

interface McpSession {
  server: McpServer;
  transport: HttpTransport;
  lastAccess: number;
}

export const SESSION_IDLE_MS = 30 * 60_000;

export function createHttpApp(deps: HttpAppDeps) {
  const { config, logger, createServer } = deps;
  const sessions = new Map<string, McpSession>();
  const app = new Hono();

  // ── Middleware ──
  app.use(auditLog(logger));
  app.use(
    cors({
      origin: config.server.corsOrigins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", "Mcp-Session-Id"],
      exposeHeaders: ["Mcp-Session-Id", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
    })
  );

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({
      status: "ok",
      server: SERVER_NAME,
      version: SERVER_VERSION,
      sessions: sessions.size,
    })
  );

  // ── MCP endpoint ──
  app.use("/mcp", rateLimit({ rpm: config.rateLimit.rpm }));
  if (config.auth.apiToken) {
    app.use("/mcp", bearerAuth({ token: config.auth.apiToken }));
  }

  app.post("/mcp", async (c) => {
    const raw: unknown = await c.req.json().catch(() => undefined);
    const message = HttpTransport.parse(raw);
    if (!message) {
      return c.json(
        {
          jsonrpc: "2.0",
          id: null,
          error: { code: -32700, message: "Body is not a JSON-RPC 2.0 message" },
        },
        400
      );
    }

    const sessionId = c.req.header("mcp-session-id");
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    let transport: HttpTransport;
    let newSessionId: string | undefined;

    if (existing) {
      transport = existing.transport;
      existing.lastAccess = Date.now();
    } else {
      newSessionId = randomUUID();
      const server = createServer();
      transport = new HttpTransport();
      await server.connect(transport);
      sessions.set(newSessionId, { server, transport, lastAccess: Date.now() });
      logger.debug({ sessionId: newSessionId }, "MCP session opened");
    }

    const response = await transport.handleJsonRpc(message);

    const headers: Record<string, string> = {};
    if (newSessionId) headers["mcp-session-id"] = newSessionId;

    if (response === null) {
      return c.body(null, 202, headers);
    }
    return c.json(response, 200, headers);
  });

  /** Close sessions idle since before `now - SESSION_IDLE_MS`. */
  async function sweepSessions(now = Date.now()): Promise<number> {
    const cutoff = now - SESSION_IDLE_MS;
    let closed = 0;
    for (const [id, session] of sessions) {
      if (session.lastAccess < cutoff) {
        sessions.delete(id);
        await session.server.close();
        closed++;
      }
    }
    if (closed > 0) logger.debug({ closed }, "Idle MCP sessions closed");
    return closed;
  }

  async function closeAll(): Promise<void> {
    for (const [id, session] of sessions) {
      sessions.delete(id);
      await session.server.close();
    }
  }

  return { app, sweepSessions, closeAll };
}
