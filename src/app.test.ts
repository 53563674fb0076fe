import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { pino } from "pino";
import { describe, expect, test } from "vitest";
import { createTrendAnalyzer } from "./analysis/index.js";
import { createHttpApp, SESSION_IDLE_MS } from "./app.js";
import { loadConfig, type Config } from "./config.js";
import { createMcpServer } from "./mcp/server.js";

const logger = pino({ level: "silent" });

function buildApp(env: Record<string, string> = {}) {
  const config: Config = loadConfig(env, ["node", "index.js"]);
  const analyzer = createTrendAnalyzer({ logger });
  return createHttpApp({
    config,
    logger,
    createServer: () => createMcpServer({ analyzer, analysis: config.analysis }),
  });
}

const initialize = {
  jsonrpc: "2.0",
  id: 1,
  method: "initialize",
  params: {
    protocolVersion: LATEST_PROTOCOL_VERSION,
    capabilities: {},
    clientInfo: { name: "test-client", version: "1.0.0" },
  },
};

function post(body: unknown, headers: Record<string, string> = {}) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  };
}

describe("GET /health", () => {
  test("reports the server identity", async () => {
    const { app } = buildApp();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      server: "health-trends",
      version: "0.1.0",
      sessions: 0,
    });
  });
});

describe("POST /mcp", () => {
  test("opens a session on first contact and reuses it", async () => {
    const { app } = buildApp();

    const first = await app.request("/mcp", post(initialize));
    expect(first.status).toBe(200);
    const sessionId = first.headers.get("mcp-session-id");
    expect(sessionId).toBeTruthy();
    expect(await first.json()).toMatchObject({
      jsonrpc: "2.0",
      id: 1,
      result: { serverInfo: { name: "health-trends", version: "0.1.0" } },
    });

    const second = await app.request(
      "/mcp",
      post({ jsonrpc: "2.0", id: 2, method: "tools/list" }, { "mcp-session-id": sessionId ?? "" }),
    );
    expect(second.status).toBe(200);
    expect(second.headers.get("mcp-session-id")).toBeNull();
    const body: unknown = await second.json();
    expect(body).toMatchObject({ jsonrpc: "2.0", id: 2 });
    expect(JSON.stringify(body)).toContain('"name":"analyze_trends"');

    const health = await app.request("/health");
    expect(await health.json()).toMatchObject({ sessions: 1 });
  });

  test("accepts notifications without a response body", async () => {
    const { app } = buildApp();
    const res = await app.request(
      "/mcp",
      post({ jsonrpc: "2.0", method: "notifications/initialized" }),
    );
    expect(res.status).toBe(202);
  });

  test("rejects a body that is not JSON-RPC", async () => {
    const { app } = buildApp();
    const res = await app.request("/mcp", post({ hello: "world" }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: -32700 } });
  });

  test("requires the bearer token when one is configured", async () => {
    const { app } = buildApp({ API_TOKEN: "test-secret" });

    const missing = await app.request("/mcp", post(initialize));
    expect(missing.status).toBe(401);
    expect(await missing.json()).toMatchObject({ error: "unauthorized" });

    const wrong = await app.request("/mcp", post(initialize, { Authorization: "Bearer nope" }));
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toMatchObject({ error: "invalid_token" });

    const ok = await app.request("/mcp", post(initialize, { Authorization: "Bearer test-secret" }));
    expect(ok.status).toBe(200);
  });

  test("leaves /health open when a token is configured", async () => {
    const { app } = buildApp({ API_TOKEN: "test-secret" });
    expect((await app.request("/health")).status).toBe(200);
  });

  test("rate-limits each client", async () => {
    const { app } = buildApp({ RATE_LIMIT_RPM: "1" });
    const headers = { "x-forwarded-for": "203.0.113.7" };

    expect((await app.request("/mcp", post(initialize, headers))).status).toBe(200);
    const limited = await app.request("/mcp", post(initialize, headers));
    expect(limited.status).toBe(429);
    expect(limited.headers.get("X-RateLimit-Remaining")).toBe("0");

    const other = await app.request("/mcp", post(initialize, { "x-forwarded-for": "203.0.113.8" }));
    expect(other.status).toBe(200);
  });
});

describe("sweepSessions", () => {
  test("closes sessions idle past the limit", async () => {
    const { app, sweepSessions } = buildApp();
    await app.request("/mcp", post(initialize));

    expect(await sweepSessions(Date.now())).toBe(0);
    expect(await sweepSessions(Date.now() + SESSION_IDLE_MS + 1_000)).toBe(1);
    expect(await (await app.request("/health")).json()).toMatchObject({ sessions: 0 });
  });
});
