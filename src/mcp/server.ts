import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { TrendAnalyzer } from "../analysis/index.js";
import type { Config } from "../config.js";
import { registerAnalysisTools, registerPrompts, registerResources } from "../tools/index.js";

export const SERVER_NAME = "health-trends";
export const SERVER_VERSION = "0.1.0";

export interface McpServerDeps {
  analyzer: TrendAnalyzer;
  analysis: Config["analysis"];
}

/**
 * Create an MCP server with the analysis tools, the metric catalog
 * resource and the review prompt registered.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerAnalysisTools(server, { analyzer: deps.analyzer, defaults: deps.analysis });
  registerResources(server, deps.analysis);
  registerPrompts(server);

  return server;
}
