import { destination, pino, type Level, type Logger } from "pino";

export const SERVICE_NAME = "health-trends-mcp";

/**
 * Root logger. Writes JSON lines to stderr so stdout stays reserved for
 * the stdio MCP channel.
 */
export function createLogger(level: Level): Logger {
  return pino({ name: SERVICE_NAME, level }, destination(2));
}
