import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import { clientIp } from "./client-ip.js";

/**
 * One structured log line per request: method, path, status, duration
 * and client IP. Level follows the status class.
 */
export function auditLog(logger: Logger): MiddlewareHandler {
  const log = logger.child({ component: "http" });

  return async (c, next) => {
    const start = Date.now();

    await next();

    const status = c.res.status;
    const entry = {
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
      ip: clientIp(c),
      userAgent: c.req.header("user-agent") || "unknown",
    };

    if (status >= 500) log.error(entry, "request failed");
    else if (status >= 400) log.warn(entry, "request rejected");
    else log.info(entry, "request completed");
  };
}
