import type { MiddlewareHandler } from "hono";
import { clientIp } from "./client-ip.js";

export interface RateLimitOptions {
  /** Requests allowed per client IP per minute (default 60) */
  rpm?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

const WINDOW_MS = 60_000;

/**
 * Per-IP sliding-window rate limiter. Requests over the limit get a 429
 * with Retry-After.
 */
export function rateLimit(options: RateLimitOptions = {}): MiddlewareHandler {
  const limit = options.rpm ?? 60;
  const clock = options.now ?? Date.now;
  const windows = new Map<string, number[]>();

  // Drop idle clients so the map does not grow without bound
  const cleanupInterval = setInterval(() => {
    const cutoff = clock() - WINDOW_MS;
    for (const [ip, timestamps] of windows) {
      const live = timestamps.filter((t) => t > cutoff);
      if (live.length === 0) windows.delete(ip);
      else windows.set(ip, live);
    }
  }, WINDOW_MS);
  cleanupInterval.unref();

  return async (c, next) => {
    const ip = clientIp(c);
    const now = clock();
    const cutoff = now - WINDOW_MS;

    const live = (windows.get(ip) ?? []).filter((t) => t > cutoff);

    if (live.length >= limit) {
      const oldestInWindow = live[0]!;
      const retryAfterSec = Math.ceil((oldestInWindow + WINDOW_MS - now) / 1000);

      c.header("Retry-After", String(retryAfterSec));
      c.header("X-RateLimit-Limit", String(limit));
      c.header("X-RateLimit-Remaining", "0");

      return c.json(
        {
          error: "rate_limit_exceeded",
          error_description: `Too many requests. Limit: ${limit} requests per minute.`,
          retry_after: retryAfterSec,
        },
        429
      );
    }

    live.push(now);
    windows.set(ip, live);

    c.header("X-RateLimit-Limit", String(limit));
    c.header("X-RateLimit-Remaining", String(limit - live.length));

    await next();
  };
}
