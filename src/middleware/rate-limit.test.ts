import { Hono } from "hono";
import { describe, expect, test } from "vitest";
import { rateLimit } from "./rate-limit.js";

function appWithLimit(rpm: number, clock: { now: number }) {
  const app = new Hono();
  app.use(rateLimit({ rpm, now: () => clock.now }));
  app.get("/", (c) => c.text("ok"));
  return app;
}

describe("rateLimit", () => {
  test("counts down the remaining budget", async () => {
    const app = appWithLimit(3, { now: 0 });
    const res = await app.request("/");
    expect(res.status).toBe(200);
    expect(res.headers.get("X-RateLimit-Limit")).toBe("3");
    expect(res.headers.get("X-RateLimit-Remaining")).toBe("2");
  });

  test("rejects over the limit until the oldest request leaves the window", async () => {
    const clock = { now: 1_000_000 };
    const app = appWithLimit(2, clock);

    await app.request("/");
    clock.now += 10_000;
    await app.request("/");

    clock.now += 5_000;
    const limited = await app.request("/");
    expect(limited.status).toBe(429);
    expect(limited.headers.get("Retry-After")).toBe("45");
    expect(await limited.json()).toEqual({
      error: "rate_limit_exceeded",
      error_description: "Too many requests. Limit: 2 requests per minute.",
      retry_after: 45,
    });

    clock.now = 1_000_000 + 60_001;
    expect((await app.request("/")).status).toBe(200);
  });
});
