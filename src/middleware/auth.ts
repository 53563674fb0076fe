import { timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bearer token check against a single configured API token.
 * Returns 401 for a missing, malformed or wrong token.
 */
export function bearerAuth(options: { token: string }): MiddlewareHandler {
  return async (c, next) => {
    const auth = c.req.header("Authorization");

    if (!auth?.startsWith("Bearer ")) {
      return c.json(
        {
          error: "unauthorized",
          error_description: "Missing or malformed Authorization header. Expected: Bearer <token>",
        },
        401
      );
    }

    const token = auth.slice(7).trim();

    if (!token) {
      return c.json(
        {
          error: "unauthorized",
          error_description: "Empty bearer token.",
        },
        401
      );
    }

    if (!tokensMatch(token, options.token)) {
      return c.json(
        {
          error: "invalid_token",
          error_description: "The bearer token is not valid for this server.",
        },
        401
      );
    }

    await next();
  };
}
