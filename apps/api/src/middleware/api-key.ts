import type { MiddlewareHandler } from "hono";

export const API_KEY_HEADER = "x-api-key";

/** Reject requests whose x-api-key header does not match. A null key disables the check. */
export function apiKeyMiddleware(apiKey: string | null): MiddlewareHandler {
  return async (c, next) => {
    if (apiKey === null) return next();

    if (c.req.header(API_KEY_HEADER) !== apiKey) {
      return c.json({ error: "invalid_api_key" }, 401);
    }

    await next();
  };
}
