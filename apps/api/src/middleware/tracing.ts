import { SpanStatusCode } from "@opentelemetry/api";
import type { MiddlewareHandler } from "hono";
import { nanoid } from "nanoid";
import { tracer } from "../instrumentation.js";
import { logger } from "../logger.js";

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Hono middleware that creates an OpenTelemetry span per HTTP request and tags it with a
 * request id (taken from the incoming header or generated), echoed back on the response.
 * Also logs each request with method, path, status, and duration. Query strings are left
 * out of the log line since the login probe carries credentials there.
 */
export function tracingMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now();
    const method = c.req.method;
    const path = c.req.path;
    const requestId = c.req.header(REQUEST_ID_HEADER) || nanoid(12);

    return tracer.startActiveSpan(`${method} ${path}`, async (span) => {
      span.setAttribute("http.method", method);
      span.setAttribute("http.route", path);
      span.setAttribute("request.id", requestId);

      try {
        await next();
        c.header(REQUEST_ID_HEADER, requestId);
        span.setAttribute("http.status_code", c.res.status);
        if (c.res.status >= 500) {
          span.setStatus({ code: SpanStatusCode.ERROR, message: `HTTP ${c.res.status}` });
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        throw err;
      } finally {
        span.end();
        const duration = Math.round(performance.now() - start);
        logger.info(`${method} ${path} ${c.res.status}`, { duration, requestId });
      }
    });
  };
}
