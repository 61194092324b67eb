import { pingResponseSchema, type PingResponse } from "@repo/shared";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { describeRoute, openAPIRouteHandler, resolver } from "hono-openapi";
import type { AppConfig } from "./config.js";
import type { FacadeDeps } from "./facade/fetch.js";
import { WorkerPool } from "./fanout/pool.js";
import { describeFault, logger } from "./logger.js";
import { apiKeyMiddleware } from "./middleware/api-key.js";
import { tracingMiddleware } from "./middleware/tracing.js";
import { HttpPortalConnector } from "./portal/http-connector.js";
import { MockPortalConnector } from "./portal/mock-connector.js";
import type { PortalConnector } from "./portal/types.js";
import { createPortalRouter } from "./routes/portal.js";
import { createProbeRouter } from "./routes/probe.js";

export interface AppOverrides {
  connector?: PortalConnector;
  pool?: WorkerPool;
  today?: FacadeDeps["today"];
}

export function createConnector(config: AppConfig): PortalConnector {
  if (config.mock) return new MockPortalConnector();
  return new HttpPortalConnector({
    baseUrl: config.portalUrl,
    httpTimeoutMs: config.httpTimeoutMs,
    expectedVersion: config.expectedPortalVersion,
  });
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}) {
  const deps: FacadeDeps = {
    config,
    connector: overrides.connector ?? createConnector(config),
    pool: overrides.pool ?? new WorkerPool(config.workerPoolSize),
    today: overrides.today,
  };

  const app = new Hono();

  app.use("*", tracingMiddleware());
  app.use("*", cors({ origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins }));
  app.use("/portal/*", apiKeyMiddleware(config.apiKey));
  app.use("/probe/*", apiKeyMiddleware(config.apiKey));

  app.route("/portal", createPortalRouter(deps));
  app.route("/probe", createProbeRouter(deps));

  // Liveness probe
  app.get(
    "/ping",
    describeRoute({
      tags: ["System"],
      summary: "Liveness probe",
      responses: {
        200: {
          description: "Service mode and content flag",
          content: {
            "application/json": {
              schema: resolver(pingResponseSchema),
            },
          },
        },
      },
    }),
    (c) => {
      const body: PingResponse = {
        ok: true,
        mode: config.mock ? "MOCK" : "REAL",
        include_content: config.includeContent,
      };
      return c.json(body);
    },
  );

  // OpenAPI JSON spec
  app.get(
    "/api/doc",
    openAPIRouteHandler(app, {
      documentation: {
        info: {
          title: "Portal Bridge API",
          version: "1.0.0",
          description: "Time-boxed JSON facade over a school-information portal",
        },
        servers: [{ url: `http://localhost:${config.port}` }],
        tags: [
          { name: "Portal", description: "Grades, lessons and homework" },
          { name: "Diagnostics", description: "Login checks" },
          { name: "System", description: "Liveness" },
        ],
      },
    }),
  );

  // Swagger UI
  app.get("/api/reference", (c) => {
    return c.html(`<!DOCTYPE html>
<html>
  <head>
    <title>Portal Bridge API Reference</title>
    <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist/swagger-ui.css" />
  </head>
  <body>
    <div id="swagger-ui"></div>
    <script src="https://unpkg.com/swagger-ui-dist/swagger-ui-bundle.js"></script>
    <script>
      SwaggerUIBundle({ url: "/api/doc", dom_id: "#swagger-ui" });
    </script>
  </body>
</html>`);
  });

  app.onError((err, c) => {
    logger.error("Unhandled route error", { path: c.req.path, error: describeFault(err) });
    return c.json({ error: "internal_error" }, 500);
  });

  return app;
}
