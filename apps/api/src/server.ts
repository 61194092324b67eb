// Tracing must be registered before the app creates its first span
import { startTracing, stopTracing } from "./instrumentation.js";

import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { createApp } from "./index.js";
import { logger } from "./logger.js";

startTracing();

const config = loadConfig();
const app = createApp(config);

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info("API server listening", {
    port: info.port,
    mode: config.mock ? "MOCK" : "REAL",
    includeContent: config.includeContent,
  });
});

// Graceful shutdown: stop accepting requests, flush pending spans and logs
async function shutdown(signal: string): Promise<void> {
  logger.info("API server shutting down", { signal });
  server.close();
  await stopTracing();
  await logger.flush();
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("Shutdown failed", error);
      process.exit(1);
    });
  });
}
