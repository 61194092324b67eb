/**
 * OpenTelemetry instrumentation setup for Axiom.
 *
 * Import this module before the app in server.ts so the SDK is registered before spans
 * are created. When AXIOM_API_TOKEN is not set, tracing is a no-op.
 */

import { trace } from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";

const axiomToken = process.env.AXIOM_API_TOKEN;
const dataset = process.env.AXIOM_DATASET || "backend-traces";

const traceExporter = new OTLPTraceExporter({
  url: process.env.AXIOM_OTLP_ENDPOINT || "https://api.axiom.co/v1/traces",
  headers: {
    Authorization: `Bearer ${axiomToken}`,
    "X-Axiom-Dataset": dataset,
  },
});

const resource = resourceFromAttributes({
  [ATTR_SERVICE_NAME]: process.env.OTEL_SERVICE_NAME || "portal-bridge",
  [ATTR_SERVICE_VERSION]: process.env.npm_package_version || "0.0.0",
});

export const sdk = new NodeSDK({
  resource,
  spanProcessors: [
    new BatchSpanProcessor(traceExporter, {
      maxQueueSize: 1000,
      maxExportBatchSize: 512,
      scheduledDelayMillis: 5000,
    }),
  ],
});

let started = false;

/** Start exporting spans when an Axiom token is configured. Returns whether tracing is on. */
export function startTracing(): boolean {
  if (!axiomToken || started) return started;
  try {
    sdk.start();
    started = true;
    console.log(`OpenTelemetry initialized (dataset=${dataset})`);
  } catch (err) {
    console.error("Error starting OpenTelemetry", err);
  }
  return started;
}

export async function stopTracing(): Promise<void> {
  if (!started) return;
  await sdk.shutdown();
  started = false;
}

export const tracer = trace.getTracer("portal-bridge");
