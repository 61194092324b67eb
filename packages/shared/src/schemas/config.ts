import { z } from "zod";
import {
  API_PORT,
  DEFAULT_HOMEWORK_TIMEOUT_SECONDS,
  DEFAULT_HTTP_TIMEOUT_SECONDS,
  DEFAULT_LESSONS_TIMEOUT_SECONDS,
  DEFAULT_LOGIN_TIMEOUT_SECONDS,
  DEFAULT_NEXT7_TIMEOUT_SECONDS,
  DEFAULT_NOTES_TIMEOUT_SECONDS,
  DEFAULT_PORTAL_URL,
  DEFAULT_WORKER_POOL_SIZE,
  MIN_WORKER_POOL_SIZE,
} from "../constants.js";

const TRUTHY = new Set(["1", "true", "yes"]);

/** "1", "true" and "yes" (any case) enable a flag; anything else leaves it off. */
export const envFlag = z
  .string()
  .optional()
  .transform((value) => TRUTHY.has((value ?? "").trim().toLowerCase()));

const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(API_PORT),
  PORTAL_URL: z.string().url().default(DEFAULT_PORTAL_URL),
  CORS_ALLOW_ORIGINS: z.string().default("*"),

  // MOCK never touches the portal; INCLUDE_CONTENT fetches lesson content (slow upstream)
  MOCK: envFlag,
  INCLUDE_CONTENT: envFlag,

  LOGIN_TIMEOUT_SECONDS: seconds(DEFAULT_LOGIN_TIMEOUT_SECONDS),
  NOTES_TIMEOUT_SECONDS: seconds(DEFAULT_NOTES_TIMEOUT_SECONDS),
  LESSONS_TIMEOUT_SECONDS: seconds(DEFAULT_LESSONS_TIMEOUT_SECONDS),
  NEXT7_TIMEOUT_SECONDS: seconds(DEFAULT_NEXT7_TIMEOUT_SECONDS),
  HOMEWORK_TIMEOUT_SECONDS: seconds(DEFAULT_HOMEWORK_TIMEOUT_SECONDS),
  HTTP_TIMEOUT_SECONDS: seconds(DEFAULT_HTTP_TIMEOUT_SECONDS),

  WORKER_POOL_SIZE: z.coerce.number().int().min(MIN_WORKER_POOL_SIZE).default(DEFAULT_WORKER_POOL_SIZE),
  PORTAL_EXPECTED_VERSION: z.string().min(1).optional(),
  API_KEY: z.string().min(1).optional(),

  // OpenTelemetry + Axiom (optional - for logs and distributed tracing)
  AXIOM_API_TOKEN: z.string().optional(),
  AXIOM_DATASET: z.string().default("backend-traces"),
  AXIOM_OTLP_ENDPOINT: z.string().default("https://api.axiom.co/v1/traces"),
  OTEL_SERVICE_NAME: z.string().default("portal-bridge"),
});

export type EnvConfig = z.infer<typeof envSchema>;
