import { type EnvConfig, envSchema, type TaskName } from "@repo/shared";

export interface AppConfig {
  port: number;
  portalUrl: string;
  corsOrigins: string[];
  mock: boolean;
  includeContent: boolean;
  loginTimeoutMs: number;
  taskDeadlinesMs: Record<TaskName, number>;
  httpTimeoutMs: number;
  workerPoolSize: number;
  expectedPortalVersion: string | null;
  apiKey: string | null;
}

const toMs = (seconds: number) => Math.round(seconds * 1000);

export function configFromEnv(env: EnvConfig): AppConfig {
  const origins = env.CORS_ALLOW_ORIGINS.split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  return {
    port: env.PORT,
    portalUrl: env.PORTAL_URL,
    corsOrigins: origins.length > 0 ? origins : ["*"],
    mock: env.MOCK,
    includeContent: env.INCLUDE_CONTENT,
    loginTimeoutMs: toMs(env.LOGIN_TIMEOUT_SECONDS),
    taskDeadlinesMs: {
      notes: toMs(env.NOTES_TIMEOUT_SECONDS),
      lessons: toMs(env.LESSONS_TIMEOUT_SECONDS),
      lessons_next7: toMs(env.NEXT7_TIMEOUT_SECONDS),
      homework_next7: toMs(env.HOMEWORK_TIMEOUT_SECONDS),
    },
    httpTimeoutMs: toMs(env.HTTP_TIMEOUT_SECONDS),
    workerPoolSize: env.WORKER_POOL_SIZE,
    expectedPortalVersion: env.PORTAL_EXPECTED_VERSION ?? null,
    apiKey: env.API_KEY ?? null,
  };
}

/** Parse process.env once at startup; throws the zod error on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return configFromEnv(envSchema.parse(env));
}
