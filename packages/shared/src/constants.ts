// Task names, in the order they appear in the response envelope
export const TASK_NAMES = ["notes", "lessons", "lessons_next7", "homework_next7"] as const;

// Request defaults
export const DEFAULT_PAST_DAYS = 7;
export const MAX_PAST_DAYS = 3650;
export const NEXT_RANGE_DAYS = 7;

// Deadlines (seconds), overridable via env vars
export const DEFAULT_LOGIN_TIMEOUT_SECONDS = 10;
export const DEFAULT_NOTES_TIMEOUT_SECONDS = 6;
export const DEFAULT_LESSONS_TIMEOUT_SECONDS = 6;
export const DEFAULT_NEXT7_TIMEOUT_SECONDS = 4;
export const DEFAULT_HOMEWORK_TIMEOUT_SECONDS = 4;
export const DEFAULT_HTTP_TIMEOUT_SECONDS = 6;

// Four fetch tasks plus the login attempt must fit in the pool at once
export const MIN_WORKER_POOL_SIZE = TASK_NAMES.length + 1;
export const DEFAULT_WORKER_POOL_SIZE = 16;

// Grade values the portal uses for "no mark" (absent, not graded, ...)
export const NO_VALUE_MARKERS: ReadonlySet<string> = new Set([
  "abs",
  "ab",
  "nn",
  "n.n",
  "na",
  "n/a",
  "null",
  "-",
]);

export const MOCK_SCHOOL_URL = "MOCK";

// API defaults
export const API_PORT = 8080;
export const API_BASE_URL = `http://localhost:${API_PORT}`;
export const DEFAULT_PORTAL_URL = "http://localhost:9000";
