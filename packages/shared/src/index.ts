// Constants
export * from "./constants.js";

// Types
export type * from "./types/records.js";
export type * from "./types/envelope.js";
export type * from "./types/request.js";

// Schemas
export {
  credentialsSchema,
  fetchRequestSchema,
  isoDateSchema,
} from "./schemas/fetch.js";
export { envFlag, envSchema, type EnvConfig } from "./schemas/config.js";
export {
  envelopeResponseSchema,
  errorResponseSchema,
  gradeResponseSchema,
  homeworkResponseSchema,
  lessonResponseSchema,
  pingResponseSchema,
  probeLoginResponseSchema,
} from "./schemas/responses.js";
