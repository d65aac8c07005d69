/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery, formatZodErrors } from "./validate.js";
export type { ValidatedEnv, ValidatedQueryEnv, ValidationIssue } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  headerPrincipalMiddleware,
  PRINCIPAL_HEADER,
  verifyJwt,
  signJwt,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { metricsMiddleware, MetricsCollector, normalizePath } from "./metrics.js";
