/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestContextMiddleware, REQUEST_ID_HEADER } from "./request-context.js";
export type { RequestLogEntry, RequestLogSink } from "./request-context.js";
export { parseQuery, validateBody } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export {
  API_KEY_HEADER,
  authMiddleware,
  PRINCIPAL_HEADER,
  principalHeaderMiddleware,
  requirePermission,
  requireWriteForMutations,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
