/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validationFailure } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export { authMiddleware, API_KEY_HEADER, PARTY_ID_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
