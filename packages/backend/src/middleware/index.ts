/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export { requestContext, REQUEST_ID_HEADER } from "./request-context.js";
export { requestLogger, HEALTH_CHECK_PATHS } from "./logger.js";
export { validateBody, validateInput, RequestValidationError } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
