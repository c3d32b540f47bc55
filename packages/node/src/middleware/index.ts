/**
 * Middleware barrel.
 */

export { createErrorHandler, statusForCode } from "./error-handler.js";
export type { ErrorStatus } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { jsonBody, queryParams, pathParams, formatZodErrors } from "./validate.js";
export {
  authMiddleware,
  unsecuredAuthMiddleware,
  requirePermission,
  callerAddress,
  API_KEY_HEADER,
  CALLER_ADDRESS_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
