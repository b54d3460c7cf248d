/**
 * Middleware exports
 */

export { requestId, timing } from './request-context.js';
export { createAuthMiddleware, extractApiKey } from './auth.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
export {
  saveMemorySchema,
  queryMemorySchema,
  validateBody,
  type SaveMemoryBody,
  type QueryMemoryBody,
} from './validation.js';
