/**
 * Middleware exports
 */

export { requestContext, resolveRequestId } from './request-context.js';
export { createSessionMiddleware, type SessionMiddlewareOptions } from './auth.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
export { pagination, type PaginationParams } from './pagination.js';
export { validateBody } from './validation.js';
