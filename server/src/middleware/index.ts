/**
 * Middleware Index
 *
 * Export all middleware for easy importing
 */

export { errorHandler, createError } from './errorHandler';
export { requestLogger, logger } from './logger';
export { parseWith } from './validation';
