/**
 * API Middleware - Barrel Export
 *
 * Order of application in createApp():
 * 1. Logger
 * 2. CORS
 * 3. Per-route validation
 *
 * Errors are rendered by `app.onError(errorHandler)`.
 */

export { corsMiddleware, DEFAULT_CORS_CONFIG, type CorsConfig } from './cors';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  KNOWLEDGE_POINT_ERROR_STATUS,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

export { validate, validateQuery } from './validate';
