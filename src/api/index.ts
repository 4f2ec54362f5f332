/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp(createContainer(config));
 * const response = await app.request('/api/knowledge-points');
 * ```
 */

export { createApp, type CreateAppOptions } from './app';

export {
  corsMiddleware,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  KNOWLEDGE_POINT_ERROR_STATUS,
  type ErrorCode,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  validate,
  validateQuery,
} from './middleware';

export {
  createApiRouter,
  healthRoutes,
  knowledgePointsRoutes,
  sessionRoutes,
  syncRoutes,
} from './routes';

export * from './types';

export { success, error } from './utils/response';
