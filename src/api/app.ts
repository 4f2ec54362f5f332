/**
 * Hono Application Factory
 *
 * Builds the companion HTTP API around a container. Kept apart from the
 * server entry point so tests can drive it with `app.request()`.
 *
 * Middleware order:
 * 1. Logger
 * 2. CORS
 * 3. Routes (with per-route validation)
 *
 * Errors thrown anywhere below are rendered by `errorHandler`.
 */

import { Hono } from 'hono';
import type { Container } from '@/container';
import { corsMiddleware, errorHandler, loggerMiddleware, ErrorCodes } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

export interface CreateAppOptions {
  /** Log each request; on by default */
  logRequests?: boolean;
}

export function createApp(container: Container, options: CreateAppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler);

  if (options.logRequests ?? true) {
    app.use('*', loggerMiddleware());
  }
  app.use('*', corsMiddleware({ allowedOrigins: container.config.cors.allowedOrigins }));

  app.route('/health', healthRoutes(container.config.server.nodeEnv));
  app.route('/api', createApiRouter(container));

  app.notFound((c) =>
    error(c, ErrorCodes.NOT_FOUND, `Route ${c.req.method} ${c.req.path} not found`, 404)
  );

  return app;
}
