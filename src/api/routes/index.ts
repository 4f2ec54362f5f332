/**
 * API Routes Aggregator
 *
 * Route Structure:
 * - /health                  Liveness (mounted at root, not under /api)
 * - /api                     API info
 * - /api/knowledge-points    Read model and lifecycle
 * - /api/sync                Explicit refresh and status
 * - /api/session             Sign in / sign out
 */

import { Hono } from 'hono';
import type { Container } from '@/container';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { knowledgePointsRoutes } from './knowledge-points';
import { sessionRoutes } from './session';
import { syncRoutes } from './sync';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { knowledgePointsRoutes, type KnowledgePointRoutesDeps } from './knowledge-points';
export { sessionRoutes, type SessionRoutesDeps } from './session';
export { syncRoutes } from './sync';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: { path: string; description: string }[];
}

export function createApiRouter(container: Container): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Knowledge Point Sync API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/knowledge-points', description: 'Knowledge points from both stores' },
        { path: '/api/knowledge-points/summary', description: 'Totals by mastery tier' },
        { path: '/api/sync', description: 'Promote local points to the remote store' },
        { path: '/api/session', description: 'Sign in with a bearer token, sign out' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route(
    '/knowledge-points',
    knowledgePointsRoutes({
      repository: container.repository,
      mastery: container.mastery,
      now: container.now,
    })
  );
  router.route('/sync', syncRoutes(container.coordinator));
  router.route(
    '/session',
    sessionRoutes({
      session: container.session,
      coordinator: container.coordinator,
      repository: container.repository,
    })
  );

  return router;
}
