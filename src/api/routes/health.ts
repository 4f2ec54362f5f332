/**
 * Health Check Route
 *
 * Liveness probe. Does not touch the database or the remote store.
 *
 * @example
 * ```bash
 * curl http://127.0.0.1:3001/health
 * # {"success":true,"data":{"status":"ok","timestamp":"...","environment":"development","version":"0.1.0"}}
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 time of the check */
  timestamp: string;
  environment: string;
  version: string;
}

export const APP_VERSION = '0.1.0';

export function healthRoutes(environment: string): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment,
      version: APP_VERSION,
    };

    return success(c, healthData);
  });

  return router;
}
