/**
 * Sync Routes
 *
 * - POST /         Explicit refresh; 401 when signed out
 * - GET  /status   Pending count, last run and conflicts of the last run
 */

import { Hono } from 'hono';
import type { SyncCoordinator } from '@/core/sync';
import { success } from '../utils/response';
import { toSyncRunDto, toSyncStatusDto } from '../types';

export function syncRoutes(coordinator: SyncCoordinator): Hono {
  const router = new Hono();

  router.post('/', async (c) => {
    const run = await coordinator.refresh();
    return success(c, toSyncRunDto(run));
  });

  router.get('/status', async (c) => {
    return success(c, toSyncStatusDto(await coordinator.status()));
  });

  return router;
}
