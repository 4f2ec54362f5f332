/**
 * Session Routes
 *
 * Sign-in hands the bearer token issued elsewhere to the AuthSession and
 * promotes pending local points. Sign-out cancels a run in flight and
 * drops the offline copy of the remote lists; local points stay.
 *
 * - POST   /   { token } -> sync run summary, or null when the run failed
 * - DELETE /
 */

import { Hono } from 'hono';
import type { KnowledgePointRepository } from '@/core/knowledge-points';
import type { SyncCoordinator } from '@/core/sync';
import type { AuthSession } from '@/remote';
import { success } from '../utils/response';
import { validate } from '../middleware/validate';
import { signInSchema, toSyncRunDto } from '../types';

export interface SessionRoutesDeps {
  session: AuthSession;
  coordinator: SyncCoordinator;
  repository: KnowledgePointRepository;
}

export function sessionRoutes({ session, coordinator, repository }: SessionRoutesDeps): Hono {
  const router = new Hono();

  router.post('/', validate(signInSchema), async (c) => {
    session.setToken(c.get('validatedBody').token);
    console.log('[API] Signed in, reconciling local points');

    const run = await coordinator.onAuthenticated();
    return success(c, {
      isAuthenticated: true,
      sync: run ? toSyncRunDto(run) : null,
    });
  });

  router.delete('/', async (c) => {
    coordinator.onLogout();
    session.clear();
    await repository.clearCache();
    console.log('[API] Signed out');
    return success(c, { isAuthenticated: false });
  });

  return router;
}
