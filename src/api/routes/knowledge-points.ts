/**
 * Knowledge Point Routes
 *
 * The read model and lifecycle operations of the repository facade. Points
 * are addressed by effective ID (`7:3`, `42`, `fallback_...`), whichever
 * store holds them.
 *
 * Routes:
 * - GET    /               Active list (?tier=&category=&sort=&due=true)
 * - GET    /archived       Archived list (same filters)
 * - GET    /summary        Totals by tier, average mastery, due count
 * - POST   /               Create a point
 * - GET    /:id            One point
 * - POST   /:id/archive    Archive
 * - POST   /:id/unarchive  Unarchive
 * - DELETE /:id            Delete
 * - POST   /:id/outcome    Record a practice outcome
 */

import { Hono } from 'hono';
import type { KnowledgePointFilter, KnowledgePointRepository } from '@/core/knowledge-points';
import type { MasteryEngine } from '@/core/mastery';
import { KnowledgePointNotFoundError } from '@/core/errors';
import { success } from '../utils/response';
import { validate, validateQuery } from '../middleware/validate';
import {
  createKnowledgePointSchema,
  knowledgePointQuerySchema,
  practiceOutcomeSchema,
  toKnowledgePointDto,
  type KnowledgePointQuery,
} from '../types';

export interface KnowledgePointRoutesDeps {
  repository: KnowledgePointRepository;
  mastery: MasteryEngine;
  now?: () => Date;
}

function toFilter(query: KnowledgePointQuery, archived: boolean, now: Date): KnowledgePointFilter {
  return {
    archived,
    tier: query.tier,
    category: query.category,
    sort: query.sort,
    dueBefore: query.due ? now : undefined,
  };
}

export function knowledgePointsRoutes(deps: KnowledgePointRoutesDeps): Hono {
  const { repository, mastery } = deps;
  const now = deps.now ?? (() => new Date());
  const router = new Hono();

  router.get('/', validateQuery(knowledgePointQuerySchema), async (c) => {
    const points = await repository.query(toFilter(c.get('validatedQuery'), false, now()));
    return success(c, points.map((point) => toKnowledgePointDto(point, mastery)));
  });

  router.get('/archived', validateQuery(knowledgePointQuerySchema), async (c) => {
    const points = await repository.query(toFilter(c.get('validatedQuery'), true, now()));
    return success(c, points.map((point) => toKnowledgePointDto(point, mastery)));
  });

  router.get('/summary', async (c) => {
    return success(c, await repository.summary());
  });

  router.post('/', validate(createKnowledgePointSchema), async (c) => {
    const created = await repository.create(c.get('validatedBody'));
    return success(c, toKnowledgePointDto(created, mastery), 201);
  });

  router.get('/:id', async (c) => {
    const id = c.req.param('id');
    const point = await repository.findById(id);
    if (!point) {
      throw new KnowledgePointNotFoundError(id);
    }
    return success(c, toKnowledgePointDto(point, mastery));
  });

  router.post('/:id/archive', async (c) => {
    const point = await repository.archive(c.req.param('id'));
    return success(c, toKnowledgePointDto(point, mastery));
  });

  router.post('/:id/unarchive', async (c) => {
    const point = await repository.unarchive(c.req.param('id'));
    return success(c, toKnowledgePointDto(point, mastery));
  });

  router.delete('/:id', async (c) => {
    const id = c.req.param('id');
    await repository.delete(id);
    return success(c, { id, deleted: true });
  });

  router.post('/:id/outcome', validate(practiceOutcomeSchema), async (c) => {
    const point = await repository.updateMastery(c.req.param('id'), c.get('validatedBody'));
    return success(c, toKnowledgePointDto(point, mastery));
  });

  return router;
}
