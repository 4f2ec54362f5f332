/**
 * Repository Layer - Barrel Export
 *
 * Each repository wraps one table, maps rows to domain models and reports
 * database failures as LocalPersistenceError.
 *
 * @example
 * ```typescript
 * import {
 *   LocalKnowledgePointRepository,
 *   KnowledgePointCacheRepository,
 *   SyncStateRepository,
 * } from '@/storage/repositories';
 *
 * const localStore = new LocalKnowledgePointRepository(db, { maxGuestPoints: 20 });
 * const cache = new KnowledgePointCacheRepository(db);
 * const syncState = new SyncStateRepository(db);
 * ```
 */

export {
  LocalKnowledgePointRepository,
  DEFAULT_MAX_GUEST_POINTS,
  type LocalKnowledgePointRepositoryOptions,
  type LocalPromotionRecord,
  type SaveOptions,
} from './local-knowledge-point.repository';

export { KnowledgePointCacheRepository } from './knowledge-point-cache.repository';

export { SyncStateRepository, type SyncStateSnapshot } from './sync-state.repository';
