/**
 * Knowledge Points Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { KnowledgePointRepository, type KnowledgePointFilter } from '@/core/knowledge-points';
 * ```
 */

export {
  KnowledgePointRepository,
  type KnowledgePointRepositoryDeps,
} from './knowledge-point-repository';

export {
  mergeByEffectiveId,
  filterPoints,
  sortPoints,
  summarize,
  type KnowledgePointFilter,
  type KnowledgePointSort,
  type KnowledgePointSummary,
} from './read-model';
