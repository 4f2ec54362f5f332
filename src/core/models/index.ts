/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import type { KnowledgePoint, CompositeKnowledgePointId } from '@/core/models';
 * ```
 */

export {
  LEGACY_LOCAL_ONLY_NOTE,
  createLocalKnowledgePoint,
  supportsCloudActions,
  type CompositeKnowledgePointId,
  type KnowledgePointOrigin,
  type KnowledgePointContent,
  type KnowledgePointProgress,
  type KnowledgePoint,
  type NewKnowledgePointInput,
} from './knowledge-point';
