/**
 * Sync Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { ReconciliationService, SyncCoordinator } from '@/core/sync';
 * ```
 */

export {
  ReconciliationService,
  type ReconciliationResult,
  type ReconcileOptions,
  type PromotionConflict,
  type PromotionConflictReason,
  type ReconciliationServiceDeps,
  type ReconciliationServiceOptions,
} from './reconciliation-service';

export {
  SyncCoordinator,
  NotAuthenticatedError,
  DEFAULT_FOREGROUND_THRESHOLD_MS,
  summarizeConflict,
  type SyncTrigger,
  type SyncRunSummary,
  type SyncStatus,
  type SyncConflictSummary,
  type SyncCoordinatorDeps,
  type SyncCoordinatorOptions,
} from './sync-coordinator';
