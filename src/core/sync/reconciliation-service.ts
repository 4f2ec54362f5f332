/**
 * Reconciliation Service - Local to Remote Promotion
 *
 * Folds local-only knowledge points into the remote store once the user is
 * authenticated. For each local point:
 *
 * 1. Skip it when the Local Store no longer holds it (already promoted or
 *    deleted since the caller took its snapshot).
 * 2. Adopt an existing remote point with the same (category, correctPhrase),
 *    or one this service created earlier whose local copy could not be
 *    deleted, instead of creating a second copy. Either must still be in the
 *    current remote lists.
 * 3. Otherwise create it remotely and receive its composite ID.
 * 4. Once the remote side is confirmed, delete the local record.
 *
 * Failures leave the local record untouched, note the attempt in the Local
 * Store's promotion bookkeeping and come back as conflicts; the next trigger
 * retries them. There is no scalar merge between stores: after promotion the
 * remote copy is authoritative.
 *
 * Runs are serialised. A run checks its AbortSignal between points, so a
 * cancelled run never leaves a point half promoted.
 */

import type { CompositeKnowledgePointId, KnowledgePoint } from '../models';
import { LEGACY_LOCAL_ONLY_NOTE } from '../models';
import { assertResolvable, compositeIdsEqual, contentFingerprint, effectiveId } from '../identity';
import {
  IdentityUnresolvableError,
  RemoteRejectedError,
  RemoteUnreachableError,
} from '../errors';
import { CancelledError, KeyedMutex, delay } from '../concurrency';
import type { LocalKnowledgePointRepository } from '@/storage/repositories';
import { toRemoteCreateInput, type RemoteStore } from '@/remote';

// ============================================================================
// Types
// ============================================================================

/**
 * Why a point could not be promoted.
 */
export type PromotionConflictReason =
  | 'remote-unreachable'
  | 'remote-rejected'
  | 'local-failure'
  | 'identity-unresolvable';

export interface PromotionConflict {
  /** The local point as it was when promotion was attempted */
  point: KnowledgePoint;
  effectiveId: string;
  reason: PromotionConflictReason;
  error: Error;
}

export interface ReconciliationResult {
  /** Points now owned by the remote store, created or adopted during this run */
  promoted: KnowledgePoint[];
  /** Remote-origin inputs, returned unchanged */
  passedThrough: KnowledgePoint[];
  /** Local points that stay local until a later run */
  conflicts: PromotionConflict[];
  /** Local points no longer present in the Local Store */
  skipped: KnowledgePoint[];
  /** True when the run stopped early because its signal aborted */
  cancelled: boolean;
}

export interface ReconcileOptions {
  signal?: AbortSignal;
}

export interface ReconciliationServiceDeps {
  localStore: LocalKnowledgePointRepository;
  remoteStore: RemoteStore;
  /**
   * Per-point lock shared with the repository facade, so a promotion and a
   * user mutation of the same point never interleave.
   */
  pointLocks?: KeyedMutex;
}

export interface ReconciliationServiceOptions {
  /** Pause between remote create calls, in milliseconds */
  promotionDelayMs?: number;
  now?: () => Date;
}

const RUN_LOCK = 'reconciliation';

// ============================================================================
// Service
// ============================================================================

/**
 * @example
 * ```typescript
 * const service = new ReconciliationService({ localStore, remoteStore });
 *
 * const result = await service.reconcile(await localStore.loadAll(), remotePoints);
 * console.log(`${result.promoted.length} promoted, ${result.conflicts.length} left for retry`);
 * ```
 */
export class ReconciliationService {
  private readonly localStore: LocalKnowledgePointRepository;
  private readonly remoteStore: RemoteStore;
  private readonly pointLocks: KeyedMutex;
  private readonly runs = new KeyedMutex();
  private readonly promotionDelayMs: number;
  private readonly now: () => Date;

  /**
   * Composite IDs created remotely whose local copy has not been deleted
   * yet, by content fingerprint. An entry lives from the remote create until
   * the local delete succeeds.
   */
  private readonly promotedByContent = new Map<string, CompositeKnowledgePointId>();

  constructor(deps: ReconciliationServiceDeps, options: ReconciliationServiceOptions = {}) {
    this.localStore = deps.localStore;
    this.remoteStore = deps.remoteStore;
    this.pointLocks = deps.pointLocks ?? new KeyedMutex();
    this.promotionDelayMs = options.promotionDelayMs ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Promotes every local-origin point among the inputs.
   *
   * @param localPoints - Snapshot of the Local Store
   * @param remotePoints - Current remote lists (active and archived), used
   *   for adoption and passed through
   */
  async reconcile(
    localPoints: KnowledgePoint[],
    remotePoints: KnowledgePoint[],
    options: ReconcileOptions = {}
  ): Promise<ReconciliationResult> {
    return this.runs.run(RUN_LOCK, () => this.runReconciliation(localPoints, remotePoints, options));
  }

  /**
   * Drops every remembered promotion. Called when the user signs out, since
   * the IDs belong to that account.
   */
  forgetPromotions(): void {
    this.promotedByContent.clear();
  }

  private async runReconciliation(
    localPoints: KnowledgePoint[],
    remotePoints: KnowledgePoint[],
    { signal }: ReconcileOptions
  ): Promise<ReconciliationResult> {
    const all = [...remotePoints, ...localPoints];
    const candidates = all.filter((point) => point.origin === 'local');
    const passedThrough = all.filter((point) => point.origin !== 'local');

    const remoteByContent = new Map<string, KnowledgePoint>();
    for (const point of passedThrough) {
      const key = contentFingerprint(point.category, point.correctPhrase);
      if (!remoteByContent.has(key)) {
        remoteByContent.set(key, point);
      }
    }

    const result: ReconciliationResult = {
      promoted: [],
      passedThrough,
      conflicts: [],
      skipped: [],
      cancelled: false,
    };

    if (candidates.length > 0) {
      console.log(`[Reconciliation] Promoting ${candidates.length} local knowledge points`);
    }

    let remoteCalls = 0;
    for (const candidate of candidates) {
      if (signal?.aborted) {
        result.cancelled = true;
        break;
      }

      const key = contentFingerprint(candidate.category, candidate.correctPhrase);
      const adoptable = remoteByContent.get(key) ?? this.rememberedPromotion(key, passedThrough);

      if (!adoptable && remoteCalls > 0 && this.promotionDelayMs > 0) {
        try {
          await delay(this.promotionDelayMs, signal);
        } catch (error) {
          if (error instanceof CancelledError) {
            result.cancelled = true;
            break;
          }
          throw error;
        }
      }

      const outcome = await this.pointLocks.run(effectiveId(candidate), () =>
        this.promoteOne(candidate, key, adoptable)
      );
      switch (outcome.kind) {
        case 'promoted':
          if (outcome.remoteCall) {
            remoteCalls++;
          }
          result.promoted.push(outcome.point);
          remoteByContent.set(key, outcome.point);
          break;
        case 'skipped':
          result.skipped.push(candidate);
          break;
        case 'conflict':
          if (outcome.remoteCall) {
            remoteCalls++;
          }
          result.conflicts.push(outcome.conflict);
          break;
      }
    }

    console.log(
      `[Reconciliation] Done: ${result.promoted.length} promoted, ${result.conflicts.length} conflicts, ` +
        `${result.skipped.length} skipped${result.cancelled ? ' (cancelled)' : ''}`
    );
    return result;
  }

  private async promoteOne(
    candidate: KnowledgePoint,
    key: string,
    adoptable: KnowledgePoint | undefined
  ): Promise<PromotionOutcome> {
    let remoteCall = false;
    try {
      assertResolvable(candidate);

      const current = await this.localStore.findByContent(candidate.category, candidate.correctPhrase);
      if (!current) {
        return { kind: 'skipped' };
      }

      let promoted: KnowledgePoint;
      if (adoptable) {
        promoted = adoptable;
      } else {
        remoteCall = true;
        const compositeId = await this.remoteStore.createKnowledgePoint(toRemoteCreateInput(current));
        this.promotedByContent.set(key, compositeId);
        promoted = toPromoted(current, compositeId);
      }

      await this.localStore.removeByContent(candidate.category, candidate.correctPhrase);
      this.promotedByContent.delete(key);
      return { kind: 'promoted', point: promoted, remoteCall };
    } catch (error) {
      const conflict = toConflict(candidate, error);
      console.warn(
        `[Reconciliation] Could not promote '${conflict.effectiveId}' (${conflict.reason}): ${conflict.error.message}`
      );
      await this.notePromotionFailure(candidate, conflict.error);
      return { kind: 'conflict', conflict, remoteCall };
    }
  }

  /**
   * The remote copy of a point this service created earlier, when the
   * remote lists still hold it. A remembered ID missing from the lists was
   * deleted remotely and is forgotten, so the point is created again.
   */
  private rememberedPromotion(key: string, remotePoints: KnowledgePoint[]): KnowledgePoint | undefined {
    const compositeId = this.promotedByContent.get(key);
    if (!compositeId) {
      return undefined;
    }
    const remote = remotePoints.find((point) => compositeIdsEqual(point.compositeId, compositeId));
    if (!remote) {
      this.promotedByContent.delete(key);
      return undefined;
    }
    return remote;
  }

  private async notePromotionFailure(point: KnowledgePoint, error: Error): Promise<void> {
    try {
      await this.localStore.recordPromotionFailure(
        point.category,
        point.correctPhrase,
        error,
        this.now()
      );
    } catch (bookkeepingError) {
      console.error('[Reconciliation] Failed to record promotion failure:', bookkeepingError);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

type PromotionOutcome =
  | { kind: 'promoted'; point: KnowledgePoint; remoteCall: boolean }
  | { kind: 'skipped' }
  | { kind: 'conflict'; conflict: PromotionConflict; remoteCall: boolean };

function toPromoted(local: KnowledgePoint, compositeId: CompositeKnowledgePointId): KnowledgePoint {
  return {
    ...local,
    compositeId,
    legacyId: null,
    ancientId: null,
    origin: 'remote',
    aiReviewNotes: local.aiReviewNotes === LEGACY_LOCAL_ONLY_NOTE ? null : local.aiReviewNotes,
  };
}

function toConflict(point: KnowledgePoint, error: unknown): PromotionConflict {
  const normalized = error instanceof Error ? error : new Error(String(error));
  return {
    point,
    effectiveId: effectiveId(point),
    reason: reasonFor(normalized),
    error: normalized,
  };
}

function reasonFor(error: Error): PromotionConflictReason {
  if (error instanceof RemoteUnreachableError) {
    return 'remote-unreachable';
  }
  if (error instanceof RemoteRejectedError) {
    return 'remote-rejected';
  }
  if (error instanceof IdentityUnresolvableError) {
    return 'identity-unresolvable';
  }
  return 'local-failure';
}

