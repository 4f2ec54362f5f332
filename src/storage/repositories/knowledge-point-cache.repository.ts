/**
 * Knowledge Point Cache Repository
 *
 * Keeps the last successfully fetched copy of the remote store's lists so
 * that reads keep working while the remote store is unreachable. The cache
 * is a read-through snapshot: each list is replaced as a whole after a
 * successful fetch, and single entries are patched by optimistic updates.
 */

import { and, asc, eq, notInArray } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import {
  cachedKnowledgePoints,
  type CachedKnowledgePointPayload,
  type CachedKnowledgePointRow,
} from '../schema';
import type { KnowledgePoint } from '@/core/models';
import { effectiveId } from '@/core/identity';
import { clampMastery } from '@/core/mastery';
import { LocalPersistenceError } from '@/core/errors';

function toPayload(point: KnowledgePoint): CachedKnowledgePointPayload {
  return {
    compositeId: point.compositeId
      ? { ownerId: point.compositeId.ownerId, sequenceId: point.compositeId.sequenceId }
      : null,
    legacyId: point.legacyId,
    ancientId: point.ancientId,
    category: point.category,
    subcategory: point.subcategory,
    correctPhrase: point.correctPhrase,
    explanation: point.explanation,
    userContextSentence: point.userContextSentence,
    incorrectPhraseInContext: point.incorrectPhraseInContext,
    keyPointSummary: point.keyPointSummary,
    masteryLevel: point.masteryLevel,
    mistakeCount: point.mistakeCount,
    correctCount: point.correctCount,
    reviewStreak: point.reviewStreak,
    nextReviewDate: point.nextReviewDate?.getTime() ?? null,
    lastAiReviewDate: point.lastAiReviewDate?.getTime() ?? null,
    aiReviewNotes: point.aiReviewNotes,
    isArchived: point.isArchived,
  };
}

function mapToDomain(row: CachedKnowledgePointRow): KnowledgePoint {
  const payload = row.payload;
  return {
    compositeId: payload.compositeId,
    legacyId: payload.legacyId,
    ancientId: payload.ancientId,
    origin: 'remote',
    category: payload.category,
    subcategory: payload.subcategory,
    correctPhrase: payload.correctPhrase,
    explanation: payload.explanation,
    userContextSentence: payload.userContextSentence,
    incorrectPhraseInContext: payload.incorrectPhraseInContext,
    keyPointSummary: payload.keyPointSummary,
    masteryLevel: clampMastery(payload.masteryLevel),
    mistakeCount: payload.mistakeCount,
    correctCount: payload.correctCount,
    reviewStreak: payload.reviewStreak,
    nextReviewDate: payload.nextReviewDate === null ? null : new Date(payload.nextReviewDate),
    lastAiReviewDate: payload.lastAiReviewDate === null ? null : new Date(payload.lastAiReviewDate),
    aiReviewNotes: payload.aiReviewNotes,
    isArchived: row.isArchived,
  };
}

/**
 * Offline cache of remote knowledge points.
 *
 * @example
 * ```typescript
 * const cache = new KnowledgePointCacheRepository(db);
 *
 * await cache.replaceList(false, activePoints);
 * const offline = await cache.list(false);
 * ```
 */
export class KnowledgePointCacheRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Cached points of one list (active or archived), in server order.
   */
  async list(archived: boolean): Promise<KnowledgePoint[]> {
    try {
      const rows = await this.db
        .select()
        .from(cachedKnowledgePoints)
        .where(eq(cachedKnowledgePoints.isArchived, archived))
        .orderBy(asc(cachedKnowledgePoints.position));
      return rows.map(mapToDomain);
    } catch (error) {
      throw new LocalPersistenceError('cache read', error);
    }
  }

  async findById(id: string): Promise<KnowledgePoint | null> {
    try {
      const rows = await this.db
        .select()
        .from(cachedKnowledgePoints)
        .where(eq(cachedKnowledgePoints.effectiveId, id))
        .limit(1);
      return rows.length === 0 ? null : mapToDomain(rows[0]);
    } catch (error) {
      throw new LocalPersistenceError('cache read', error);
    }
  }

  /**
   * Replaces the cached copy of one list with a fresh fetch. Entries cached
   * under the other list keep their rows unless the fresh list claims them.
   */
  async replaceList(archived: boolean, points: KnowledgePoint[], at: Date = new Date()): Promise<void> {
    const ids = points.map((point) => effectiveId(point));
    try {
      this.db.transaction((tx) => {
        const stale = and(
          eq(cachedKnowledgePoints.isArchived, archived),
          ids.length > 0 ? notInArray(cachedKnowledgePoints.effectiveId, ids) : undefined
        );
        tx.delete(cachedKnowledgePoints).where(stale).run();

        points.forEach((point, position) => {
          const row = {
            effectiveId: ids[position],
            isArchived: archived,
            position,
            payload: toPayload({ ...point, isArchived: archived }),
            cachedAt: at,
          };
          tx.insert(cachedKnowledgePoints)
            .values(row)
            .onConflictDoUpdate({ target: cachedKnowledgePoints.effectiveId, set: row })
            .run();
        });
      });
    } catch (error) {
      throw new LocalPersistenceError('cache write', error);
    }
  }

  /**
   * Writes a single entry, keeping its position when it is already cached.
   */
  async put(point: KnowledgePoint, at: Date = new Date()): Promise<void> {
    const id = effectiveId(point);
    try {
      this.db.transaction((tx) => {
        const existing = tx
          .select({ position: cachedKnowledgePoints.position })
          .from(cachedKnowledgePoints)
          .where(eq(cachedKnowledgePoints.effectiveId, id))
          .get();
        const row = {
          effectiveId: id,
          isArchived: point.isArchived,
          position: existing?.position ?? Number.MAX_SAFE_INTEGER,
          payload: toPayload(point),
          cachedAt: at,
        };
        tx.insert(cachedKnowledgePoints)
          .values(row)
          .onConflictDoUpdate({ target: cachedKnowledgePoints.effectiveId, set: row })
          .run();
      });
    } catch (error) {
      throw new LocalPersistenceError('cache write', error);
    }
  }

  async remove(id: string): Promise<void> {
    try {
      await this.db.delete(cachedKnowledgePoints).where(eq(cachedKnowledgePoints.effectiveId, id));
    } catch (error) {
      throw new LocalPersistenceError('cache write', error);
    }
  }

  /** Drops every cached entry (sign-out) */
  async clear(): Promise<void> {
    try {
      await this.db.delete(cachedKnowledgePoints);
    } catch (error) {
      throw new LocalPersistenceError('cache write', error);
    }
  }
}
