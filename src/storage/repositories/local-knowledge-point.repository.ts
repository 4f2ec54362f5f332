/**
 * Local Knowledge Point Repository
 *
 * Durable on-device storage for knowledge points created without
 * authentication. Records are keyed by their content, the pair
 * (category, correctPhrase), because they have no server identity yet.
 *
 * - Survives restarts and is readable with no network
 * - Writes are serialised; reads run freely
 * - Every failure of the underlying database surfaces as a
 *   LocalPersistenceError and leaves the prior state in place
 * - Decoded points always carry `origin: 'local'`
 *
 * Records leave this store in two ways: an explicit delete, or promotion to
 * the remote store (the reconciliation service removes the record once the
 * remote write has been confirmed).
 */

import { and, asc, count as countRows, eq, inArray } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { guestKnowledgePoints, type GuestKnowledgePointRow } from '../schema';
import { LEGACY_LOCAL_ONLY_NOTE, type KnowledgePoint } from '@/core/models';
import { clampMastery } from '@/core/mastery';
import { KeyedMutex } from '@/core/concurrency';
import {
  GuestQuotaExceededError,
  KnowledgePointError,
  LocalPersistenceError,
} from '@/core/errors';

/** Default guest limit, matching the free tier of the remote service */
export const DEFAULT_MAX_GUEST_POINTS = 20;

const WRITE_LOCK = 'local-store';

export interface LocalKnowledgePointRepositoryOptions {
  /** Maximum number of guest points; creation past it is rejected */
  maxGuestPoints?: number;
  /** Clock used for created/updated timestamps */
  now?: () => Date;
}

export interface SaveOptions {
  /**
   * Reject inserts once the guest limit is reached. Updates of an existing
   * record are always allowed. Defaults to true.
   */
  enforceQuota?: boolean;
}

/**
 * A stored point together with its promotion bookkeeping.
 */
export interface LocalPromotionRecord {
  point: KnowledgePoint;
  promotionAttempts: number;
  lastPromotionError: string | null;
  lastPromotionAttemptAt: Date | null;
  createdAt: Date;
}

/**
 * Maps a database row to a KnowledgePoint. Local rows never carry a server
 * identity, and the legacy "stored locally" note is dropped since the table
 * itself marks the origin.
 */
function mapToDomain(row: GuestKnowledgePointRow): KnowledgePoint {
  return {
    compositeId: null,
    legacyId: null,
    ancientId: null,
    origin: 'local',
    category: row.category,
    subcategory: row.subcategory,
    correctPhrase: row.correctPhrase,
    explanation: row.explanation,
    userContextSentence: row.userContextSentence,
    incorrectPhraseInContext: row.incorrectPhraseInContext,
    keyPointSummary: row.keyPointSummary,
    masteryLevel: clampMastery(row.masteryLevel),
    mistakeCount: row.mistakeCount,
    correctCount: row.correctCount,
    reviewStreak: row.reviewStreak,
    nextReviewDate: row.nextReviewDate,
    lastAiReviewDate: row.lastAiReviewDate,
    aiReviewNotes: row.aiReviewNotes === LEGACY_LOCAL_ONLY_NOTE ? null : row.aiReviewNotes,
    isArchived: row.isArchived,
  };
}

/**
 * Column values written for a point, shared by insert and update.
 */
function toColumns(point: KnowledgePoint) {
  return {
    category: point.category,
    subcategory: point.subcategory,
    correctPhrase: point.correctPhrase,
    explanation: point.explanation,
    userContextSentence: point.userContextSentence,
    incorrectPhraseInContext: point.incorrectPhraseInContext,
    keyPointSummary: point.keyPointSummary,
    masteryLevel: clampMastery(point.masteryLevel),
    mistakeCount: point.mistakeCount,
    correctCount: point.correctCount,
    reviewStreak: point.reviewStreak,
    nextReviewDate: point.nextReviewDate,
    lastAiReviewDate: point.lastAiReviewDate,
    aiReviewNotes: point.aiReviewNotes === LEGACY_LOCAL_ONLY_NOTE ? null : point.aiReviewNotes,
    isArchived: point.isArchived,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Repository for guest (local-only) knowledge points.
 *
 * @example
 * ```typescript
 * const store = new LocalKnowledgePointRepository(db, { maxGuestPoints: 20 });
 *
 * await store.save(createLocalKnowledgePoint({ category: 'Grammar', correctPhrase: 'went' }));
 * const points = await store.loadAll();
 * ```
 */
export class LocalKnowledgePointRepository {
  private readonly writes = new KeyedMutex();
  private readonly maxGuestPoints: number;
  private readonly now: () => Date;

  /**
   * @param db - The Drizzle database instance to use for queries
   */
  constructor(
    private readonly db: AppDatabase,
    options: LocalKnowledgePointRepositoryOptions = {}
  ) {
    this.maxGuestPoints = options.maxGuestPoints ?? DEFAULT_MAX_GUEST_POINTS;
    this.now = options.now ?? (() => new Date());
  }

  get guestLimit(): number {
    return this.maxGuestPoints;
  }

  /**
   * Inserts the point, or replaces the record with the same
   * (category, correctPhrase). Returns the stored point.
   *
   * @throws GuestQuotaExceededError when inserting past the guest limit
   * @throws LocalPersistenceError when the database write fails
   */
  async save(point: KnowledgePoint, options: SaveOptions = {}): Promise<KnowledgePoint> {
    const enforceQuota = options.enforceQuota ?? true;

    return this.write('save', () => {
      const timestamp = this.now();
      const columns = toColumns(point);

      return this.db.transaction((tx) => {
        const existing = tx
          .select({ id: guestKnowledgePoints.id })
          .from(guestKnowledgePoints)
          .where(this.contentMatches(point.category, point.correctPhrase))
          .get();

        if (existing) {
          const updated = tx
            .update(guestKnowledgePoints)
            .set({ ...columns, updatedAt: timestamp })
            .where(eq(guestKnowledgePoints.id, existing.id))
            .returning()
            .get();
          return mapToDomain(updated);
        }

        if (enforceQuota) {
          const total = tx.select({ value: countRows() }).from(guestKnowledgePoints).get();
          if ((total?.value ?? 0) >= this.maxGuestPoints) {
            throw new GuestQuotaExceededError(this.maxGuestPoints);
          }
        }

        const inserted = tx
          .insert(guestKnowledgePoints)
          .values({ ...columns, createdAt: timestamp, updatedAt: timestamp })
          .returning()
          .get();
        return mapToDomain(inserted);
      });
    });
  }

  /**
   * Every stored point, in insertion order.
   */
  async loadAll(): Promise<KnowledgePoint[]> {
    const rows = await this.read('loadAll', () =>
      this.db.select().from(guestKnowledgePoints).orderBy(asc(guestKnowledgePoints.id)).all()
    );
    return rows.map(mapToDomain);
  }

  async findByContent(category: string, correctPhrase: string): Promise<KnowledgePoint | null> {
    const row = await this.read('findByContent', () =>
      this.db
        .select()
        .from(guestKnowledgePoints)
        .where(this.contentMatches(category, correctPhrase))
        .get()
    );
    return row ? mapToDomain(row) : null;
  }

  async count(): Promise<number> {
    const result = await this.read('count', () =>
      this.db.select({ value: countRows() }).from(guestKnowledgePoints).get()
    );
    return result?.value ?? 0;
  }

  /**
   * Removes every record matching the predicate.
   *
   * @returns The number of records removed
   */
  async remove(predicate: (point: KnowledgePoint) => boolean): Promise<number> {
    return this.write('remove', () =>
      this.db.transaction((tx) => {
        const rows = tx.select().from(guestKnowledgePoints).all();
        const ids = rows.filter((row) => predicate(mapToDomain(row))).map((row) => row.id);
        if (ids.length === 0) {
          return 0;
        }
        tx.delete(guestKnowledgePoints).where(inArray(guestKnowledgePoints.id, ids)).run();
        return ids.length;
      })
    );
  }

  /**
   * Removes the record with the given content key.
   *
   * @returns true when a record was removed
   */
  async removeByContent(category: string, correctPhrase: string): Promise<boolean> {
    const result = await this.write('removeByContent', () =>
      this.db
        .delete(guestKnowledgePoints)
        .where(this.contentMatches(category, correctPhrase))
        .run()
    );
    return result.changes > 0;
  }

  /**
   * Notes a failed promotion attempt against the record. A record that has
   * disappeared in the meantime is ignored.
   */
  async recordPromotionFailure(
    category: string,
    correctPhrase: string,
    error: unknown,
    at: Date = this.now()
  ): Promise<void> {
    await this.write('recordPromotionFailure', () => {
      this.db.transaction((tx) => {
        const row = tx
          .select({ id: guestKnowledgePoints.id, attempts: guestKnowledgePoints.promotionAttempts })
          .from(guestKnowledgePoints)
          .where(this.contentMatches(category, correctPhrase))
          .get();
        if (!row) {
          return;
        }
        tx.update(guestKnowledgePoints)
          .set({
            promotionAttempts: row.attempts + 1,
            lastPromotionError: describeError(error),
            lastPromotionAttemptAt: at,
          })
          .where(eq(guestKnowledgePoints.id, row.id))
          .run();
      });
    });
  }

  /**
   * Stored points with their promotion bookkeeping, in insertion order.
   */
  async loadPromotionRecords(): Promise<LocalPromotionRecord[]> {
    const rows = await this.read('loadPromotionRecords', () =>
      this.db.select().from(guestKnowledgePoints).orderBy(asc(guestKnowledgePoints.id)).all()
    );
    return rows.map((row) => ({
      point: mapToDomain(row),
      promotionAttempts: row.promotionAttempts,
      lastPromotionError: row.lastPromotionError,
      lastPromotionAttemptAt: row.lastPromotionAttemptAt,
      createdAt: row.createdAt,
    }));
  }

  private contentMatches(category: string, correctPhrase: string) {
    return and(
      eq(guestKnowledgePoints.category, category),
      eq(guestKnowledgePoints.correctPhrase, correctPhrase)
    );
  }

  /**
   * Runs a write under the single-writer lock, translating database failures.
   */
  private write<T>(operation: string, fn: () => T): Promise<T> {
    return this.writes.run(WRITE_LOCK, async () => this.guard(operation, fn));
  }

  private async read<T>(operation: string, fn: () => T): Promise<T> {
    return this.guard(operation, fn);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof KnowledgePointError) {
        throw error;
      }
      console.error(`[LocalStore] ${operation} failed:`, error);
      throw new LocalPersistenceError(operation, error);
    }
  }
}
