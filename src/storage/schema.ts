/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema for the on-device SQLite database. Three tables:
 *
 * - guest_knowledge_points: points created without authentication, waiting
 *   to be promoted to the remote store. Keyed by (category, correct_phrase).
 * - cached_knowledge_points: last known copy of remote points, read when the
 *   remote store is unreachable.
 * - sync_state: bookkeeping for the reconciliation triggers.
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';

/**
 * Guest Knowledge Points Table
 *
 * Every row here is local-origin by construction; the table itself is the
 * marker. A row is deleted once its promotion to the remote store has been
 * confirmed.
 */
export const guestKnowledgePoints = sqliteTable(
  'guest_knowledge_points',
  {
    // Insertion order; never exposed as an identity
    id: integer('id').primaryKey({ autoIncrement: true }),

    category: text('category').notNull(),
    subcategory: text('subcategory').notNull().default(''),
    correctPhrase: text('correct_phrase').notNull(),
    explanation: text('explanation'),
    userContextSentence: text('user_context_sentence'),
    incorrectPhraseInContext: text('incorrect_phrase_in_context'),
    keyPointSummary: text('key_point_summary'),

    // Progress (0.0-5.0 scale)
    masteryLevel: real('mastery_level').notNull().default(0),
    mistakeCount: integer('mistake_count').notNull().default(0),
    correctCount: integer('correct_count').notNull().default(0),
    reviewStreak: integer('review_streak').notNull().default(0),
    nextReviewDate: integer('next_review_date', { mode: 'timestamp_ms' }),
    lastAiReviewDate: integer('last_ai_review_date', { mode: 'timestamp_ms' }),
    aiReviewNotes: text('ai_review_notes'),

    isArchived: integer('is_archived', { mode: 'boolean' }).notNull().default(false),

    // Promotion bookkeeping
    promotionAttempts: integer('promotion_attempts').notNull().default(0),
    lastPromotionError: text('last_promotion_error'),
    lastPromotionAttemptAt: integer('last_promotion_attempt_at', { mode: 'timestamp_ms' }),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('guest_knowledge_points_content_idx').on(table.category, table.correctPhrase),
  ]
);

/**
 * Shape of a cached remote point, as written by the cache repository.
 * Dates are stored as epoch milliseconds inside the JSON payload.
 */
export interface CachedKnowledgePointPayload {
  compositeId: { ownerId: number; sequenceId: number } | null;
  legacyId: number | null;
  ancientId: number | null;
  category: string;
  subcategory: string;
  correctPhrase: string;
  explanation: string | null;
  userContextSentence: string | null;
  incorrectPhraseInContext: string | null;
  keyPointSummary: string | null;
  masteryLevel: number;
  mistakeCount: number;
  correctCount: number;
  reviewStreak: number;
  nextReviewDate: number | null;
  lastAiReviewDate: number | null;
  aiReviewNotes: string | null;
  isArchived: boolean;
}

/**
 * Cached Knowledge Points Table
 *
 * Snapshot of the remote store's active and archived lists, keyed by
 * effective ID. Replaced wholesale after each successful fetch.
 */
export const cachedKnowledgePoints = sqliteTable(
  'cached_knowledge_points',
  {
    effectiveId: text('effective_id').primaryKey(),
    isArchived: integer('is_archived', { mode: 'boolean' }).notNull(),
    // Position within the remote list, so cached reads keep server order
    position: integer('position').notNull(),
    payload: text('payload', { mode: 'json' }).$type<CachedKnowledgePointPayload>().notNull(),
    cachedAt: integer('cached_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('cached_knowledge_points_archived_idx').on(table.isArchived)]
);

/**
 * Sync State Table
 *
 * Single-row table (id = 'reconciliation') recording when reconciliation last
 * ran and last completed without conflicts.
 */
export const syncState = sqliteTable('sync_state', {
  id: text('id').primaryKey(),
  lastRunAt: integer('last_run_at', { mode: 'timestamp_ms' }),
  lastSuccessAt: integer('last_success_at', { mode: 'timestamp_ms' }),
});

export type GuestKnowledgePointRow = typeof guestKnowledgePoints.$inferSelect;
export type NewGuestKnowledgePointRow = typeof guestKnowledgePoints.$inferInsert;
export type CachedKnowledgePointRow = typeof cachedKnowledgePoints.$inferSelect;
export type SyncStateRow = typeof syncState.$inferSelect;
