/**
 * KnowledgePoint Domain Types
 *
 * A KnowledgePoint records one mistake the learner made together with its
 * corrected form. It is tracked over time through a mastery score on a fixed
 * 0.0-5.0 scale and a review schedule.
 *
 * A point can carry up to three identifier shapes, depending on which schema
 * produced it:
 *
 * 1. A composite identifier `{ownerId, sequenceId}` assigned by the server
 * 2. A legacy numeric identifier from the previous server schema
 * 3. An ancient numeric identifier (the bare `id` field of the oldest API)
 *
 * Points created while the user is unauthenticated carry none of them and
 * live only in the on-device store until they are promoted. Call sites never
 * inspect these fields directly; they go through the identity resolver in
 * `@/core/identity`.
 *
 * This module contains only types and constants with no runtime dependencies.
 */

/**
 * Server-assigned identity of a knowledge point.
 * Canonical string form is `"{ownerId}:{sequenceId}"`.
 */
export interface CompositeKnowledgePointId {
  /** ID of the user who owns the point */
  ownerId: number;
  /** Per-owner sequence number */
  sequenceId: number;
}

/**
 * Where the authoritative copy of a point lives.
 *
 * - 'local': created on-device without authentication, awaiting promotion
 * - 'remote': owned by the remote store; all writes go through it
 */
export type KnowledgePointOrigin = 'local' | 'remote';

/**
 * Marker older clients wrote into `aiReviewNotes` to flag local-only records
 * ("stored locally"). Decoders translate it into `origin: 'local'` and
 * promotion clears it.
 */
export const LEGACY_LOCAL_ONLY_NOTE = '本地儲存';

/**
 * The learner-facing content of a knowledge point.
 */
export interface KnowledgePointContent {
  /** Broad error category (e.g. "Grammar") */
  category: string;
  /** Finer-grained error type within the category */
  subcategory: string;
  /** The corrected phrase. Never empty; the fallback basis for identity. */
  correctPhrase: string;
  /** Why the original phrase was wrong */
  explanation: string | null;
  /** The sentence the learner originally produced */
  userContextSentence: string | null;
  /** The erroneous fragment inside `userContextSentence` */
  incorrectPhraseInContext: string | null;
  /** Short generated label for the point */
  keyPointSummary: string | null;
}

/**
 * Learning progress for a knowledge point.
 */
export interface KnowledgePointProgress {
  /** Mastery score, always within [0.0, 5.0] */
  masteryLevel: number;
  /** Number of incorrect answers recorded */
  mistakeCount: number;
  /** Number of correct answers recorded */
  correctCount: number;
  /** Consecutive correct answers since the last mistake */
  reviewStreak: number;
  /** When the point should next be reviewed */
  nextReviewDate: Date | null;
  /** When the remote grading service last reviewed the point */
  lastAiReviewDate: Date | null;
  /** Free-text notes from the remote grading service */
  aiReviewNotes: string | null;
}

/**
 * A knowledge point as seen by every layer above the stores.
 *
 * @example
 * ```typescript
 * const point: KnowledgePoint = {
 *   compositeId: { ownerId: 7, sequenceId: 42 },
 *   legacyId: null,
 *   ancientId: null,
 *   origin: 'remote',
 *   category: 'Grammar',
 *   subcategory: 'Tense',
 *   correctPhrase: 'I have been studying',
 *   explanation: 'Present perfect continuous for an ongoing action',
 *   userContextSentence: 'I am studying English since 2019.',
 *   incorrectPhraseInContext: 'I am studying',
 *   keyPointSummary: 'Present perfect continuous',
 *   masteryLevel: 2.5,
 *   mistakeCount: 1,
 *   correctCount: 4,
 *   reviewStreak: 2,
 *   nextReviewDate: new Date('2024-03-02T09:00:00Z'),
 *   lastAiReviewDate: null,
 *   aiReviewNotes: null,
 *   isArchived: false,
 * };
 * ```
 */
export interface KnowledgePoint extends KnowledgePointContent, KnowledgePointProgress {
  compositeId: CompositeKnowledgePointId | null;
  legacyId: number | null;
  ancientId: number | null;
  origin: KnowledgePointOrigin;
  /** Archived points are hidden from the active view but kept */
  isArchived: boolean;
}

/**
 * Content accepted when creating a new knowledge point.
 * Only `category` and `correctPhrase` are required.
 */
export interface NewKnowledgePointInput {
  category: string;
  subcategory?: string;
  correctPhrase: string;
  explanation?: string | null;
  userContextSentence?: string | null;
  incorrectPhraseInContext?: string | null;
  keyPointSummary?: string | null;
  masteryLevel?: number;
}

/**
 * Builds a fresh, unidentified local point from creation input.
 * Progress starts at zero and the point is immediately due.
 */
export function createLocalKnowledgePoint(
  input: NewKnowledgePointInput,
  now: Date = new Date()
): KnowledgePoint {
  return {
    compositeId: null,
    legacyId: null,
    ancientId: null,
    origin: 'local',
    category: input.category,
    subcategory: input.subcategory ?? '',
    correctPhrase: input.correctPhrase,
    explanation: input.explanation ?? null,
    userContextSentence: input.userContextSentence ?? null,
    incorrectPhraseInContext: input.incorrectPhraseInContext ?? null,
    keyPointSummary: input.keyPointSummary ?? null,
    masteryLevel: input.masteryLevel ?? 0,
    mistakeCount: 0,
    correctCount: 0,
    reviewStreak: 0,
    nextReviewDate: now,
    lastAiReviewDate: null,
    aiReviewNotes: null,
    isArchived: false,
  };
}

/**
 * Cloud-only actions (generated re-review, remote archive history) are
 * unavailable until a local point has been promoted.
 */
export function supportsCloudActions(point: KnowledgePoint): boolean {
  return point.origin === 'remote';
}
