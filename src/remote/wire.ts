/**
 * Remote Wire Format
 *
 * zod schemas and converters between the remote store's snake_case JSON and
 * the domain model. Three generations of records are accepted:
 *
 * - current: `composite_id: {user_id, sequence_id}` (may also carry `legacy_id`)
 * - previous: `legacy_id` only
 * - oldest: a bare numeric `id`
 *
 * Records carrying the legacy "stored locally" note, or a negative bare `id`
 * (a guest placeholder), decode with `origin: 'local'`.
 */

import { z } from 'zod';
import {
  LEGACY_LOCAL_ONLY_NOTE,
  type CompositeKnowledgePointId,
  type KnowledgePoint,
} from '@/core/models';
import { clampMastery } from '@/core/mastery';
import { RemoteRejectedError } from '@/core/errors';
import type { RemoteCreateInput, RemoteMasteryUpdate } from './types';

// ============================================================================
// Schemas
// ============================================================================

export const wireCompositeIdSchema = z.object({
  user_id: z.number().int().nonnegative(),
  sequence_id: z.number().int().nonnegative(),
});

const optionalText = z.string().nullish().transform((value) => value ?? null);
const optionalCount = z.number().int().nonnegative().nullish().transform((value) => value ?? 0);

/**
 * A knowledge point as served by the remote store.
 */
export const wireKnowledgePointSchema = z.object({
  composite_id: wireCompositeIdSchema.nullish(),
  legacy_id: z.number().int().nullish(),
  id: z.number().int().nullish(),
  category: z.string(),
  subcategory: optionalText,
  correct_phrase: z.string().min(1),
  explanation: optionalText,
  user_context_sentence: optionalText,
  incorrect_phrase_in_context: optionalText,
  key_point_summary: optionalText,
  mastery_level: z.number().nullish(),
  mistake_count: optionalCount,
  correct_count: optionalCount,
  review_streak: optionalCount,
  next_review_date: optionalText,
  is_archived: z.boolean().nullish(),
  ai_review_notes: optionalText,
  last_ai_review_date: optionalText,
});

export type WireKnowledgePoint = z.infer<typeof wireKnowledgePointSchema>;

export const wireListResponseSchema = z.object({
  knowledge_points: z.array(z.unknown()),
});

export const wireCreateResponseSchema = z.object({
  composite_id: wireCompositeIdSchema,
});

// ============================================================================
// Decoding
// ============================================================================

/**
 * Parses a date string from the server. Unparseable values become null.
 */
function parseWireDate(value: string | null): Date | null {
  if (value === null || value.trim() === '') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function toCompositeId(
  wire: z.infer<typeof wireCompositeIdSchema> | null | undefined
): CompositeKnowledgePointId | null {
  return wire ? { ownerId: wire.user_id, sequenceId: wire.sequence_id } : null;
}

/**
 * Converts a validated wire record to a domain point.
 *
 * @param listArchived - Archive state implied by the list the record came from,
 *   used when the record does not say
 */
export function fromWire(wire: WireKnowledgePoint, listArchived = false): KnowledgePoint {
  const compositeId = toCompositeId(wire.composite_id);
  const legacyId = wire.legacy_id ?? null;
  const bareId = wire.id ?? null;
  const isGuestPlaceholder = compositeId === null && legacyId === null && bareId !== null && bareId < 0;
  const isLegacyLocal = wire.ai_review_notes === LEGACY_LOCAL_ONLY_NOTE;

  return {
    compositeId,
    legacyId,
    ancientId: isGuestPlaceholder ? null : bareId,
    origin: isGuestPlaceholder || isLegacyLocal ? 'local' : 'remote',
    category: wire.category,
    subcategory: wire.subcategory ?? '',
    correctPhrase: wire.correct_phrase,
    explanation: wire.explanation,
    userContextSentence: wire.user_context_sentence,
    incorrectPhraseInContext: wire.incorrect_phrase_in_context,
    keyPointSummary: wire.key_point_summary,
    masteryLevel: clampMastery(wire.mastery_level ?? 0),
    mistakeCount: wire.mistake_count,
    correctCount: wire.correct_count,
    reviewStreak: wire.review_streak,
    nextReviewDate: parseWireDate(wire.next_review_date),
    lastAiReviewDate: parseWireDate(wire.last_ai_review_date),
    aiReviewNotes: isLegacyLocal ? null : wire.ai_review_notes,
    isArchived: wire.is_archived ?? listArchived,
  };
}

/**
 * Decodes a `{knowledge_points: [...]}` body. Individual records that fail
 * validation are skipped and logged; a body of the wrong shape is a
 * rejection.
 *
 * @throws RemoteRejectedError when the body is not a list response
 */
export function decodeKnowledgePointList(body: unknown, listArchived: boolean): KnowledgePoint[] {
  const parsed = wireListResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new RemoteRejectedError(0, 'Malformed knowledge point list from remote store', {
      issues: parsed.error.errors,
    });
  }

  const points: KnowledgePoint[] = [];
  parsed.data.knowledge_points.forEach((raw, index) => {
    const record = wireKnowledgePointSchema.safeParse(raw);
    if (!record.success) {
      console.warn(
        `[RemoteStore] Skipping malformed knowledge point at index ${index}:`,
        record.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
      );
      return;
    }
    points.push(fromWire(record.data, listArchived));
  });
  return points;
}

/**
 * @throws RemoteRejectedError when the body carries no composite ID
 */
export function decodeCreateResponse(body: unknown): CompositeKnowledgePointId {
  const parsed = wireCreateResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new RemoteRejectedError(0, 'Create response did not include a composite_id', {
      issues: parsed.error.errors,
    });
  }
  return { ownerId: parsed.data.composite_id.user_id, sequenceId: parsed.data.composite_id.sequence_id };
}

// ============================================================================
// Encoding
// ============================================================================

function toWireDate(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function encodeCreateRequest(input: RemoteCreateInput) {
  return {
    category: input.category,
    subcategory: input.subcategory,
    correct_phrase: input.correctPhrase,
    explanation: input.explanation,
    user_context_sentence: input.userContextSentence,
    incorrect_phrase_in_context: input.incorrectPhraseInContext,
    key_point_summary: input.keyPointSummary,
    mastery_level: clampMastery(input.masteryLevel),
    mistake_count: input.mistakeCount,
    correct_count: input.correctCount,
    review_streak: input.reviewStreak,
    next_review_date: toWireDate(input.nextReviewDate),
    is_archived: input.isArchived,
  };
}

export function encodeMasteryUpdate(update: RemoteMasteryUpdate) {
  return {
    mastery_level: clampMastery(update.masteryLevel),
    mistake_count: update.mistakeCount,
    correct_count: update.correctCount,
    review_streak: update.reviewStreak,
    next_review_date: toWireDate(update.nextReviewDate),
  };
}
