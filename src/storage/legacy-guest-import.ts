/**
 * Legacy Guest Import
 *
 * Older clients kept guest knowledge points as a JSON array of snake_case
 * dictionaries. Records of the newer format carry a negative numeric `id`
 * (and sometimes `isLocal` / `localId` markers); records of the oldest format
 * carry a string `id` and were never usable, so they are skipped.
 *
 * Imported records become ordinary Local Store entries awaiting promotion.
 * The temporary negative IDs are not identities and are dropped.
 */

import { z } from 'zod';
import type { KnowledgePoint } from '@/core/models';
import { clampMastery } from '@/core/mastery';
import type { LocalKnowledgePointRepository } from './repositories/local-knowledge-point.repository';

const nullableText = z.string().nullish().transform((value) => value ?? null);

/**
 * One guest record as written by the older client.
 */
export const legacyGuestRecordSchema = z.object({
  id: z.number().int().optional(),
  localId: z.string().optional(),
  isLocal: z.boolean().optional(),
  category: z.string().min(1),
  subcategory: z.string().nullish().transform((value) => value ?? ''),
  correct_phrase: z.string().trim().min(1),
  explanation: nullableText,
  user_context_sentence: nullableText,
  incorrect_phrase_in_context: nullableText,
  key_point_summary: nullableText,
  mastery_level: z.number().finite().default(0),
  mistake_count: z.number().int().nonnegative().default(0),
  correct_count: z.number().int().nonnegative().default(0),
  is_archived: z.boolean().default(false),
  ai_review_notes: nullableText,
});

export type LegacyGuestRecord = z.infer<typeof legacyGuestRecordSchema>;

export interface LegacyDecodeResult {
  points: KnowledgePoint[];
  /** Entries that were not objects, had a string ID or failed validation */
  skipped: number;
}

export interface LegacyImportResult {
  imported: number;
  skipped: number;
}

function toKnowledgePoint(record: LegacyGuestRecord, now: Date): KnowledgePoint {
  return {
    compositeId: null,
    legacyId: null,
    ancientId: null,
    origin: 'local',
    category: record.category,
    subcategory: record.subcategory,
    correctPhrase: record.correct_phrase,
    explanation: record.explanation,
    userContextSentence: record.user_context_sentence,
    incorrectPhraseInContext: record.incorrect_phrase_in_context,
    keyPointSummary: record.key_point_summary,
    masteryLevel: clampMastery(record.mastery_level),
    mistakeCount: record.mistake_count,
    correctCount: record.correct_count,
    reviewStreak: 0,
    nextReviewDate: now,
    lastAiReviewDate: null,
    aiReviewNotes: null,
    isArchived: record.is_archived,
  };
}

/**
 * Decodes the older client's guest array. Invalid entries are counted and
 * logged, never thrown.
 *
 * @throws z.ZodError when the input is not an array at all
 */
export function decodeLegacyGuestRecords(input: unknown, now: Date = new Date()): LegacyDecodeResult {
  const entries = z.array(z.unknown()).parse(input);
  const points: KnowledgePoint[] = [];
  let skipped = 0;

  entries.forEach((entry, index) => {
    if (typeof entry === 'object' && entry !== null && 'id' in entry && typeof entry.id === 'string') {
      skipped++;
      return;
    }
    const parsed = legacyGuestRecordSchema.safeParse(entry);
    if (!parsed.success) {
      console.warn(
        `[LegacyImport] Skipping entry ${index}: ${parsed.error.errors.map((e) => e.message).join(', ')}`
      );
      skipped++;
      return;
    }
    points.push(toKnowledgePoint(parsed.data, now));
  });

  return { points, skipped };
}

/**
 * Decodes the older client's guest array and saves every valid record in
 * the Local Store. Duplicates by (category, correctPhrase) collapse into one
 * record. The guest limit is not applied to imported data.
 */
export async function importLegacyGuestRecords(
  store: LocalKnowledgePointRepository,
  input: unknown,
  now: Date = new Date()
): Promise<LegacyImportResult> {
  const { points, skipped } = decodeLegacyGuestRecords(input, now);
  for (const point of points) {
    await store.save(point, { enforceQuota: false });
  }
  console.log(`[LegacyImport] Imported ${points.length} guest points (${skipped} skipped)`);
  return { imported: points.length, skipped };
}
