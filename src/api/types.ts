/**
 * API Types
 *
 * Response envelopes, request schemas and the JSON shape of a knowledge
 * point as the companion server returns it.
 *
 * @example
 * ```typescript
 * // Success response
 * const response: ApiResponse<KnowledgePointDto[]> = {
 *   success: true,
 *   data: [{ id: '7:3', category: 'Greetings', ... }],
 * };
 *
 * // Error response
 * const error: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'NOT_FOUND', message: "KnowledgePoint with ID '7:3' not found" },
 * };
 * ```
 */

import { z } from 'zod';
import { supportsCloudActions, type KnowledgePoint, type KnowledgePointOrigin } from '@/core/models';
import { effectiveId } from '@/core/identity';
import { MASTERY_TIERS, MISTAKE_SEVERITIES, type MasteryEngine, type MasteryTier } from '@/core/mastery';
import { summarizeConflict, type SyncConflictSummary, type SyncRunSummary, type SyncStatus } from '@/core/sync';

// ============================================================================
// Response Envelopes
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable error code, e.g. 'NOT_FOUND' or 'GUEST_QUOTA_EXCEEDED' */
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

export interface ValidationErrorDetail {
  /** Dot-separated path of the offending field */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

export const createKnowledgePointSchema = z.object({
  category: z.string().max(200, 'Category must be 200 characters or less'),
  subcategory: z.string().max(200).optional(),
  correctPhrase: z
    .string()
    .trim()
    .min(1, 'Correct phrase is required')
    .max(1000, 'Correct phrase must be 1000 characters or less'),
  explanation: z.string().max(5000).nullable().optional(),
  userContextSentence: z.string().max(2000).nullable().optional(),
  incorrectPhraseInContext: z.string().max(1000).nullable().optional(),
  keyPointSummary: z.string().max(1000).nullable().optional(),
  masteryLevel: z.number().min(0).max(5).optional(),
});

export type CreateKnowledgePointInput = z.infer<typeof createKnowledgePointSchema>;

export const practiceOutcomeSchema = z
  .object({
    wasCorrect: z.boolean(),
    severity: z.enum(MISTAKE_SEVERITIES).optional(),
  })
  .refine((outcome) => !outcome.wasCorrect || outcome.severity === undefined, {
    message: 'Severity only applies to incorrect answers',
    path: ['severity'],
  });

export type PracticeOutcomeInput = z.infer<typeof practiceOutcomeSchema>;

export const knowledgePointQuerySchema = z.object({
  tier: z.enum(MASTERY_TIERS).optional(),
  category: z.string().optional(),
  sort: z.enum(['mastery', 'nextReview', 'category']).optional(),
  /** Only points due now */
  due: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type KnowledgePointQuery = z.infer<typeof knowledgePointQuerySchema>;

export const signInSchema = z.object({
  token: z.string().trim().min(1, 'Token is required'),
});

export type SignInInput = z.infer<typeof signInSchema>;

// ============================================================================
// Response Shapes
// ============================================================================

/**
 * A knowledge point as JSON: dates as ISO strings, plus its effective ID
 * and mastery tier.
 */
export interface KnowledgePointDto {
  id: string;
  origin: KnowledgePointOrigin;
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
  tier: MasteryTier;
  mistakeCount: number;
  correctCount: number;
  reviewStreak: number;
  nextReviewDate: string | null;
  lastAiReviewDate: string | null;
  aiReviewNotes: string | null;
  isArchived: boolean;
  /** Whether cloud-only actions apply (promoted points only) */
  cloudActionsAvailable: boolean;
}

export function toKnowledgePointDto(point: KnowledgePoint, engine: MasteryEngine): KnowledgePointDto {
  return {
    id: effectiveId(point),
    origin: point.origin,
    compositeId: point.compositeId ? { ...point.compositeId } : null,
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
    tier: engine.tierFor(point.masteryLevel),
    mistakeCount: point.mistakeCount,
    correctCount: point.correctCount,
    reviewStreak: point.reviewStreak,
    nextReviewDate: point.nextReviewDate?.toISOString() ?? null,
    lastAiReviewDate: point.lastAiReviewDate?.toISOString() ?? null,
    aiReviewNotes: point.aiReviewNotes,
    isArchived: point.isArchived,
    cloudActionsAvailable: supportsCloudActions(point),
  };
}

export interface SyncRunDto {
  trigger: SyncRunSummary['trigger'];
  startedAt: string;
  finishedAt: string;
  promotedIds: string[];
  conflicts: SyncConflictSummary[];
  skipped: number;
  cancelled: boolean;
}

export interface SyncStatusDto {
  isSyncing: boolean;
  isAuthenticated: boolean;
  pendingCount: number;
  lastRunAt: string | null;
  lastSuccessAt: string | null;
  lastConflicts: SyncConflictSummary[];
  lastError: string | null;
}

export function toSyncRunDto(run: SyncRunSummary): SyncRunDto {
  return {
    trigger: run.trigger,
    startedAt: run.startedAt.toISOString(),
    finishedAt: run.finishedAt.toISOString(),
    promotedIds: run.promoted.map(effectiveId),
    conflicts: run.conflicts.map(summarizeConflict),
    skipped: run.skipped,
    cancelled: run.cancelled,
  };
}

export function toSyncStatusDto(status: SyncStatus): SyncStatusDto {
  return {
    ...status,
    lastRunAt: status.lastRunAt?.toISOString() ?? null,
    lastSuccessAt: status.lastSuccessAt?.toISOString() ?? null,
  };
}
