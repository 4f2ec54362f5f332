/**
 * Mastery Types
 *
 * Vocabulary shared by the mastery engine, the repository facade and the
 * HTTP layer: the tier a score falls into, how severe a mistake was, and the
 * outcome of a single practice attempt.
 */

/** All tiers, weakest first */
export const MASTERY_TIERS = ['weak', 'medium', 'strong'] as const;

/**
 * Coarse bucket a mastery score falls into, used for filtering and display.
 */
export type MasteryTier = (typeof MASTERY_TIERS)[number];

export const MISTAKE_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

/**
 * How badly an answer missed. Drives the size of the mastery penalty.
 */
export type MistakeSeverity = (typeof MISTAKE_SEVERITIES)[number];

/**
 * The result of one practice attempt on a knowledge point.
 *
 * @example
 * ```typescript
 * const outcome: PracticeOutcome = { wasCorrect: false, severity: 'high' };
 * ```
 */
export interface PracticeOutcome {
  wasCorrect: boolean;
  /** Ignored for correct answers; treated as 'medium' when absent */
  severity?: MistakeSeverity;
}

/** Lower and upper bounds of the mastery scale */
export const MIN_MASTERY = 0;
export const MAX_MASTERY = 5;

/**
 * Clamps any incoming mastery value onto the 0.0-5.0 scale.
 * Non-finite input collapses to the minimum.
 */
export function clampMastery(value: number): number {
  if (!Number.isFinite(value)) {
    return MIN_MASTERY;
  }
  return Math.min(MAX_MASTERY, Math.max(MIN_MASTERY, value));
}
