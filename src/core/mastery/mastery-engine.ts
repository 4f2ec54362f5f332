/**
 * Mastery Engine - Score and Review Scheduling
 *
 * Turns practice outcomes into mastery changes and the next review date.
 * The engine is a pure function of (point, outcome, now): it never touches a
 * store and never reads the clock after `now` has been supplied.
 *
 * Scoring:
 * - Correct answers add a fixed gain and extend the review interval
 *   exponentially with the current streak (1, 2, 4, 8 ... days, capped).
 * - Incorrect answers subtract a penalty scaled by severity, reset the
 *   streak and bring the point back after a short lapse interval.
 *
 * Every resulting score is clamped to the 0.0-5.0 scale.
 */

import type { KnowledgePoint, KnowledgePointProgress } from '../models';
import {
  clampMastery,
  type MasteryTier,
  type MistakeSeverity,
  type PracticeOutcome,
} from './types';

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

/**
 * Tunable constants of the mastery engine.
 */
export interface MasteryEngineConfig {
  /** Mastery added for a correct answer */
  correctGain: number;
  /** Mastery removed for an incorrect answer, by severity */
  severityPenalty: Record<MistakeSeverity, number>;
  /** Review interval after the first correct answer in a streak, in days */
  baseIntervalDays: number;
  /** Multiplier applied to the interval for each further correct answer */
  growthFactor: number;
  /** Longest interval a streak can reach, in days */
  maxIntervalDays: number;
  /** Delay before a missed point is due again, in minutes */
  lapseIntervalMinutes: number;
  /** Scores below this are 'weak' */
  mediumThreshold: number;
  /** Scores at or above this are 'strong' */
  strongThreshold: number;
}

export const DEFAULT_MASTERY_CONFIG: MasteryEngineConfig = {
  correctGain: 0.5,
  severityPenalty: {
    low: 0.25,
    medium: 0.5,
    high: 0.75,
    critical: 1.0,
  },
  baseIntervalDays: 1,
  growthFactor: 2,
  maxIntervalDays: 180,
  lapseIntervalMinutes: 10,
  mediumThreshold: 1.5,
  strongThreshold: 3.5,
};

/**
 * Thrown when a MasteryEngine is constructed with unusable constants.
 */
export class MasteryConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MasteryConfigError';
  }
}

/**
 * MasteryEngine applies practice outcomes to knowledge points.
 *
 * @example
 * ```typescript
 * const engine = new MasteryEngine();
 *
 * const updated = engine.applyOutcome(point, { wasCorrect: true });
 * engine.tierFor(updated.masteryLevel); // 'medium'
 *
 * if (engine.isDue(updated)) {
 *   // queue the point for practice
 * }
 * ```
 */
export class MasteryEngine {
  private readonly config: MasteryEngineConfig;

  /**
   * @param config - Optional partial configuration merged over the defaults
   * @throws MasteryConfigError when a constant is out of range
   */
  constructor(config?: Partial<MasteryEngineConfig>) {
    this.config = {
      ...DEFAULT_MASTERY_CONFIG,
      ...config,
      severityPenalty: {
        ...DEFAULT_MASTERY_CONFIG.severityPenalty,
        ...config?.severityPenalty,
      },
    };
    validateConfig(this.config);
  }

  /**
   * Returns a copy of the point with the outcome applied.
   *
   * @param now - Reference time for the next review date (read once by default)
   */
  applyOutcome<T extends KnowledgePointProgress>(
    point: T,
    outcome: PracticeOutcome,
    now: Date = new Date()
  ): T {
    if (outcome.wasCorrect) {
      const reviewStreak = point.reviewStreak + 1;
      return {
        ...point,
        correctCount: point.correctCount + 1,
        reviewStreak,
        masteryLevel: clampMastery(point.masteryLevel + this.config.correctGain),
        nextReviewDate: new Date(now.getTime() + this.intervalForStreak(reviewStreak)),
      };
    }

    const penalty = this.config.severityPenalty[outcome.severity ?? 'medium'];
    return {
      ...point,
      mistakeCount: point.mistakeCount + 1,
      reviewStreak: 0,
      masteryLevel: clampMastery(point.masteryLevel - penalty),
      nextReviewDate: new Date(now.getTime() + this.config.lapseIntervalMinutes * MS_PER_MINUTE),
    };
  }

  /**
   * Review interval in milliseconds for a streak of the given length.
   * A streak of 1 yields the base interval.
   */
  intervalForStreak(streak: number): number {
    const exponent = Math.max(0, streak - 1);
    const days = Math.min(
      this.config.maxIntervalDays,
      this.config.baseIntervalDays * Math.pow(this.config.growthFactor, exponent)
    );
    return days * MS_PER_DAY;
  }

  tierFor(masteryLevel: number): MasteryTier {
    const level = clampMastery(masteryLevel);
    if (level < this.config.mediumThreshold) {
      return 'weak';
    }
    if (level < this.config.strongThreshold) {
      return 'medium';
    }
    return 'strong';
  }

  /**
   * Whether a point should be practised at `now`.
   * Points with no review date are always due; archived points never are.
   */
  isDue(
    point: Pick<KnowledgePoint, 'nextReviewDate' | 'isArchived'>,
    now: Date = new Date()
  ): boolean {
    if (point.isArchived) {
      return false;
    }
    if (point.nextReviewDate === null) {
      return true;
    }
    return point.nextReviewDate.getTime() <= now.getTime();
  }

  getConfig(): MasteryEngineConfig {
    return { ...this.config, severityPenalty: { ...this.config.severityPenalty } };
  }
}

function validateConfig(config: MasteryEngineConfig): void {
  const nonNegative: Array<[string, number]> = [
    ['correctGain', config.correctGain],
    ['lapseIntervalMinutes', config.lapseIntervalMinutes],
    ...Object.entries(config.severityPenalty).map(
      ([severity, value]): [string, number] => [`severityPenalty.${severity}`, value]
    ),
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      throw new MasteryConfigError(`${name} must be a non-negative number, got ${value}`);
    }
  }

  if (!(config.baseIntervalDays > 0)) {
    throw new MasteryConfigError('baseIntervalDays must be positive');
  }
  if (!(config.growthFactor >= 1)) {
    throw new MasteryConfigError('growthFactor must be at least 1');
  }
  if (!(config.maxIntervalDays >= config.baseIntervalDays)) {
    throw new MasteryConfigError('maxIntervalDays must be at least baseIntervalDays');
  }
  if (
    !(config.mediumThreshold > 0) ||
    !(config.strongThreshold > config.mediumThreshold) ||
    !(config.strongThreshold <= 5)
  ) {
    throw new MasteryConfigError(
      'Tier thresholds must satisfy 0 < mediumThreshold < strongThreshold <= 5'
    );
  }
}
