/**
 * Mastery Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { MasteryEngine, type PracticeOutcome } from '@/core/mastery';
 * ```
 */

export {
  MasteryEngine,
  MasteryConfigError,
  DEFAULT_MASTERY_CONFIG,
  type MasteryEngineConfig,
} from './mastery-engine';

export {
  MASTERY_TIERS,
  MISTAKE_SEVERITIES,
  MIN_MASTERY,
  MAX_MASTERY,
  clampMastery,
  type MasteryTier,
  type MistakeSeverity,
  type PracticeOutcome,
} from './types';
