/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI wrappers for colour and emphasis, plus the line formats the `kp`
 * commands print. In non-TTY environments the codes pass through as-is.
 *
 * Usage:
 * ```typescript
 * import { bold, formatPointLine } from './terminal';
 *
 * console.log(bold('Active knowledge points'));
 * console.log(formatPointLine(point, engine));
 * ```
 */

import type { KnowledgePoint } from '@/core/models';
import { effectiveId } from '@/core/identity';
import type { MasteryEngine, MasteryTier } from '@/core/mastery';

// =============================================================================
// Text Style Modifiers
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** Secondary information: hints, timestamps, IDs */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Horizontal rule for section breaks.
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

const TIER_COLORS: Record<MasteryTier, (s: string) => string> = {
  weak: red,
  medium: yellow,
  strong: green,
};

/**
 * Mastery as `2.5/5 medium`, coloured by tier.
 */
export function formatMastery(masteryLevel: number, engine: MasteryEngine): string {
  const tier = engine.tierFor(masteryLevel);
  return TIER_COLORS[tier](`${masteryLevel.toFixed(1)}/5 ${tier}`);
}

/**
 * Shortens `text` to `max` characters, ending in an ellipsis.
 */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * One list row:
 * `  7:3  Greetings  How do you do?  2.5/5 medium  [local]`
 */
export function formatPointLine(point: KnowledgePoint, engine: MasteryEngine): string {
  const parts = [
    `  ${dim(effectiveId(point))}`,
    cyan(point.category || '(uncategorised)'),
    bold(truncate(point.correctPhrase, 50)),
    formatMastery(point.masteryLevel, engine),
  ];
  if (point.origin === 'local') {
    parts.push(yellow('[local]'));
  }
  return parts.join('  ');
}

/**
 * A date as `YYYY-MM-DD HH:MM` (UTC), or `never`.
 */
export function formatTimestamp(date: Date | null): string {
  return date ? date.toISOString().slice(0, 16).replace('T', ' ') : 'never';
}
