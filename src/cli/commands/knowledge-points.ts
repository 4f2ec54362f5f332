/**
 * Knowledge Point Commands
 *
 * list, archived, summary, add, review, archive, unarchive and delete.
 * Each command goes through the repository facade, so guests and signed-in
 * users use the same commands.
 */

import { z } from 'zod';
import type { Container } from '@/container';
import type { KnowledgePoint } from '@/core/models';
import { effectiveId } from '@/core/identity';
import { MASTERY_TIERS, MISTAKE_SEVERITIES, type PracticeOutcome } from '@/core/mastery';
import type { KnowledgePointFilter } from '@/core/knowledge-points';
import type { CliOutput } from '../io';
import {
  bold,
  dim,
  formatMastery,
  formatPointLine,
  formatSeparator,
  formatTimestamp,
  green,
  yellow,
} from '../utils/terminal';

// =============================================================================
// Option Schemas
// =============================================================================

export const listOptionsSchema = z.object({
  tier: z.enum(MASTERY_TIERS).optional(),
  category: z.string().optional(),
  sort: z.enum(['mastery', 'nextReview', 'category']).optional(),
  due: z.boolean().optional(),
});

export type ListOptions = z.input<typeof listOptionsSchema>;

export const addOptionsSchema = z.object({
  subcategory: z.string().optional(),
  explanation: z.string().optional(),
  summary: z.string().optional(),
});

export type AddOptions = z.input<typeof addOptionsSchema>;

export const reviewOptionsSchema = z
  .object({
    correct: z.boolean().optional(),
    wrong: z.boolean().optional(),
    severity: z.enum(MISTAKE_SEVERITIES).optional(),
  })
  .refine((options) => options.correct !== options.wrong, {
    message: 'Pass exactly one of --correct or --wrong',
  });

export type ReviewOptions = z.input<typeof reviewOptionsSchema>;

export function toPracticeOutcome(options: ReviewOptions): PracticeOutcome {
  const parsed = reviewOptionsSchema.parse(options);
  return parsed.correct ? { wasCorrect: true } : { wasCorrect: false, severity: parsed.severity };
}

// =============================================================================
// Commands
// =============================================================================

function printPoints(container: Container, out: CliOutput, title: string, points: KnowledgePoint[]): void {
  out.log(bold(`${title} (${points.length})`));
  out.log(formatSeparator(60));
  if (points.length === 0) {
    out.log(yellow('  No knowledge points found.'));
  }
  for (const point of points) {
    out.log(formatPointLine(point, container.mastery));
  }
}

export async function runList(
  container: Container,
  out: CliOutput,
  options: ListOptions,
  archived: boolean
): Promise<KnowledgePoint[]> {
  const parsed = listOptionsSchema.parse(options);
  const filter: KnowledgePointFilter = {
    archived,
    tier: parsed.tier,
    category: parsed.category,
    sort: parsed.sort,
    dueBefore: parsed.due ? container.now() : undefined,
  };

  const points = await container.repository.query(filter);
  printPoints(container, out, archived ? 'Archived knowledge points' : 'Knowledge points', points);
  return points;
}

export async function runSummary(container: Container, out: CliOutput): Promise<void> {
  const summary = await container.repository.summary();
  out.log(bold('Summary'));
  out.log(formatSeparator(30));
  out.log(`  Total:           ${summary.total}`);
  out.log(`  Weak:            ${summary.byTier.weak}`);
  out.log(`  Medium:          ${summary.byTier.medium}`);
  out.log(`  Strong:          ${summary.byTier.strong}`);
  out.log(`  Average mastery: ${summary.averageMastery.toFixed(2)}`);
  out.log(`  Due now:         ${summary.dueCount}`);
  out.log(`  Not yet synced:  ${summary.localCount}`);
}

export async function runAdd(
  container: Container,
  out: CliOutput,
  category: string,
  phrase: string,
  options: AddOptions
): Promise<KnowledgePoint> {
  const parsed = addOptionsSchema.parse(options);
  const created = await container.repository.create({
    category,
    correctPhrase: phrase,
    subcategory: parsed.subcategory,
    explanation: parsed.explanation ?? null,
    keyPointSummary: parsed.summary ?? null,
  });

  const where = created.origin === 'local' ? 'on this device' : 'in the cloud';
  out.log(`${green('Saved')} ${bold(created.correctPhrase)} ${where} ${dim(`(${effectiveId(created)})`)}`);
  return created;
}

export async function runReview(
  container: Container,
  out: CliOutput,
  id: string,
  options: ReviewOptions
): Promise<KnowledgePoint> {
  const updated = await container.repository.updateMastery(id, toPracticeOutcome(options));
  out.log(`${bold(updated.correctPhrase)}  ${formatMastery(updated.masteryLevel, container.mastery)}`);
  out.log(dim(`  Next review: ${formatTimestamp(updated.nextReviewDate)}`));
  return updated;
}

export async function runArchive(
  container: Container,
  out: CliOutput,
  id: string,
  archive: boolean
): Promise<void> {
  const point = archive ? await container.repository.archive(id) : await container.repository.unarchive(id);
  out.log(`${green(archive ? 'Archived' : 'Unarchived')} ${bold(point.correctPhrase)}`);
}

export async function runDelete(container: Container, out: CliOutput, id: string): Promise<void> {
  await container.repository.delete(id);
  out.log(`${green('Deleted')} ${id}`);
}
