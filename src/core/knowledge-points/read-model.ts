/**
 * Knowledge Point Read Model
 *
 * Pure helpers that turn a merged list of points into what list screens
 * show: filtering by tier, category and due date, sorting, and the summary
 * totals of the dashboard.
 */

import type { KnowledgePoint } from '../models';
import { effectiveId } from '../identity';
import type { MasteryEngine, MasteryTier } from '../mastery';

export type KnowledgePointSort = 'mastery' | 'nextReview' | 'category';

export interface KnowledgePointFilter {
  /** Query the archived list instead of the active one */
  archived?: boolean;
  tier?: MasteryTier;
  category?: string;
  /** Only points due at or before this time */
  dueBefore?: Date;
  sort?: KnowledgePointSort;
}

export interface KnowledgePointSummary {
  total: number;
  byTier: Record<MasteryTier, number>;
  /** Mean mastery, rounded to two decimals; 0 for an empty list */
  averageMastery: number;
  dueCount: number;
  /** Points not yet promoted to the remote store */
  localCount: number;
}

/**
 * Concatenates lists in priority order, keeping the first point seen for
 * each effective ID.
 */
export function mergeByEffectiveId(...lists: KnowledgePoint[][]): KnowledgePoint[] {
  const seen = new Set<string>();
  const merged: KnowledgePoint[] = [];
  for (const list of lists) {
    for (const point of list) {
      const id = effectiveId(point);
      if (seen.has(id)) {
        continue;
      }
      seen.add(id);
      merged.push(point);
    }
  }
  return merged;
}

export function filterPoints(
  points: KnowledgePoint[],
  filter: KnowledgePointFilter,
  engine: MasteryEngine
): KnowledgePoint[] {
  return points.filter((point) => {
    if (filter.tier && engine.tierFor(point.masteryLevel) !== filter.tier) {
      return false;
    }
    if (filter.category !== undefined && point.category !== filter.category) {
      return false;
    }
    if (filter.dueBefore && !engine.isDue({ ...point, isArchived: false }, filter.dueBefore)) {
      return false;
    }
    return true;
  });
}

/**
 * Stable sort; the input order breaks ties. Points without a review date
 * sort first for 'nextReview'.
 */
export function sortPoints(points: KnowledgePoint[], sort: KnowledgePointSort): KnowledgePoint[] {
  const compare: Record<KnowledgePointSort, (a: KnowledgePoint, b: KnowledgePoint) => number> = {
    mastery: (a, b) => a.masteryLevel - b.masteryLevel,
    nextReview: (a, b) => reviewTime(a) - reviewTime(b),
    category: (a, b) => a.category.localeCompare(b.category),
  };
  return [...points].sort(compare[sort]);
}

function reviewTime(point: KnowledgePoint): number {
  return point.nextReviewDate?.getTime() ?? Number.MIN_SAFE_INTEGER;
}

export function summarize(
  points: KnowledgePoint[],
  engine: MasteryEngine,
  now: Date = new Date()
): KnowledgePointSummary {
  const byTier: Record<MasteryTier, number> = { weak: 0, medium: 0, strong: 0 };
  let masterySum = 0;
  let dueCount = 0;
  let localCount = 0;

  for (const point of points) {
    byTier[engine.tierFor(point.masteryLevel)]++;
    masterySum += point.masteryLevel;
    if (engine.isDue(point, now)) {
      dueCount++;
    }
    if (point.origin === 'local') {
      localCount++;
    }
  }

  return {
    total: points.length,
    byTier,
    averageMastery: points.length === 0 ? 0 : Math.round((masterySum / points.length) * 100) / 100,
    dueCount,
    localCount,
  };
}
