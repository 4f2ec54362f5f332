/**
 * Test Helpers Module
 *
 * Fixtures and in-process stand-ins shared by the test suites:
 * - makePoint / makeLocalPoint / makeRemotePoint: knowledge point factories
 * - InMemoryRemoteStore: a RemoteStore with failure injection and call log
 * - toWire: the snake_case JSON a remote server sends for a point
 */

import type { CompositeKnowledgePointId, KnowledgePoint } from '../src/core/models';
import { compositeIdsEqual, type RemoteRef } from '../src/core/identity';
import { RemoteRejectedError } from '../src/core/errors';
import type { RemoteCreateInput, RemoteMasteryUpdate, RemoteStore } from '../src/remote';

// ============================================================================
// Dates
// ============================================================================

/** Fixed clock used across suites */
export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function daysAfter(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

// ============================================================================
// Point Factories
// ============================================================================

export function makePoint(overrides: Partial<KnowledgePoint> = {}): KnowledgePoint {
  return {
    compositeId: null,
    legacyId: null,
    ancientId: null,
    origin: 'local',
    category: 'Greetings',
    subcategory: '',
    correctPhrase: 'How do you do?',
    explanation: null,
    userContextSentence: null,
    incorrectPhraseInContext: null,
    keyPointSummary: null,
    masteryLevel: 0,
    mistakeCount: 0,
    correctCount: 0,
    reviewStreak: 0,
    nextReviewDate: FIXED_NOW,
    lastAiReviewDate: null,
    aiReviewNotes: null,
    isArchived: false,
    ...overrides,
  };
}

export function makeLocalPoint(correctPhrase: string, overrides: Partial<KnowledgePoint> = {}): KnowledgePoint {
  return makePoint({ correctPhrase, ...overrides, origin: 'local' });
}

export function makeRemotePoint(
  compositeId: CompositeKnowledgePointId,
  correctPhrase: string,
  overrides: Partial<KnowledgePoint> = {}
): KnowledgePoint {
  return makePoint({ correctPhrase, compositeId, ...overrides, origin: 'remote' });
}

// ============================================================================
// In-Memory Remote Store
// ============================================================================

export type RemoteOperation =
  | 'create'
  | 'fetchActive'
  | 'fetchArchived'
  | 'archive'
  | 'unarchive'
  | 'delete'
  | 'updateMastery';

/**
 * RemoteStore held in memory. Assigns composite IDs `{ownerId, n}` with n
 * counting from 1. Failures can be queued for the next call of an operation
 * or set for every call.
 */
export class InMemoryRemoteStore implements RemoteStore {
  readonly points: KnowledgePoint[] = [];
  readonly calls: RemoteOperation[] = [];
  /** Awaited inside createKnowledgePoint before the point is stored */
  onCreate: (() => Promise<void>) | null = null;

  private readonly queuedFailures = new Map<RemoteOperation, Error[]>();
  private readonly standingFailures = new Map<RemoteOperation, Error>();
  private nextSequence = 1;

  constructor(readonly ownerId: number = 7) {}

  failNext(operation: RemoteOperation, error: Error): void {
    const queue = this.queuedFailures.get(operation) ?? [];
    queue.push(error);
    this.queuedFailures.set(operation, queue);
  }

  failAlways(operation: RemoteOperation, error: Error): void {
    this.standingFailures.set(operation, error);
  }

  clearFailures(): void {
    this.queuedFailures.clear();
    this.standingFailures.clear();
  }

  callCount(operation: RemoteOperation): number {
    return this.calls.filter((call) => call === operation).length;
  }

  /**
   * Adds a server-side point directly, bypassing the call log.
   */
  seed(point: KnowledgePoint): KnowledgePoint {
    const stored = { ...point, origin: 'remote' as const };
    this.points.push(stored);
    return stored;
  }

  async createKnowledgePoint(input: RemoteCreateInput): Promise<CompositeKnowledgePointId> {
    this.check('create');
    if (this.onCreate) {
      await this.onCreate();
    }
    const compositeId = { ownerId: this.ownerId, sequenceId: this.nextSequence++ };
    this.points.push({
      ...input,
      compositeId,
      legacyId: null,
      ancientId: null,
      origin: 'remote',
      lastAiReviewDate: null,
      aiReviewNotes: null,
    });
    return compositeId;
  }

  async fetchActive(): Promise<KnowledgePoint[]> {
    this.check('fetchActive');
    return this.points.filter((point) => !point.isArchived).map((point) => ({ ...point }));
  }

  async fetchArchived(): Promise<KnowledgePoint[]> {
    this.check('fetchArchived');
    return this.points.filter((point) => point.isArchived).map((point) => ({ ...point }));
  }

  async archive(ref: RemoteRef): Promise<void> {
    this.check('archive');
    this.find(ref).isArchived = true;
  }

  async unarchive(ref: RemoteRef): Promise<void> {
    this.check('unarchive');
    this.find(ref).isArchived = false;
  }

  async delete(ref: RemoteRef): Promise<void> {
    this.check('delete');
    const target = this.find(ref);
    this.points.splice(this.points.indexOf(target), 1);
  }

  async updateMastery(ref: RemoteRef, update: RemoteMasteryUpdate): Promise<void> {
    this.check('updateMastery');
    Object.assign(this.find(ref), update);
  }

  private check(operation: RemoteOperation): void {
    this.calls.push(operation);
    const queued = this.queuedFailures.get(operation)?.shift();
    if (queued) {
      throw queued;
    }
    const standing = this.standingFailures.get(operation);
    if (standing) {
      throw standing;
    }
  }

  private find(ref: RemoteRef): KnowledgePoint {
    const found = this.points.find((point) =>
      ref.kind === 'composite'
        ? compositeIdsEqual(point.compositeId, ref.compositeId)
        : point.legacyId === ref.numericId || point.ancientId === ref.numericId
    );
    if (!found) {
      throw new RemoteRejectedError(404, 'Knowledge point not found');
    }
    return found;
  }
}

// ============================================================================
// Wire Format
// ============================================================================

/**
 * The JSON a remote server sends for `point`.
 */
export function toWire(point: KnowledgePoint): Record<string, unknown> {
  return {
    composite_id: point.compositeId
      ? { user_id: point.compositeId.ownerId, sequence_id: point.compositeId.sequenceId }
      : null,
    legacy_id: point.legacyId,
    id: point.ancientId,
    category: point.category,
    subcategory: point.subcategory,
    correct_phrase: point.correctPhrase,
    explanation: point.explanation,
    user_context_sentence: point.userContextSentence,
    incorrect_phrase_in_context: point.incorrectPhraseInContext,
    key_point_summary: point.keyPointSummary,
    mastery_level: point.masteryLevel,
    mistake_count: point.mistakeCount,
    correct_count: point.correctCount,
    review_streak: point.reviewStreak,
    next_review_date: point.nextReviewDate?.toISOString() ?? null,
    is_archived: point.isArchived,
    ai_review_notes: point.aiReviewNotes,
    last_ai_review_date: point.lastAiReviewDate?.toISOString() ?? null,
  };
}

// ============================================================================
// HTTP
// ============================================================================

/**
 * Parsed JSON body of a Hono response.
 */
export async function getJsonResponse<T>(response: Response): Promise<T> {
  return response.json() as Promise<T>;
}

/**
 * RequestInit for a JSON request.
 */
export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
