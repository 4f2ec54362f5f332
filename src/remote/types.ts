/**
 * Remote Store Contract
 *
 * The remote store is the server-side home of every authenticated
 * knowledge point and the only authority that assigns composite IDs. The
 * sync core talks to it exclusively through this interface; the HTTP
 * implementation lives in `http-remote-store.ts` and tests substitute an
 * in-process fake.
 *
 * Failure contract for every operation:
 * - RemoteRejectedError: the server answered and refused (4xx, bad body)
 * - RemoteUnreachableError: network failure, timeout or 5xx
 */

import type {
  CompositeKnowledgePointId,
  KnowledgePoint,
  KnowledgePointContent,
} from '@/core/models';
import type { RemoteRef } from '@/core/identity';

/**
 * Everything the server needs to create a point: its content and the
 * progress accumulated so far (a promoted guest point keeps its history).
 */
export interface RemoteCreateInput extends KnowledgePointContent {
  masteryLevel: number;
  mistakeCount: number;
  correctCount: number;
  reviewStreak: number;
  nextReviewDate: Date | null;
  isArchived: boolean;
}

/**
 * Progress fields written after a practice outcome.
 */
export interface RemoteMasteryUpdate {
  masteryLevel: number;
  mistakeCount: number;
  correctCount: number;
  reviewStreak: number;
  nextReviewDate: Date | null;
}

export interface RemoteStore {
  /**
   * Creates a point and returns its server-assigned composite identity.
   */
  createKnowledgePoint(input: RemoteCreateInput): Promise<CompositeKnowledgePointId>;

  /** Active (non-archived) points, in server order */
  fetchActive(): Promise<KnowledgePoint[]>;

  /** Archived points, in server order */
  fetchArchived(): Promise<KnowledgePoint[]>;

  archive(ref: RemoteRef): Promise<void>;

  unarchive(ref: RemoteRef): Promise<void>;

  delete(ref: RemoteRef): Promise<void>;

  updateMastery(ref: RemoteRef, update: RemoteMasteryUpdate): Promise<void>;
}

/**
 * Extracts the create payload from a point.
 */
export function toRemoteCreateInput(point: KnowledgePoint): RemoteCreateInput {
  return {
    category: point.category,
    subcategory: point.subcategory,
    correctPhrase: point.correctPhrase,
    explanation: point.explanation,
    userContextSentence: point.userContextSentence,
    incorrectPhraseInContext: point.incorrectPhraseInContext,
    keyPointSummary: point.keyPointSummary,
    masteryLevel: point.masteryLevel,
    mistakeCount: point.mistakeCount,
    correctCount: point.correctCount,
    reviewStreak: point.reviewStreak,
    nextReviewDate: point.nextReviewDate,
    isArchived: point.isArchived,
  };
}

export function toRemoteMasteryUpdate(point: KnowledgePoint): RemoteMasteryUpdate {
  return {
    masteryLevel: point.masteryLevel,
    mistakeCount: point.mistakeCount,
    correctCount: point.correctCount,
    reviewStreak: point.reviewStreak,
    nextReviewDate: point.nextReviewDate,
  };
}
