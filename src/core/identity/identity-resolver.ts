/**
 * Identity Resolver
 *
 * Computes the single canonical string identity ("effective ID") of a
 * knowledge point. Lists, sets, navigation and every mutation path key on
 * this string and never branch on the underlying identifier fields.
 *
 * Resolution order, first match wins:
 * 1. composite identifier  -> "{ownerId}:{sequenceId}"
 * 2. legacy identifier     -> decimal string
 * 3. ancient identifier    -> decimal string
 * 4. otherwise             -> "fallback_" + stableHash(correctPhrase)
 *
 * The fallback hash is derived from the phrase content alone so that the same
 * phrase yields the same ID across calls and across process restarts.
 */

import { createHash } from 'node:crypto';
import type { CompositeKnowledgePointId, KnowledgePoint } from '../models';
import { IdentityUnresolvableError } from '../errors';

/**
 * The identifier fields the resolver looks at.
 */
export type IdentifiablePoint = Pick<
  KnowledgePoint,
  'compositeId' | 'legacyId' | 'ancientId' | 'correctPhrase'
>;

/** Prefix of effective IDs derived from the phrase hash */
export const FALLBACK_ID_PREFIX = 'fallback_';

/**
 * Which resolution path produced an effective ID.
 */
export type ResolvedIdentity =
  | { kind: 'composite'; key: string; compositeId: CompositeKnowledgePointId }
  | { kind: 'legacy'; key: string; numericId: number }
  | { kind: 'ancient'; key: string; numericId: number }
  | { kind: 'fallback'; key: string };

/**
 * Reference used to address a point on the remote store.
 * Legacy and ancient identifiers are both served by the numeric endpoints.
 */
export type RemoteRef =
  | { kind: 'composite'; compositeId: CompositeKnowledgePointId }
  | { kind: 'legacy'; numericId: number };

const COMPOSITE_PATTERN = /^(\d+):(\d+)$/;

/**
 * Deterministic, process-stable hash of a string: the first 16 hex
 * characters of its SHA-256 digest.
 */
export function stableHash(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex').slice(0, 16);
}

export function formatCompositeId(id: CompositeKnowledgePointId): string {
  return `${id.ownerId}:${id.sequenceId}`;
}

/**
 * Parses `"7:42"` into a composite ID. Returns null for anything else,
 * including legacy numeric strings and fallback IDs.
 */
export function parseCompositeId(value: string): CompositeKnowledgePointId | null {
  const match = COMPOSITE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const ownerId = Number(match[1]);
  const sequenceId = Number(match[2]);
  if (!Number.isSafeInteger(ownerId) || !Number.isSafeInteger(sequenceId)) {
    return null;
  }
  return { ownerId, sequenceId };
}

/**
 * Structural equality for composite IDs.
 */
export function compositeIdsEqual(
  a: CompositeKnowledgePointId | null,
  b: CompositeKnowledgePointId | null
): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.ownerId === b.ownerId && a.sequenceId === b.sequenceId;
}

export function resolveIdentity(point: IdentifiablePoint): ResolvedIdentity {
  if (point.compositeId) {
    return {
      kind: 'composite',
      key: formatCompositeId(point.compositeId),
      compositeId: point.compositeId,
    };
  }
  if (point.legacyId !== null) {
    return { kind: 'legacy', key: String(point.legacyId), numericId: point.legacyId };
  }
  if (point.ancientId !== null) {
    return { kind: 'ancient', key: String(point.ancientId), numericId: point.ancientId };
  }
  return { kind: 'fallback', key: FALLBACK_ID_PREFIX + stableHash(point.correctPhrase) };
}

/**
 * The canonical string identity of a point. Total and deterministic.
 *
 * @example
 * ```typescript
 * effectiveId({ compositeId: { ownerId: 7, sequenceId: 42 }, legacyId: 42, ancientId: null, correctPhrase: 'x' });
 * // => '7:42'
 * ```
 */
export function effectiveId(point: IdentifiablePoint): string {
  return resolveIdentity(point).key;
}

/**
 * Whether an effective ID came from the phrase hash. Such IDs only ever
 * address points the server has not seen.
 */
export function isFallbackId(id: string): boolean {
  return id.startsWith(FALLBACK_ID_PREFIX);
}

/**
 * The remote address of a point, or null for points the server has never
 * seen (fallback identity only).
 */
export function remoteRefFor(point: IdentifiablePoint): RemoteRef | null {
  const identity = resolveIdentity(point);
  switch (identity.kind) {
    case 'composite':
      return { kind: 'composite', compositeId: identity.compositeId };
    case 'legacy':
    case 'ancient':
      return { kind: 'legacy', numericId: identity.numericId };
    case 'fallback':
      return null;
  }
}

/**
 * Key the local store uses for unidentified points.
 */
export function contentFingerprint(category: string, correctPhrase: string): string {
  return `${category}\u0000${correctPhrase}`;
}

/**
 * Throws IdentityUnresolvableError when a point can only be identified by
 * its phrase and the phrase is blank.
 */
export function assertResolvable(point: IdentifiablePoint): void {
  const identity = resolveIdentity(point);
  if (identity.kind === 'fallback' && point.correctPhrase.trim() === '') {
    throw new IdentityUnresolvableError();
  }
}
