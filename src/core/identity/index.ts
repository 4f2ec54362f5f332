/**
 * Identity Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { effectiveId } from '@/core/identity';
 *
 * const key = effectiveId(point); // '7:42', '1234' or 'fallback_3f0c…'
 * ```
 */

export {
  FALLBACK_ID_PREFIX,
  stableHash,
  formatCompositeId,
  parseCompositeId,
  compositeIdsEqual,
  resolveIdentity,
  effectiveId,
  isFallbackId,
  remoteRefFor,
  contentFingerprint,
  assertResolvable,
  type IdentifiablePoint,
  type ResolvedIdentity,
  type RemoteRef,
} from './identity-resolver';
