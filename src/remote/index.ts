/**
 * Remote Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { HttpRemoteStore, AuthSession, type RemoteStore } from '@/remote';
 * ```
 */

export {
  toRemoteCreateInput,
  toRemoteMasteryUpdate,
  type RemoteStore,
  type RemoteCreateInput,
  type RemoteMasteryUpdate,
} from './types';

export { AuthSession } from './auth-session';

export { HttpRemoteStore, type HttpRemoteStoreOptions, type FetchFn } from './http-remote-store';

export {
  fromWire,
  decodeKnowledgePointList,
  decodeCreateResponse,
  encodeCreateRequest,
  encodeMasteryUpdate,
  wireKnowledgePointSchema,
  wireCompositeIdSchema,
  type WireKnowledgePoint,
} from './wire';
