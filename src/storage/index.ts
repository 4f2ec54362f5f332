/**
 * Storage Module - Barrel Export
 *
 * Public API of the on-device storage layer: the connection factory, the
 * Drizzle schema and the repositories built on it.
 *
 * Usage:
 *   import { createDatabase, LocalKnowledgePointRepository } from '@/storage';
 *
 *   const { db } = createDatabase(config.localStore.dbPath);
 *   const localStore = new LocalKnowledgePointRepository(db);
 */

export { createDatabase, wrapConnection } from './db';
export type { AppDatabase, DatabaseHandle } from './db';
export { applySchema, listTables } from './migrate';

export {
  guestKnowledgePoints,
  cachedKnowledgePoints,
  syncState,
} from './schema';

export type {
  GuestKnowledgePointRow,
  NewGuestKnowledgePointRow,
  CachedKnowledgePointRow,
  CachedKnowledgePointPayload,
  SyncStateRow,
} from './schema';

export {
  LocalKnowledgePointRepository,
  KnowledgePointCacheRepository,
  SyncStateRepository,
  DEFAULT_MAX_GUEST_POINTS,
  type LocalKnowledgePointRepositoryOptions,
  type LocalPromotionRecord,
  type SaveOptions,
  type SyncStateSnapshot,
} from './repositories';

export {
  importLegacyGuestRecords,
  decodeLegacyGuestRecords,
  legacyGuestRecordSchema,
  type LegacyGuestRecord,
  type LegacyDecodeResult,
  type LegacyImportResult,
} from './legacy-guest-import';
