/**
 * Dependency Container
 *
 * Wires the sync core together from a validated Config. The HTTP server and
 * the CLI each build one container at start-up; tests build their own with
 * an in-memory database and a fake remote store.
 *
 * @example
 * ```typescript
 * const container = createContainer(loadConfig());
 * const points = await container.repository.fetchActive();
 * container.close();
 * ```
 */

import type { Config } from './config';
import { KeyedMutex } from './core/concurrency';
import { KnowledgePointRepository } from './core/knowledge-points';
import { MasteryEngine, type MasteryEngineConfig } from './core/mastery';
import { ReconciliationService, SyncCoordinator } from './core/sync';
import { AuthSession, HttpRemoteStore, type RemoteStore } from './remote';
import {
  createDatabase,
  KnowledgePointCacheRepository,
  LocalKnowledgePointRepository,
  SyncStateRepository,
  type DatabaseHandle,
} from './storage';

export interface Container {
  config: Config;
  database: DatabaseHandle;
  session: AuthSession;
  mastery: MasteryEngine;
  localStore: LocalKnowledgePointRepository;
  cache: KnowledgePointCacheRepository;
  syncState: SyncStateRepository;
  remoteStore: RemoteStore;
  reconciliation: ReconciliationService;
  coordinator: SyncCoordinator;
  repository: KnowledgePointRepository;
  /** Clock shared by every component */
  now: () => Date;
  /** Closes the database connection */
  close(): void;
}

/**
 * Replacements for the parts that touch the outside world.
 */
export interface ContainerOverrides {
  database?: DatabaseHandle;
  remoteStore?: RemoteStore;
  session?: AuthSession;
  mastery?: Partial<MasteryEngineConfig>;
  now?: () => Date;
}

export function createContainer(config: Config, overrides: ContainerOverrides = {}): Container {
  const now = overrides.now ?? (() => new Date());
  const database = overrides.database ?? createDatabase(config.localStore.dbPath);
  const session = overrides.session ?? new AuthSession(config.remote.apiToken ?? null);
  const mastery = new MasteryEngine(overrides.mastery);

  const localStore = new LocalKnowledgePointRepository(database.db, {
    maxGuestPoints: config.localStore.maxGuestPoints,
    now,
  });
  const cache = new KnowledgePointCacheRepository(database.db);
  const syncState = new SyncStateRepository(database.db);

  const remoteStore =
    overrides.remoteStore ??
    new HttpRemoteStore({
      baseUrl: config.remote.baseUrl,
      timeoutMs: config.remote.timeoutMs,
      session,
    });

  // One lock table for both writers of a point
  const pointLocks = new KeyedMutex();

  const reconciliation = new ReconciliationService(
    { localStore, remoteStore, pointLocks },
    { promotionDelayMs: config.reconciliation.promotionDelayMs, now }
  );

  const coordinator = new SyncCoordinator(
    { session, localStore, remoteStore, reconciliation, syncState },
    { foregroundThresholdMs: config.reconciliation.foregroundThresholdMs, now }
  );

  const repository = new KnowledgePointRepository({
    localStore,
    remoteStore,
    cache,
    session,
    mastery,
    pointLocks,
    now,
  });

  return {
    config,
    database,
    session,
    mastery,
    localStore,
    cache,
    syncState,
    remoteStore,
    reconciliation,
    coordinator,
    repository,
    now,
    close: () => database.sqlite.close(),
  };
}
