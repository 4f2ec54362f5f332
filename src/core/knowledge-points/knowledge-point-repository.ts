/**
 * Knowledge Point Repository - Unified Facade
 *
 * The single entry point presentation code uses for knowledge points. It
 * hides which store holds a point:
 *
 * - Every operation is addressed by effective ID and routed to the store
 *   that holds the record. When both stores hold the same ID, the remote
 *   entry wins.
 * - List views merge remote and local points, remote first, de-duplicated
 *   by effective ID.
 * - Mutations of one effective ID run one at a time. An update queued behind
 *   a delete finds nothing and fails with KnowledgePointNotFoundError.
 * - Remote mutations are applied optimistically to the cached read model
 *   and rolled back when the remote store refuses or cannot be reached; the
 *   error is re-thrown. Nothing is retried automatically.
 * - When the remote store is unreachable or refuses a list fetch, reads
 *   fall back to the offline cache. Local points stay readable and writable
 *   either way.
 */

import { createLocalKnowledgePoint, type KnowledgePoint, type NewKnowledgePointInput } from '../models';
import { assertResolvable, effectiveId, isFallbackId, remoteRefFor, type RemoteRef } from '../identity';
import type { MasteryEngine, PracticeOutcome } from '../mastery';
import { KnowledgePointNotFoundError, RemoteRejectedError, RemoteUnreachableError } from '../errors';
import { KeyedMutex } from '../concurrency';
import {
  toRemoteCreateInput,
  toRemoteMasteryUpdate,
  type AuthSession,
  type RemoteStore,
} from '@/remote';
import type {
  KnowledgePointCacheRepository,
  LocalKnowledgePointRepository,
} from '@/storage/repositories';
import {
  filterPoints,
  mergeByEffectiveId,
  sortPoints,
  summarize,
  type KnowledgePointFilter,
  type KnowledgePointSummary,
} from './read-model';

export interface KnowledgePointRepositoryDeps {
  localStore: LocalKnowledgePointRepository;
  remoteStore: RemoteStore;
  cache: KnowledgePointCacheRepository;
  session: AuthSession;
  mastery: MasteryEngine;
  /** Per-point lock, shared with the reconciliation service */
  pointLocks?: KeyedMutex;
  now?: () => Date;
}

/**
 * Where a located point lives.
 */
type Located =
  | { store: 'remote'; point: KnowledgePoint; ref: RemoteRef }
  | { store: 'local'; point: KnowledgePoint };

/**
 * @example
 * ```typescript
 * const repository = new KnowledgePointRepository({
 *   localStore, remoteStore, cache, session, mastery,
 * });
 *
 * const points = await repository.fetchActive();
 * await repository.updateMastery(effectiveId(points[0]), { wasCorrect: true });
 * ```
 */
export class KnowledgePointRepository {
  private readonly localStore: LocalKnowledgePointRepository;
  private readonly remoteStore: RemoteStore;
  private readonly cache: KnowledgePointCacheRepository;
  private readonly session: AuthSession;
  private readonly mastery: MasteryEngine;
  private readonly pointLocks: KeyedMutex;
  private readonly now: () => Date;

  constructor(deps: KnowledgePointRepositoryDeps) {
    this.localStore = deps.localStore;
    this.remoteStore = deps.remoteStore;
    this.cache = deps.cache;
    this.session = deps.session;
    this.mastery = deps.mastery;
    this.pointLocks = deps.pointLocks ?? new KeyedMutex();
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Active points from both stores, remote first.
   */
  async fetchActive(): Promise<KnowledgePoint[]> {
    const [remote, local] = await Promise.all([
      this.loadRemoteList(false),
      this.localStore.loadAll(),
    ]);
    return mergeByEffectiveId(
      remote,
      local.filter((point) => !point.isArchived)
    );
  }

  /**
   * Archived points from both stores, remote first.
   */
  async fetchArchived(): Promise<KnowledgePoint[]> {
    const [remote, local] = await Promise.all([
      this.loadRemoteList(true),
      this.localStore.loadAll(),
    ]);
    return mergeByEffectiveId(
      remote,
      local.filter((point) => point.isArchived)
    );
  }

  async findById(id: string): Promise<KnowledgePoint | null> {
    const located = await this.locate(id);
    return located?.point ?? null;
  }

  /**
   * Filtered and sorted view of the active (or archived) list.
   */
  async query(filter: KnowledgePointFilter = {}): Promise<KnowledgePoint[]> {
    const points = filter.archived ? await this.fetchArchived() : await this.fetchActive();
    const filtered = filterPoints(points, filter, this.mastery);
    return filter.sort ? sortPoints(filtered, filter.sort) : filtered;
  }

  /**
   * Totals of the active list by tier, plus average mastery.
   */
  async summary(): Promise<KnowledgePointSummary> {
    return summarize(await this.fetchActive(), this.mastery, this.now());
  }

  // ==========================================================================
  // Creation
  // ==========================================================================

  /**
   * Creates a point. Signed in, the remote store assigns it a composite ID;
   * when the remote store cannot be reached it is kept locally for later
   * promotion. As a guest it goes to the Local Store, subject to the guest
   * limit. Creating content that already exists locally returns the existing
   * record. Local points are identified by their phrase, so a phrase already
   * stored locally under another category also returns the stored record.
   *
   * @throws IdentityUnresolvableError when the phrase is blank
   * @throws GuestQuotaExceededError when a guest is at the limit
   * @throws RemoteRejectedError when the remote store refuses the point
   */
  async create(input: NewKnowledgePointInput): Promise<KnowledgePoint> {
    const draft = createLocalKnowledgePoint(input, this.now());
    assertResolvable(draft);

    return this.pointLocks.run(effectiveId(draft), async () => {
      const existing = await this.localStore.findByContent(draft.category, draft.correctPhrase);
      if (existing) {
        return existing;
      }

      if (!this.session.isAuthenticated()) {
        return (await this.findLocal(effectiveId(draft))) ?? this.localStore.save(draft);
      }

      try {
        const compositeId = await this.remoteStore.createKnowledgePoint(toRemoteCreateInput(draft));
        const created: KnowledgePoint = { ...draft, compositeId, origin: 'remote' };
        await this.cacheQuietly(() => this.cache.put(created, this.now()));
        return created;
      } catch (error) {
        if (!(error instanceof RemoteUnreachableError)) {
          throw error;
        }
        console.warn('[Repository] Remote store unreachable, keeping new point locally:', error.message);
        return (
          (await this.findLocal(effectiveId(draft))) ??
          this.localStore.save(draft, { enforceQuota: false })
        );
      }
    });
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Archives a point. Archiving an archived point is a successful no-op.
   *
   * @throws KnowledgePointNotFoundError when no store holds the ID
   */
  async archive(id: string): Promise<KnowledgePoint> {
    return this.setArchived(id, true);
  }

  /**
   * Unarchives a point. Unarchiving an active point is a successful no-op.
   *
   * @throws KnowledgePointNotFoundError when no store holds the ID
   */
  async unarchive(id: string): Promise<KnowledgePoint> {
    return this.setArchived(id, false);
  }

  /**
   * @throws KnowledgePointNotFoundError when no store holds the ID
   */
  async delete(id: string): Promise<void> {
    await this.pointLocks.run(id, async () => {
      const located = await this.require(id);

      if (located.store === 'local') {
        await this.localStore.removeByContent(located.point.category, located.point.correctPhrase);
        return;
      }

      await this.optimistic(id, located.point, null, () => this.remoteStore.delete(located.ref));
    });
  }

  /**
   * Applies a practice outcome through the mastery engine and stores the
   * result where the point lives.
   *
   * @returns The updated point
   * @throws KnowledgePointNotFoundError when no store holds the ID
   */
  async updateMastery(id: string, outcome: PracticeOutcome): Promise<KnowledgePoint> {
    return this.pointLocks.run(id, async () => {
      const located = await this.require(id);
      const updated = this.mastery.applyOutcome(located.point, outcome, this.now());

      if (located.store === 'local') {
        return this.localStore.save(updated, { enforceQuota: false });
      }

      await this.optimistic(id, located.point, updated, () =>
        this.remoteStore.updateMastery(located.ref, toRemoteMasteryUpdate(updated))
      );
      return updated;
    });
  }

  /**
   * Drops the offline copy of remote points (sign-out).
   */
  async clearCache(): Promise<void> {
    await this.cache.clear();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async setArchived(id: string, isArchived: boolean): Promise<KnowledgePoint> {
    return this.pointLocks.run(id, async () => {
      const located = await this.require(id);
      if (located.point.isArchived === isArchived) {
        return located.point;
      }

      const updated: KnowledgePoint = { ...located.point, isArchived };

      if (located.store === 'local') {
        return this.localStore.save(updated, { enforceQuota: false });
      }

      await this.optimistic(id, located.point, updated, () =>
        isArchived ? this.remoteStore.archive(located.ref) : this.remoteStore.unarchive(located.ref)
      );
      return updated;
    });
  }

  /**
   * Applies `next` (or a removal, for null) to the cache, runs the remote
   * call and restores `previous` if the call fails.
   */
  private async optimistic(
    id: string,
    previous: KnowledgePoint,
    next: KnowledgePoint | null,
    remoteCall: () => Promise<void>
  ): Promise<void> {
    await this.cacheQuietly(() =>
      next ? this.cache.put(next, this.now()) : this.cache.remove(id)
    );

    try {
      await remoteCall();
    } catch (error) {
      console.warn(`[Repository] Remote update of '${id}' failed, rolling back`);
      await this.cacheQuietly(() => this.cache.put(previous, this.now()));
      throw error;
    }
  }

  private async require(id: string): Promise<Located> {
    const located = await this.locate(id);
    if (!located) {
      throw new KnowledgePointNotFoundError(id);
    }
    return located;
  }

  /**
   * Finds the store holding `id`: the cached remote lists first, then a
   * fresh remote fetch, then the Local Store. Fallback IDs never reach the
   * remote store.
   */
  private async locate(id: string): Promise<Located | null> {
    if (this.session.isAuthenticated() && !isFallbackId(id)) {
      const cached = await this.cache.findById(id);
      const remote = cached ?? (await this.findRemote(id));
      if (remote) {
        const ref = remoteRefFor(remote);
        if (ref) {
          return { store: 'remote', point: remote, ref };
        }
      }
    }

    const point = await this.findLocal(id);
    return point ? { store: 'local', point } : null;
  }

  private async findLocal(id: string): Promise<KnowledgePoint | null> {
    const local = await this.localStore.loadAll();
    return local.find((candidate) => effectiveId(candidate) === id) ?? null;
  }

  /**
   * Searches fresh remote lists for `id`, or the cached ones when the remote
   * store cannot serve them.
   */
  private async findRemote(id: string): Promise<KnowledgePoint | null> {
    const [active, archived] = await Promise.all([
      this.loadRemoteList(false),
      this.loadRemoteList(true),
    ]);
    return [...active, ...archived].find((point) => effectiveId(point) === id) ?? null;
  }

  /**
   * One remote list, refreshed into the cache. Falls back to the cache when
   * the remote store is unreachable or refuses the fetch. Guests have no
   * remote list.
   */
  private async loadRemoteList(archived: boolean): Promise<KnowledgePoint[]> {
    if (!this.session.isAuthenticated()) {
      return [];
    }

    try {
      const points = archived
        ? await this.remoteStore.fetchArchived()
        : await this.remoteStore.fetchActive();
      const remoteOnly = points.filter((point) => point.origin === 'remote');
      await this.cacheQuietly(() => this.cache.replaceList(archived, remoteOnly, this.now()));
      return points;
    } catch (error) {
      const list = archived ? 'archived' : 'active';
      if (error instanceof RemoteUnreachableError) {
        console.warn(`[Repository] Remote store unreachable, serving cached ${list} list`);
      } else if (error instanceof RemoteRejectedError) {
        console.warn(
          `[Repository] Remote store refused the ${list} list (${error.status}: ${error.message}), serving cached copy`
        );
      } else {
        throw error;
      }
      return this.cache.list(archived);
    }
  }

  /**
   * Cache writes never fail the operation they accompany.
   */
  private async cacheQuietly(write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      console.error('[Repository] Cache write failed:', error);
    }
  }
}
