/**
 * Sync Coordinator - Reconciliation Triggers
 *
 * Decides when reconciliation runs and keeps at most one run in flight:
 *
 * - onAuthenticated(): right after sign-in
 * - onForeground(now): when the app returns to the foreground, provided the
 *   user is signed in, local points are pending and the last run is older
 *   than the foreground threshold
 * - refresh(): explicit user request
 * - onLogout(): cancels the run in flight
 *
 * Concurrent triggers share the running promise instead of starting a
 * second run. Automatic triggers never reject; their failures are logged and
 * reported through status(). An explicit refresh rejects so the caller can
 * show the error.
 */

import type { KnowledgePoint } from '../models';
import { isRetryable } from '../errors';
import type { AuthSession, RemoteStore } from '@/remote';
import type {
  LocalKnowledgePointRepository,
  SyncStateRepository,
} from '@/storage/repositories';
import type {
  PromotionConflict,
  PromotionConflictReason,
  ReconciliationService,
} from './reconciliation-service';

/** One hour, the default foreground threshold */
export const DEFAULT_FOREGROUND_THRESHOLD_MS = 60 * 60 * 1000;

export type SyncTrigger = 'authenticated' | 'foreground' | 'refresh';

/**
 * Outcome of one completed run.
 */
export interface SyncRunSummary {
  trigger: SyncTrigger;
  startedAt: Date;
  finishedAt: Date;
  promoted: KnowledgePoint[];
  conflicts: PromotionConflict[];
  skipped: number;
  cancelled: boolean;
}

/**
 * Conflict as reported to callers: enough to show and retry, no error object.
 */
export interface SyncConflictSummary {
  effectiveId: string;
  category: string;
  correctPhrase: string;
  reason: PromotionConflictReason;
  message: string;
  /** False when the remote store refused the point; retrying will not help */
  retryable: boolean;
}

export interface SyncStatus {
  isSyncing: boolean;
  isAuthenticated: boolean;
  /** Local points still waiting for promotion */
  pendingCount: number;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastConflicts: SyncConflictSummary[];
  /** Why the last run could not start or finish, if it failed outright */
  lastError: string | null;
}

export interface SyncCoordinatorDeps {
  session: AuthSession;
  localStore: LocalKnowledgePointRepository;
  remoteStore: RemoteStore;
  reconciliation: ReconciliationService;
  syncState: SyncStateRepository;
}

export interface SyncCoordinatorOptions {
  foregroundThresholdMs?: number;
  now?: () => Date;
}

/**
 * Raised by refresh() when nobody is signed in.
 */
export class NotAuthenticatedError extends Error {
  constructor() {
    super('Sign in to sync knowledge points');
    this.name = 'NotAuthenticatedError';
  }
}

export function summarizeConflict(conflict: PromotionConflict): SyncConflictSummary {
  return {
    effectiveId: conflict.effectiveId,
    category: conflict.point.category,
    correctPhrase: conflict.point.correctPhrase,
    reason: conflict.reason,
    message: conflict.error.message,
    retryable: isRetryable(conflict.error),
  };
}

export class SyncCoordinator {
  private readonly deps: SyncCoordinatorDeps;
  private readonly foregroundThresholdMs: number;
  private readonly now: () => Date;

  private inFlight: Promise<SyncRunSummary> | null = null;
  private controller: AbortController | null = null;
  private lastConflicts: SyncConflictSummary[] = [];
  private lastError: string | null = null;

  constructor(deps: SyncCoordinatorDeps, options: SyncCoordinatorOptions = {}) {
    this.deps = deps;
    this.foregroundThresholdMs = options.foregroundThresholdMs ?? DEFAULT_FOREGROUND_THRESHOLD_MS;
    this.now = options.now ?? (() => new Date());
  }

  get isSyncing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Runs reconciliation after sign-in.
   *
   * @returns The run summary, or null when the run could not complete
   */
  async onAuthenticated(): Promise<SyncRunSummary | null> {
    return this.runQuietly('authenticated');
  }

  /**
   * Runs reconciliation when the app comes back to the foreground and a run
   * is worthwhile.
   *
   * @returns The run summary, or null when no run was needed or it failed
   */
  async onForeground(now: Date = this.now()): Promise<SyncRunSummary | null> {
    if (this.inFlight) {
      return this.inFlight.catch(() => null);
    }
    if (!this.deps.session.isAuthenticated()) {
      return null;
    }

    const pending = await this.deps.localStore.count();
    if (pending === 0) {
      return null;
    }

    const { lastRunAt } = await this.deps.syncState.get();
    if (lastRunAt && now.getTime() - lastRunAt.getTime() < this.foregroundThresholdMs) {
      return null;
    }

    return this.runQuietly('foreground');
  }

  /**
   * Explicit user refresh.
   *
   * @throws NotAuthenticatedError when nobody is signed in
   * @throws The remote or local error that stopped the run
   */
  async refresh(): Promise<SyncRunSummary> {
    if (!this.deps.session.isAuthenticated()) {
      throw new NotAuthenticatedError();
    }
    return this.start('refresh');
  }

  /**
   * Cancels the run in flight, if any, and forgets the signed-out account's
   * promotions. The run stops before its next point and resolves with
   * `cancelled: true`.
   */
  onLogout(): void {
    if (this.controller) {
      console.log('[Sync] Cancelling reconciliation on logout');
      this.controller.abort();
    }
    this.deps.reconciliation.forgetPromotions();
  }

  async status(): Promise<SyncStatus> {
    const [pendingCount, state] = await Promise.all([
      this.deps.localStore.count(),
      this.deps.syncState.get(),
    ]);
    return {
      isSyncing: this.isSyncing,
      isAuthenticated: this.deps.session.isAuthenticated(),
      pendingCount,
      lastRunAt: state.lastRunAt,
      lastSuccessAt: state.lastSuccessAt,
      lastConflicts: this.lastConflicts,
      lastError: this.lastError,
    };
  }

  private async runQuietly(trigger: SyncTrigger): Promise<SyncRunSummary | null> {
    if (!this.deps.session.isAuthenticated()) {
      return null;
    }
    try {
      return await this.start(trigger);
    } catch (error) {
      console.error(`[Sync] ${trigger} sync failed:`, error);
      return null;
    }
  }

  /**
   * Starts a run, or joins the one in flight.
   */
  private start(trigger: SyncTrigger): Promise<SyncRunSummary> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const controller = new AbortController();
    this.controller = controller;
    const run = this.execute(trigger, controller.signal).finally(() => {
      this.inFlight = null;
      if (this.controller === controller) {
        this.controller = null;
      }
    });
    this.inFlight = run;
    return run;
  }

  private async execute(trigger: SyncTrigger, signal: AbortSignal): Promise<SyncRunSummary> {
    const startedAt = this.now();
    console.log(`[Sync] Starting reconciliation (${trigger})`);

    try {
      const [localPoints, active, archived] = await Promise.all([
        this.deps.localStore.loadAll(),
        this.deps.remoteStore.fetchActive(),
        this.deps.remoteStore.fetchArchived(),
      ]);

      const result = await this.deps.reconciliation.reconcile(
        localPoints,
        [...active, ...archived],
        { signal }
      );

      const finishedAt = this.now();
      const clean = result.conflicts.length === 0 && !result.cancelled;
      await this.deps.syncState.recordRun(finishedAt, clean);

      this.lastConflicts = result.conflicts.map(summarizeConflict);
      this.lastError = null;

      return {
        trigger,
        startedAt,
        finishedAt,
        promoted: result.promoted,
        conflicts: result.conflicts,
        skipped: result.skipped.length,
        cancelled: result.cancelled,
      };
    } catch (error) {
      // Not recorded as a run, so the next foreground trigger retries
      this.lastError = error instanceof Error ? error.message : String(error);
      throw error;
    }
  }
}
