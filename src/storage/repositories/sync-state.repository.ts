/**
 * Sync State Repository
 *
 * Persists when reconciliation last ran and last finished cleanly, so the
 * foreground trigger can honour its threshold across restarts.
 */

import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { syncState } from '../schema';
import { LocalPersistenceError } from '@/core/errors';

const STATE_ID = 'reconciliation';

export interface SyncStateSnapshot {
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
}

export class SyncStateRepository {
  constructor(private readonly db: AppDatabase) {}

  async get(): Promise<SyncStateSnapshot> {
    try {
      const rows = await this.db.select().from(syncState).where(eq(syncState.id, STATE_ID)).limit(1);
      if (rows.length === 0) {
        return { lastRunAt: null, lastSuccessAt: null };
      }
      return { lastRunAt: rows[0].lastRunAt, lastSuccessAt: rows[0].lastSuccessAt };
    } catch (error) {
      throw new LocalPersistenceError('sync state read', error);
    }
  }

  /**
   * Records a finished run. `succeeded` marks a run without conflicts.
   */
  async recordRun(at: Date, succeeded: boolean): Promise<void> {
    const set = succeeded ? { lastRunAt: at, lastSuccessAt: at } : { lastRunAt: at };
    try {
      await this.db
        .insert(syncState)
        .values({ id: STATE_ID, ...set })
        .onConflictDoUpdate({ target: syncState.id, set });
    } catch (error) {
      throw new LocalPersistenceError('sync state write', error);
    }
  }
}
