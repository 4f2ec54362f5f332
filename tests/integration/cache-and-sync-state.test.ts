/**
 * Offline Cache and Sync State Integration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  KnowledgePointCacheRepository,
  SyncStateRepository,
  type DatabaseHandle,
} from '../../src/storage';
import { createTestDatabase } from '../setup';
import { FIXED_NOW, daysAfter, makeRemotePoint } from '../helpers';

describe('KnowledgePointCacheRepository', () => {
  let handle: DatabaseHandle;
  let cache: KnowledgePointCacheRepository;

  const first = makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Good morning', { masteryLevel: 1.5 });
  const second = makeRemotePoint({ ownerId: 7, sequenceId: 2 }, 'Good evening');
  const archived = makeRemotePoint({ ownerId: 7, sequenceId: 3 }, 'Farewell', { isArchived: true });

  beforeEach(() => {
    handle = createTestDatabase();
    cache = new KnowledgePointCacheRepository(handle.db);
  });

  afterEach(() => {
    handle.sqlite.close();
  });

  it('returns a cached list in server order', async () => {
    await cache.replaceList(false, [second, first], FIXED_NOW);

    const list = await cache.list(false);

    expect(list.map((point) => point.correctPhrase)).toEqual(['Good evening', 'Good morning']);
  });

  it('restores every field of a cached point', async () => {
    await cache.replaceList(false, [first], FIXED_NOW);

    expect(await cache.findById('7:1')).toEqual(first);
  });

  it('drops entries missing from a fresh fetch of the same list', async () => {
    await cache.replaceList(false, [first, second], FIXED_NOW);
    await cache.replaceList(false, [second], FIXED_NOW);

    expect((await cache.list(false)).map((point) => point.correctPhrase)).toEqual(['Good evening']);
    expect(await cache.findById('7:1')).toBeNull();
  });

  it('keeps the other list when one list is replaced', async () => {
    await cache.replaceList(true, [archived], FIXED_NOW);
    await cache.replaceList(false, [], FIXED_NOW);

    expect((await cache.list(true)).map((point) => point.correctPhrase)).toEqual(['Farewell']);
  });

  it('appends new entries and keeps the position of existing ones', async () => {
    await cache.replaceList(false, [first, second], FIXED_NOW);

    await cache.put({ ...first, masteryLevel: 3 }, FIXED_NOW);
    await cache.put(makeRemotePoint({ ownerId: 7, sequenceId: 9 }, 'Good night'), FIXED_NOW);

    const list = await cache.list(false);
    expect(list.map((point) => point.correctPhrase)).toEqual(['Good morning', 'Good evening', 'Good night']);
    expect(list[0]?.masteryLevel).toBe(3);
  });

  it('moves an entry between lists when its archive flag changes', async () => {
    await cache.replaceList(false, [first], FIXED_NOW);

    await cache.put({ ...first, isArchived: true }, FIXED_NOW);

    expect(await cache.list(false)).toEqual([]);
    expect((await cache.list(true)).map((point) => point.correctPhrase)).toEqual(['Good morning']);
  });

  it('removes single entries and clears everything', async () => {
    await cache.replaceList(false, [first, second], FIXED_NOW);
    await cache.replaceList(true, [archived], FIXED_NOW);

    await cache.remove('7:1');
    expect((await cache.list(false)).map((point) => point.correctPhrase)).toEqual(['Good evening']);

    await cache.clear();
    expect(await cache.list(false)).toEqual([]);
    expect(await cache.list(true)).toEqual([]);
  });
});

describe('SyncStateRepository', () => {
  let handle: DatabaseHandle;
  let syncState: SyncStateRepository;

  beforeEach(() => {
    handle = createTestDatabase();
    syncState = new SyncStateRepository(handle.db);
  });

  afterEach(() => {
    handle.sqlite.close();
  });

  it('starts with no recorded runs', async () => {
    expect(await syncState.get()).toEqual({ lastRunAt: null, lastSuccessAt: null });
  });

  it('records successful runs as both last run and last success', async () => {
    await syncState.recordRun(FIXED_NOW, true);

    expect(await syncState.get()).toEqual({ lastRunAt: FIXED_NOW, lastSuccessAt: FIXED_NOW });
  });

  it('keeps the last success when a later run has conflicts', async () => {
    const later = daysAfter(FIXED_NOW, 1);
    await syncState.recordRun(FIXED_NOW, true);
    await syncState.recordRun(later, false);

    expect(await syncState.get()).toEqual({ lastRunAt: later, lastSuccessAt: FIXED_NOW });
  });
});
