/**
 * Knowledge Point Repository Integration Tests
 *
 * The facade over both stores: routing by effective ID, merged lists,
 * guest limits, optimistic remote updates with rollback, per-point
 * ordering and the offline cache.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { effectiveId } from '../../src/core/identity';
import {
  GuestQuotaExceededError,
  IdentityUnresolvableError,
  KnowledgePointNotFoundError,
  RemoteRejectedError,
  RemoteUnreachableError,
} from '../../src/core/errors';
import type { Container } from '../../src/container';
import { createTestContainer } from '../setup';
import { FIXED_NOW, InMemoryRemoteStore, daysAfter, makeLocalPoint, makeRemotePoint } from '../helpers';

describe('KnowledgePointRepository', () => {
  let container: Container;
  let remote: InMemoryRemoteStore;

  afterEach(() => {
    container.close();
  });

  describe('as a guest', () => {
    beforeEach(() => {
      ({ container, remote } = createTestContainer({ now: () => FIXED_NOW, env: { MAX_GUEST_POINTS: '2' } }));
    });

    it('creates points in the Local Store', async () => {
      const point = await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });

      expect(point.origin).toBe('local');
      expect(point.compositeId).toBeNull();
      expect(point.nextReviewDate).toEqual(FIXED_NOW);
      expect(remote.calls).toEqual([]);
      expect(await container.repository.findById(effectiveId(point))).toEqual(point);
    });

    it('returns the existing record when the content already exists', async () => {
      const first = await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });
      const second = await container.repository.create({
        category: 'Greetings',
        correctPhrase: 'Good morning',
        explanation: 'ignored',
      });

      expect(second).toEqual(first);
      expect(await container.localStore.count()).toBe(1);
    });

    it('returns the stored record for a phrase already saved under another category', async () => {
      const first = await container.repository.create({ category: 'Grammar', correctPhrase: 'went' });
      const second = await container.repository.create({ category: 'Vocabulary', correctPhrase: 'went' });

      expect(second).toEqual(first);
      expect(await container.localStore.count()).toBe(1);
      expect((await container.repository.fetchActive()).map((point) => point.category)).toEqual(['Grammar']);
    });

    it('rejects creation past the guest limit', async () => {
      await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });
      await container.repository.create({ category: 'Greetings', correctPhrase: 'Good evening' });

      await expect(
        container.repository.create({ category: 'Greetings', correctPhrase: 'Good night' })
      ).rejects.toBeInstanceOf(GuestQuotaExceededError);
      expect(await container.localStore.count()).toBe(2);
    });

    it('rejects a blank phrase', async () => {
      await expect(
        container.repository.create({ category: 'Greetings', correctPhrase: '   ' })
      ).rejects.toBeInstanceOf(IdentityUnresolvableError);
    });

    it('archives and unarchives a local point', async () => {
      const point = await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });
      const id = effectiveId(point);

      const archived = await container.repository.archive(id);
      expect(archived.isArchived).toBe(true);
      expect(await container.repository.fetchActive()).toEqual([]);
      expect((await container.repository.fetchArchived()).map(effectiveId)).toEqual([id]);

      await container.repository.unarchive(id);
      expect((await container.repository.fetchActive()).map(effectiveId)).toEqual([id]);
    });

    it('leaves every other field of a local point unchanged across archive and unarchive', async () => {
      const point = await container.repository.create({
        category: 'Greetings',
        correctPhrase: 'Good morning',
        explanation: 'Used until noon',
        masteryLevel: 2,
      });
      const id = effectiveId(point);

      await container.repository.archive(id);
      const restored = await container.repository.unarchive(id);

      expect(restored).toEqual(point);
      expect(await container.repository.findById(id)).toEqual(point);
    });

    it('applies practice outcomes to local points', async () => {
      const point = await container.repository.create({
        category: 'Greetings',
        correctPhrase: 'Good morning',
        masteryLevel: 3,
      });

      const updated = await container.repository.updateMastery(effectiveId(point), {
        wasCorrect: false,
        severity: 'high',
      });

      expect(updated.masteryLevel).toBe(2.25);
      expect(updated.mistakeCount).toBe(1);
      const stored = await container.localStore.findByContent('Greetings', 'Good morning');
      expect(stored?.masteryLevel).toBe(2.25);
    });

    it('deletes local points', async () => {
      const point = await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });

      await container.repository.delete(effectiveId(point));

      expect(await container.localStore.count()).toBe(0);
      await expect(container.repository.delete(effectiveId(point))).rejects.toBeInstanceOf(
        KnowledgePointNotFoundError
      );
    });

    it('never consults the remote store', async () => {
      remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Remote phrase'));

      expect(await container.repository.fetchActive()).toEqual([]);
      expect(await container.repository.findById('7:1')).toBeNull();
      expect(remote.calls).toEqual([]);
    });
  });

  describe('when signed in', () => {
    beforeEach(() => {
      ({ container, remote } = createTestContainer({ token: 'test-secret', now: () => FIXED_NOW }));
    });

    describe('create', () => {
      it('creates the point remotely and caches it', async () => {
        const point = await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });

        expect(point.origin).toBe('remote');
        expect(point.compositeId).toEqual({ ownerId: 7, sequenceId: 1 });
        expect(await container.localStore.count()).toBe(0);
        expect((await container.cache.findById('7:1'))?.correctPhrase).toBe('Good morning');
      });

      it('keeps the point locally when the remote store is unreachable', async () => {
        remote.failNext('create', new RemoteUnreachableError('offline'));

        const point = await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });

        expect(point.origin).toBe('local');
        expect(await container.localStore.count()).toBe(1);
      });

      it('propagates a refusal without saving anything', async () => {
        remote.failNext('create', new RemoteRejectedError(422, 'Duplicate phrase'));

        await expect(
          container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' })
        ).rejects.toBeInstanceOf(RemoteRejectedError);
        expect(await container.localStore.count()).toBe(0);
      });
    });

    describe('lists', () => {
      it('merges remote points first, then local ones', async () => {
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 3 }, 'Remote phrase'));
        const local = await container.localStore.save(makeLocalPoint('Local phrase'));

        const points = await container.repository.fetchActive();

        expect(points.map(effectiveId)).toEqual(['7:3', effectiveId(local)]);
      });

      it('prefers the remote entry when both stores hold the same ID', async () => {
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Shared', { compositeId: null }));
        await container.localStore.save(makeLocalPoint('Shared'));

        const points = await container.repository.fetchActive();

        expect(points).toHaveLength(1);
        expect(points[0]?.origin).toBe('remote');
      });

      it('serves the cached lists while the remote store is unreachable', async () => {
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Good morning'));
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 2 }, 'Good evening', { isArchived: true }));
        await container.repository.fetchActive();
        await container.repository.fetchArchived();

        remote.failAlways('fetchActive', new RemoteUnreachableError('offline'));
        remote.failAlways('fetchArchived', new RemoteUnreachableError('offline'));

        expect((await container.repository.fetchActive()).map(effectiveId)).toEqual(['7:1']);
        expect((await container.repository.fetchArchived()).map(effectiveId)).toEqual(['7:2']);
      });

      it('serves the cached list when a list fetch is refused', async () => {
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Good morning'));
        await container.repository.fetchActive();

        remote.failNext('fetchActive', new RemoteRejectedError(401, 'Token expired'));

        expect((await container.repository.fetchActive()).map(effectiveId)).toEqual(['7:1']);
      });

      it('filters and sorts through query', async () => {
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Good morning', { masteryLevel: 4 }));
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 2 }, 'Good evening', { masteryLevel: 3.8 }));
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 3 }, 'Good night', { masteryLevel: 1 }));

        const strong = await container.repository.query({ tier: 'strong', sort: 'mastery' });

        expect(strong.map(effectiveId)).toEqual(['7:2', '7:1']);
      });
    });

    describe('mutations', () => {
      beforeEach(async () => {
        remote.seed(makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Good morning', { masteryLevel: 1 }));
        await container.repository.fetchActive();
      });

      it('archives and unarchives a remote point', async () => {
        await container.repository.archive('7:1');

        expect(remote.points[0]?.isArchived).toBe(true);
        expect(await container.repository.fetchActive()).toEqual([]);
        expect((await container.repository.fetchArchived()).map(effectiveId)).toEqual(['7:1']);

        await container.repository.unarchive('7:1');

        expect(remote.points[0]?.isArchived).toBe(false);
        expect((await container.repository.fetchActive()).map(effectiveId)).toEqual(['7:1']);
      });

      it('leaves every other field of a remote point unchanged across archive and unarchive', async () => {
        const before = await container.repository.findById('7:1');
        expect(before?.masteryLevel).toBe(1);

        await container.repository.archive('7:1');
        const restored = await container.repository.unarchive('7:1');

        expect(restored).toEqual(before);
        expect(await container.repository.findById('7:1')).toEqual(before);
      });

      it('treats archiving an archived point as a no-op', async () => {
        await container.repository.archive('7:1');
        const again = await container.repository.archive('7:1');

        expect(again.isArchived).toBe(true);
        expect(remote.callCount('archive')).toBe(1);
      });

      it('rolls the cache back when an archive fails', async () => {
        remote.failNext('archive', new RemoteUnreachableError('offline'));

        await expect(container.repository.archive('7:1')).rejects.toBeInstanceOf(RemoteUnreachableError);

        expect((await container.cache.list(false)).map(effectiveId)).toEqual(['7:1']);
        expect(await container.cache.list(true)).toEqual([]);
        expect(remote.points[0]?.isArchived).toBe(false);
      });

      it('restores the cached entry when a delete fails', async () => {
        remote.failNext('delete', new RemoteRejectedError(500, 'Server error'));

        await expect(container.repository.delete('7:1')).rejects.toBeInstanceOf(RemoteRejectedError);

        expect(await container.cache.findById('7:1')).not.toBeNull();
        expect(remote.points).toHaveLength(1);
      });

      it('fails an update queued behind a delete of the same point', async () => {
        const deletion = container.repository.delete('7:1');
        const update = container.repository.updateMastery('7:1', { wasCorrect: true });

        await deletion;
        await expect(update).rejects.toBeInstanceOf(KnowledgePointNotFoundError);
        expect(remote.callCount('updateMastery')).toBe(0);
        expect(remote.points).toEqual([]);
      });

      it('writes practice outcomes to the remote store', async () => {
        const updated = await container.repository.updateMastery('7:1', { wasCorrect: true });

        expect(updated.masteryLevel).toBe(1.5);
        expect(updated.correctCount).toBe(1);
        expect(updated.nextReviewDate).toEqual(daysAfter(FIXED_NOW, 1));
        expect(remote.points[0]?.masteryLevel).toBe(1.5);
        expect((await container.cache.findById('7:1'))?.masteryLevel).toBe(1.5);
      });

      it('reports unknown IDs as not found', async () => {
        expect(await container.repository.findById('7:99')).toBeNull();
        await expect(container.repository.archive('7:99')).rejects.toBeInstanceOf(KnowledgePointNotFoundError);
      });

      it('drops the offline copy on clearCache', async () => {
        await container.repository.clearCache();

        expect(await container.cache.list(false)).toEqual([]);
      });
    });

    it('keeps local points usable while the remote store refuses list fetches', async () => {
      remote.failNext('create', new RemoteUnreachableError('offline'));
      const local = await container.repository.create({ category: 'Greetings', correctPhrase: 'Good morning' });
      const id = effectiveId(local);
      remote.failAlways('fetchActive', new RemoteRejectedError(401, 'Token expired'));
      remote.failAlways('fetchArchived', new RemoteRejectedError(401, 'Token expired'));

      expect((await container.repository.fetchActive()).map(effectiveId)).toEqual([id]);
      const updated = await container.repository.updateMastery(id, { wasCorrect: true });
      expect(updated.masteryLevel).toBe(0.5);
      await container.repository.archive(id);
      expect((await container.repository.fetchArchived()).map(effectiveId)).toEqual([id]);
      await container.repository.delete(id);

      expect(await container.localStore.count()).toBe(0);
      expect(remote.callCount('fetchActive')).toBe(1);
      expect(remote.callCount('fetchArchived')).toBe(1);
    });

    it('routes mutations of an unpromoted point to the Local Store', async () => {
      const local = await container.localStore.save(makeLocalPoint('Good morning'));

      await container.repository.archive(effectiveId(local));

      expect((await container.localStore.findByContent('Greetings', 'Good morning'))?.isArchived).toBe(true);
      expect(remote.callCount('archive')).toBe(0);
    });
  });
});
