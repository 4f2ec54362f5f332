/**
 * HTTP Remote Store Tests
 *
 * Requests go to an in-process Hono app standing in for the remote service.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { AuthSession, HttpRemoteStore, type FetchFn } from '../../src/remote';
import { RemoteRejectedError, RemoteUnreachableError } from '../../src/core/errors';
import { FIXED_NOW, daysAfter, makeRemotePoint, toWire } from '../helpers';

interface ReceivedRequest {
  method: string;
  path: string;
  authorization: string | undefined;
  body: unknown;
}

describe('HttpRemoteStore', () => {
  let fakeRemote: Hono;
  let received: ReceivedRequest[];
  let session: AuthSession;
  let store: HttpRemoteStore;

  function record(method: string, path: string, authorization: string | undefined, body: unknown = null): void {
    received.push({ method, path, authorization, body });
  }

  beforeEach(() => {
    received = [];
    fakeRemote = new Hono();
    session = new AuthSession('test-secret');
    const fetchFn: FetchFn = async (input, init) => fakeRemote.request(input, init);
    store = new HttpRemoteStore({
      baseUrl: 'http://remote.test/api/',
      timeoutMs: 1000,
      session,
      fetch: fetchFn,
    });
  });

  describe('lists', () => {
    it('decodes the active list and skips malformed records', async () => {
      const point = makeRemotePoint({ ownerId: 7, sequenceId: 1 }, 'Good morning', { masteryLevel: 2 });
      fakeRemote.get('/api/data/get_dashboard', (c) => {
        record('GET', c.req.path, c.req.header('Authorization'));
        return c.json({ knowledge_points: [toWire(point), { category: 'Greetings' }] });
      });

      const points = await store.fetchActive();

      expect(points).toEqual([point]);
      expect(received).toEqual([
        { method: 'GET', path: '/api/data/get_dashboard', authorization: 'Bearer test-secret', body: null },
      ]);
    });

    it('marks archived-list records as archived when they do not say', async () => {
      fakeRemote.get('/api/data/archived_knowledge_points', (c) =>
        c.json({ knowledge_points: [{ legacy_id: 12, category: 'Travel', correct_phrase: 'Ticket, please' }] })
      );

      const [point] = await store.fetchArchived();

      expect(point?.legacyId).toBe(12);
      expect(point?.compositeId).toBeNull();
      expect(point?.isArchived).toBe(true);
      expect(point?.origin).toBe('remote');
      expect(point?.subcategory).toBe('');
    });

    it('decodes guest placeholders and locally stored notes as local points', async () => {
      fakeRemote.get('/api/data/get_dashboard', (c) =>
        c.json({
          knowledge_points: [
            { id: -4, category: 'Travel', correct_phrase: 'One way, please' },
            { id: 30, category: 'Travel', correct_phrase: 'Return, please', ai_review_notes: '本地儲存' },
            { id: 31, category: 'Travel', correct_phrase: 'Window seat', mastery_level: 9 },
          ],
        })
      );

      const points = await store.fetchActive();

      expect(points.map((point) => [point.origin, point.ancientId, point.aiReviewNotes])).toEqual([
        ['local', null, null],
        ['local', 30, null],
        ['remote', 31, null],
      ]);
      expect(points[2]?.masteryLevel).toBe(5);
    });

    it('rejects a body that is not a list response', async () => {
      fakeRemote.get('/api/data/get_dashboard', (c) => c.json({ points: [] }));

      await expect(store.fetchActive()).rejects.toBeInstanceOf(RemoteRejectedError);
    });

    it('sends no Authorization header without a token', async () => {
      session.clear();
      fakeRemote.get('/api/data/get_dashboard', (c) => {
        record('GET', c.req.path, c.req.header('Authorization'));
        return c.json({ knowledge_points: [] });
      });

      await store.fetchActive();

      expect(received[0]?.authorization).toBeUndefined();
    });
  });

  describe('createKnowledgePoint', () => {
    it('posts the snake_case record and returns the assigned composite ID', async () => {
      fakeRemote.post('/api/v2/data/knowledge_points', async (c) => {
        record('POST', c.req.path, c.req.header('Authorization'), await c.req.json());
        return c.json({ composite_id: { user_id: 7, sequence_id: 12 } }, 201);
      });

      const compositeId = await store.createKnowledgePoint({
        category: 'Greetings',
        subcategory: 'Formal',
        correctPhrase: 'How do you do?',
        explanation: null,
        userContextSentence: 'I said how you do',
        incorrectPhraseInContext: 'how you do',
        keyPointSummary: null,
        masteryLevel: 6,
        mistakeCount: 1,
        correctCount: 0,
        reviewStreak: 0,
        nextReviewDate: FIXED_NOW,
        isArchived: false,
      });

      expect(compositeId).toEqual({ ownerId: 7, sequenceId: 12 });
      expect(received[0]?.body).toEqual({
        category: 'Greetings',
        subcategory: 'Formal',
        correct_phrase: 'How do you do?',
        explanation: null,
        user_context_sentence: 'I said how you do',
        incorrect_phrase_in_context: 'how you do',
        key_point_summary: null,
        mastery_level: 5,
        mistake_count: 1,
        correct_count: 0,
        review_streak: 0,
        next_review_date: '2026-03-01T12:00:00.000Z',
        is_archived: false,
      });
    });

    it('rejects a response without a composite ID', async () => {
      fakeRemote.post('/api/v2/data/knowledge_points', (c) => c.json({ id: 3 }));

      await expect(
        store.createKnowledgePoint({
          category: 'Greetings',
          subcategory: '',
          correctPhrase: 'Hello',
          explanation: null,
          userContextSentence: null,
          incorrectPhraseInContext: null,
          keyPointSummary: null,
          masteryLevel: 0,
          mistakeCount: 0,
          correctCount: 0,
          reviewStreak: 0,
          nextReviewDate: null,
          isArchived: false,
        })
      ).rejects.toBeInstanceOf(RemoteRejectedError);
    });
  });

  describe('point operations', () => {
    beforeEach(() => {
      fakeRemote.all('*', async (c) => {
        const body = c.req.method === 'PUT' ? await c.req.json() : null;
        record(c.req.method, c.req.path, c.req.header('Authorization'), body);
        return c.json({ ok: true });
      });
    });

    it('addresses composite IDs through the v2 endpoints', async () => {
      const ref = { kind: 'composite', compositeId: { ownerId: 7, sequenceId: 3 } } as const;

      await store.archive(ref);
      await store.unarchive(ref);
      await store.delete(ref);

      expect(received.map((request) => `${request.method} ${request.path}`)).toEqual([
        'POST /api/v2/data/knowledge_point/7/3/archive',
        'POST /api/v2/data/knowledge_point/7/3/unarchive',
        'DELETE /api/v2/data/knowledge_point/7/3',
      ]);
    });

    it('addresses numeric IDs through the legacy endpoints', async () => {
      await store.archive({ kind: 'legacy', numericId: 12 });

      expect(received.map((request) => `${request.method} ${request.path}`)).toEqual([
        'POST /api/data/knowledge_point/12/archive',
      ]);
    });

    it('sends progress updates with PUT', async () => {
      await store.updateMastery(
        { kind: 'legacy', numericId: 12 },
        {
          masteryLevel: 1.5,
          mistakeCount: 0,
          correctCount: 1,
          reviewStreak: 1,
          nextReviewDate: daysAfter(FIXED_NOW, 1),
        }
      );

      expect(received[0]).toEqual({
        method: 'PUT',
        path: '/api/data/knowledge_point/12',
        authorization: 'Bearer test-secret',
        body: {
          mastery_level: 1.5,
          mistake_count: 0,
          correct_count: 1,
          review_streak: 1,
          next_review_date: '2026-03-02T12:00:00.000Z',
        },
      });
    });
  });

  describe('error mapping', () => {
    it('treats 4xx responses as rejections carrying the server message', async () => {
      fakeRemote.get('/api/data/get_dashboard', (c) => c.json({ detail: 'Token expired' }, 401));

      const error = await store.fetchActive().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteRejectedError);
      expect(error).toMatchObject({ status: 401, message: 'Token expired' });
    });

    it('treats 5xx responses as unreachable', async () => {
      fakeRemote.get('/api/data/get_dashboard', (c) => c.json({ message: 'maintenance' }, 503));

      const error = await store.fetchActive().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteUnreachableError);
      expect(error).toMatchObject({ message: 'GET /data/get_dashboard returned 503: maintenance' });
    });

    it('rejects a successful response whose body is not JSON', async () => {
      fakeRemote.get('/api/data/get_dashboard', (c) => c.text('hello'));

      await expect(store.fetchActive()).rejects.toBeInstanceOf(RemoteRejectedError);
    });

    it('treats network failures as unreachable', async () => {
      const offline = new HttpRemoteStore({
        baseUrl: 'http://remote.test/api',
        timeoutMs: 1000,
        session,
        fetch: async () => {
          throw new TypeError('fetch failed');
        },
      });

      await expect(offline.fetchActive()).rejects.toMatchObject({
        name: 'RemoteUnreachableError',
        message: 'GET /data/get_dashboard failed: fetch failed',
      });
    });

    it('reports timeouts as unreachable', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      const slow = new HttpRemoteStore({
        baseUrl: 'http://remote.test/api',
        timeoutMs: 50,
        session,
        fetch: async () => {
          throw timeout;
        },
      });

      await expect(slow.fetchArchived()).rejects.toMatchObject({
        name: 'RemoteUnreachableError',
        message: 'GET /data/archived_knowledge_points timed out after 50ms',
      });
    });
  });
});
