/**
 * Session and Sync API Endpoint Tests
 *
 * Endpoints tested:
 * - POST /api/session - Sign in and promote local points
 * - DELETE /api/session - Sign out
 * - POST /api/sync - Explicit sync
 * - GET /api/sync/status - Sync status
 * - GET /health, GET /api
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import {
  createApp,
  type ApiErrorResponse,
  type ApiResponse,
  type SyncRunDto,
  type SyncStatusDto,
} from '../../src/api';
import type { HealthCheckData, ApiInfo } from '../../src/api/routes';
import { RemoteUnreachableError } from '../../src/core/errors';
import type { Container } from '../../src/container';
import { createTestContainer } from '../setup';
import { FIXED_NOW, InMemoryRemoteStore, getJsonResponse, jsonRequest, makeLocalPoint } from '../helpers';

interface SessionData {
  isAuthenticated: boolean;
  sync?: SyncRunDto | null;
}

describe('Session and Sync API', () => {
  let container: Container;
  let remote: InMemoryRemoteStore;
  let app: Hono;

  beforeEach(() => {
    ({ container, remote } = createTestContainer({ now: () => FIXED_NOW }));
    app = createApp(container, { logRequests: false });
  });

  afterEach(() => {
    container.close();
  });

  describe('POST /api/session', () => {
    it('signs in and promotes local points', async () => {
      await container.localStore.save(makeLocalPoint('Good morning'));

      const response = await app.request('/api/session', jsonRequest('POST', { token: 'test-secret' }));
      const json = await getJsonResponse<ApiResponse<SessionData>>(response);

      expect(response.status).toBe(200);
      expect(json.data).toEqual({
        isAuthenticated: true,
        sync: {
          trigger: 'authenticated',
          startedAt: '2026-03-01T12:00:00.000Z',
          finishedAt: '2026-03-01T12:00:00.000Z',
          promotedIds: ['7:1'],
          conflicts: [],
          skipped: 0,
          cancelled: false,
        },
      });
      expect(container.session.getToken()).toBe('test-secret');
      expect(await container.localStore.count()).toBe(0);
    });

    it('signs in even when the first sync fails', async () => {
      remote.failNext('fetchActive', new RemoteUnreachableError('offline'));

      const response = await app.request('/api/session', jsonRequest('POST', { token: 'test-secret' }));
      const json = await getJsonResponse<ApiResponse<SessionData>>(response);

      expect(json.data).toEqual({ isAuthenticated: true, sync: null });
    });

    it('rejects a blank token', async () => {
      const response = await app.request('/api/session', jsonRequest('POST', { token: '   ' }));
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(400);
      expect(json.error.details).toEqual([{ path: 'token', message: 'Token is required' }]);
      expect(container.session.isAuthenticated()).toBe(false);
    });
  });

  describe('DELETE /api/session', () => {
    it('signs out and drops the offline cache', async () => {
      container.session.setToken('test-secret');
      await container.cache.put({ ...makeLocalPoint('Good morning'), compositeId: { ownerId: 7, sequenceId: 1 }, origin: 'remote' });

      const response = await app.request('/api/session', { method: 'DELETE' });
      const json = await getJsonResponse<ApiResponse<SessionData>>(response);

      expect(json.data).toEqual({ isAuthenticated: false });
      expect(container.session.isAuthenticated()).toBe(false);
      expect(await container.cache.findById('7:1')).toBeNull();
    });
  });

  describe('POST /api/sync', () => {
    it('returns 401 for a guest', async () => {
      const response = await app.request('/api/sync', { method: 'POST' });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(401);
      expect(json.error).toEqual({ code: 'UNAUTHORIZED', message: 'Sign in to sync knowledge points' });
    });

    it('reports conflicts of the run', async () => {
      container.session.setToken('test-secret');
      await container.localStore.save(makeLocalPoint('Good morning'));
      remote.failNext('create', new RemoteUnreachableError('offline'));

      const response = await app.request('/api/sync', { method: 'POST' });
      const json = await getJsonResponse<ApiResponse<SyncRunDto>>(response);

      expect(response.status).toBe(200);
      expect(json.data.trigger).toBe('refresh');
      expect(json.data.promotedIds).toEqual([]);
      expect(json.data.conflicts.map((conflict) => [conflict.correctPhrase, conflict.reason, conflict.message])).toEqual([
        ['Good morning', 'remote-unreachable', 'offline'],
      ]);
    });

    it('returns 503 when the remote lists cannot be fetched', async () => {
      container.session.setToken('test-secret');
      remote.failNext('fetchActive', new RemoteUnreachableError('offline'));

      const response = await app.request('/api/sync', { method: 'POST' });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(503);
      expect(json.error.code).toBe('REMOTE_UNREACHABLE');
    });
  });

  describe('GET /api/sync/status', () => {
    it('reports the last run', async () => {
      container.session.setToken('test-secret');
      await container.localStore.save(makeLocalPoint('Good morning'));
      await app.request('/api/sync', { method: 'POST' });

      const response = await app.request('/api/sync/status');
      const json = await getJsonResponse<ApiResponse<SyncStatusDto>>(response);

      expect(json.data).toEqual({
        isSyncing: false,
        isAuthenticated: true,
        pendingCount: 0,
        lastRunAt: '2026-03-01T12:00:00.000Z',
        lastSuccessAt: '2026-03-01T12:00:00.000Z',
        lastConflicts: [],
        lastError: null,
      });
    });
  });

  describe('service endpoints', () => {
    it('answers the health check', async () => {
      const response = await app.request('/health');
      const json = await getJsonResponse<ApiResponse<HealthCheckData>>(response);

      expect(response.status).toBe(200);
      expect(json.data.status).toBe('ok');
      expect(json.data.environment).toBe('test');
      expect(json.data.version).toBe('0.1.0');
    });

    it('describes the API', async () => {
      const response = await app.request('/api');
      const json = await getJsonResponse<ApiResponse<ApiInfo>>(response);

      expect(json.data.name).toBe('Knowledge Point Sync API');
      expect(json.data.endpoints.map((endpoint) => endpoint.path)).toContain('/api/sync');
    });
  });
});
