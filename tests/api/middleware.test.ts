/**
 * Middleware Tests
 *
 * Request logging, CORS and error formatting, each mounted on a small app.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Hono } from 'hono';
import { corsMiddleware, errorHandler, formatErrorResponse, loggerMiddleware, AppError } from '../../src/api/middleware';
import { GuestQuotaExceededError, LocalPersistenceError } from '../../src/core/errors';
import { NotAuthenticatedError } from '../../src/core/sync';

describe('loggerMiddleware', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs method, path and status', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const app = new Hono();
    app.use('*', loggerMiddleware({ colorize: false }));
    app.get('/api/points', (c) => c.json({ ok: true }));

    await app.request('/api/points');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toMatch(/^\[API\] GET {5}\/api\/points 200 - \d+ms$/);
  });

  it('skips health checks', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const app = new Hono();
    app.use('*', loggerMiddleware({ colorize: false }));
    app.get('/health', (c) => c.json({ ok: true }));

    await app.request('/health');

    expect(log).not.toHaveBeenCalled();
  });
});

describe('corsMiddleware', () => {
  it('allows the configured origins', async () => {
    const app = new Hono();
    app.use('*', corsMiddleware({ allowedOrigins: ['http://app.test'] }));
    app.get('/api', (c) => c.json({ ok: true }));

    const response = await app.request('/api', { headers: { Origin: 'http://app.test' } });

    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('http://app.test');
  });

  it('falls back to the local development origins', async () => {
    const app = new Hono();
    app.use('*', corsMiddleware({ allowedOrigins: [] }));
    app.get('/api', (c) => c.json({ ok: true }));

    const response = await app.request('/api', { headers: { Origin: 'http://localhost:5173' } });

    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
  });
});

describe('formatErrorResponse', () => {
  it('uses the status of an AppError', () => {
    const { response, statusCode } = formatErrorResponse(new AppError('BAD_REQUEST', 'Nope', 400), false);

    expect(statusCode).toBe(400);
    expect(response).toEqual({ success: false, error: { code: 'BAD_REQUEST', message: 'Nope' } });
  });

  it('maps sync-core errors by code', () => {
    expect(formatErrorResponse(new GuestQuotaExceededError(20), false).statusCode).toBe(409);
    expect(formatErrorResponse(new LocalPersistenceError('save', new Error('disk full')), false).statusCode).toBe(
      503
    );
    expect(formatErrorResponse(new NotAuthenticatedError(), false).statusCode).toBe(401);
  });

  it('hides unexpected error messages in production', () => {
    const { response, statusCode } = formatErrorResponse(new Error('secret detail'), true);

    expect(statusCode).toBe(500);
    expect(response.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Please try again.',
    });
  });
});

describe('errorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders thrown errors as the error envelope', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const app = new Hono();
    app.onError(errorHandler);
    app.get('/boom', () => {
      throw new Error('kaboom');
    });

    const response = await app.request('/boom');

    expect(response.status).toBe(500);
    expect(await response.json()).toMatchObject({ success: false, error: { code: 'INTERNAL_ERROR' } });
  });
});
