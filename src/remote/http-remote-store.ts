/**
 * HTTP Remote Store
 *
 * RemoteStore implementation over the remote service's JSON API. It handles:
 * - Base URL and bearer token (from the AuthSession) on every request
 * - A per-request timeout through AbortSignal
 * - Mapping of transport outcomes onto the error taxonomy:
 *   4xx and unusable bodies -> RemoteRejectedError,
 *   network failures, timeouts and 5xx -> RemoteUnreachableError
 * - Routing of point operations to the composite (`/v2/...`) or legacy
 *   numeric endpoints according to the point's RemoteRef
 *
 * @example
 * ```typescript
 * const remote = new HttpRemoteStore({
 *   baseUrl: 'https://api.example.com/api',
 *   timeoutMs: 15000,
 *   session,
 * });
 *
 * const active = await remote.fetchActive();
 * ```
 */

import type { CompositeKnowledgePointId, KnowledgePoint } from '@/core/models';
import type { RemoteRef } from '@/core/identity';
import { RemoteRejectedError, RemoteUnreachableError } from '@/core/errors';
import type { AuthSession } from './auth-session';
import type { RemoteCreateInput, RemoteMasteryUpdate, RemoteStore } from './types';
import {
  decodeCreateResponse,
  decodeKnowledgePointList,
  encodeCreateRequest,
  encodeMasteryUpdate,
} from './wire';

// ============================================================================
// Configuration
// ============================================================================

/** Signature of the fetch function used for requests */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpRemoteStoreOptions {
  /** API root, e.g. `https://api.example.com/api` (no trailing slash needed) */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Source of the bearer token */
  session: AuthSession;
  /** Fetch implementation; defaults to the global fetch */
  fetch?: FetchFn;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

// ============================================================================
// Paths
// ============================================================================

function pointPath(ref: RemoteRef): string {
  switch (ref.kind) {
    case 'composite':
      return `/v2/data/knowledge_point/${ref.compositeId.ownerId}/${ref.compositeId.sequenceId}`;
    case 'legacy':
      return `/data/knowledge_point/${ref.numericId}`;
  }
}

/**
 * Pulls a human-readable message out of an error body, whatever its shape.
 */
function extractErrorMessage(body: unknown, fallback: string): string {
  if (typeof body === 'object' && body !== null) {
    if ('detail' in body && typeof body.detail === 'string') {
      return body.detail;
    }
    if ('message' in body && typeof body.message === 'string') {
      return body.message;
    }
    if ('error' in body && typeof body.error === 'string') {
      return body.error;
    }
  }
  return fallback;
}

// ============================================================================
// Implementation
// ============================================================================

export class HttpRemoteStore implements RemoteStore {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly session: AuthSession;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpRemoteStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.session = options.session;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async createKnowledgePoint(input: RemoteCreateInput): Promise<CompositeKnowledgePointId> {
    const body = await this.request('POST', '/v2/data/knowledge_points', encodeCreateRequest(input));
    return decodeCreateResponse(body);
  }

  async fetchActive(): Promise<KnowledgePoint[]> {
    const body = await this.request('GET', '/data/get_dashboard');
    return decodeKnowledgePointList(body, false);
  }

  async fetchArchived(): Promise<KnowledgePoint[]> {
    const body = await this.request('GET', '/data/archived_knowledge_points');
    return decodeKnowledgePointList(body, true);
  }

  async archive(ref: RemoteRef): Promise<void> {
    await this.request('POST', `${pointPath(ref)}/archive`);
  }

  async unarchive(ref: RemoteRef): Promise<void> {
    await this.request('POST', `${pointPath(ref)}/unarchive`);
  }

  async delete(ref: RemoteRef): Promise<void> {
    await this.request('DELETE', pointPath(ref));
  }

  async updateMastery(ref: RemoteRef, update: RemoteMasteryUpdate): Promise<void> {
    await this.request('PUT', pointPath(ref), encodeMasteryUpdate(update));
  }

  /**
   * Sends one request and returns the parsed JSON body (null when empty).
   *
   * @throws RemoteUnreachableError on network failure, timeout or 5xx
   * @throws RemoteRejectedError on 4xx or a body that is not JSON
   */
  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    const token = this.session.getToken();
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const message = timedOut
        ? `${method} ${path} timed out after ${this.timeoutMs}ms`
        : `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`;
      console.error(`[RemoteStore] ${message}`);
      throw new RemoteUnreachableError(message, error);
    }

    const payload = await this.readBody(response, method, path);

    if (response.status >= 500) {
      console.error(`[RemoteStore] ${method} ${path} -> ${response.status}`);
      throw new RemoteUnreachableError(
        `${method} ${path} returned ${response.status}: ${extractErrorMessage(payload, response.statusText)}`
      );
    }
    if (!response.ok) {
      console.warn(`[RemoteStore] ${method} ${path} -> ${response.status}`);
      throw new RemoteRejectedError(
        response.status,
        extractErrorMessage(payload, `${method} ${path} was rejected with status ${response.status}`),
        payload
      );
    }

    return payload;
  }

  private async readBody(response: Response, method: HttpMethod, path: string): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new RemoteUnreachableError(`${method} ${path}: response body could not be read`, error);
    }
    if (text.trim() === '') {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      if (response.status >= 500) {
        return text;
      }
      throw new RemoteRejectedError(response.status, `${method} ${path} returned a non-JSON body`);
    }
  }
}
