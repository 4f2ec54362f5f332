/**
 * Response Helpers
 *
 * Build the standard `{ success, data }` and `{ success: false, error }`
 * envelopes so route handlers never assemble them by hand.
 *
 * @example
 * ```typescript
 * router.get('/summary', async (c) => success(c, await repository.summary()));
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Omit rather than serialise undefined
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}
