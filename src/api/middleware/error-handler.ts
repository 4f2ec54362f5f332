/**
 * Error Handler
 *
 * Turns anything thrown by a route into the standard JSON error envelope:
 *
 * ```json
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "...", "details": {...} } }
 * ```
 *
 * Three kinds of error are recognised:
 * - AppError: raised by the HTTP layer itself, carries its own status
 * - KnowledgePointError: raised by the sync core, status chosen by code
 * - NotAuthenticatedError: an explicit sync without a signed-in user (401)
 *
 * Anything else is a 500. Stack traces are only included outside production.
 *
 * Register with `app.onError(errorHandler)` so errors from sub-routers are
 * caught as well.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  KnowledgePointError,
  KnowledgePointErrorCodes,
  type KnowledgePointErrorCode,
} from '@/core/errors';
import { NotAuthenticatedError } from '@/core/sync';
import type { ApiErrorResponse } from '../types';

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Codes raised by the HTTP layer. Sync-core failures use their own
 * KnowledgePointErrorCodes.
 */
export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status for each sync-core error code.
 */
export const KNOWLEDGE_POINT_ERROR_STATUS: Record<KnowledgePointErrorCode, ContentfulStatusCode> = {
  [KnowledgePointErrorCodes.IDENTITY_UNRESOLVABLE]: 422,
  [KnowledgePointErrorCodes.LOCAL_PERSISTENCE_FAILURE]: 503,
  [KnowledgePointErrorCodes.REMOTE_REJECTED]: 422,
  [KnowledgePointErrorCodes.REMOTE_UNREACHABLE]: 503,
  [KnowledgePointErrorCodes.NOT_FOUND]: 404,
  [KnowledgePointErrorCodes.GUEST_QUOTA_EXCEEDED]: 409,
};

// ============================================================================
// AppError
// ============================================================================

/**
 * Error raised by route handlers for request-level problems.
 *
 * @example
 * ```typescript
 * throw new AppError(ErrorCodes.BAD_REQUEST, 'Token is required', 400);
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

// ============================================================================
// Formatting
// ============================================================================

export function formatErrorResponse(
  error: unknown,
  isProduction: boolean = process.env.NODE_ENV === 'production'
): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof KnowledgePointError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: KNOWLEDGE_POINT_ERROR_STATUS[error.code],
    };
  }

  if (error instanceof NotAuthenticatedError) {
    return {
      response: {
        success: false,
        error: { code: ErrorCodes.UNAUTHORIZED, message: error.message },
      },
      statusCode: 401,
    };
  }

  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isProduction
            ? 'An unexpected error occurred. Please try again.'
            : error.message,
          ...(!isProduction && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(!isProduction && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * `app.onError` handler. 5xx responses are logged as errors, the rest as
 * warnings.
 */
export function errorHandler(err: Error, c: Context): Response {
  const { response, statusCode } = formatErrorResponse(err);

  if (statusCode >= 500) {
    console.error('[API] Request failed:', err);
  } else {
    console.warn(`[API] ${c.req.method} ${c.req.path} -> ${statusCode} ${response.error.code}`);
  }

  return c.json(response, statusCode);
}
