/**
 * Request Validation Middleware
 *
 * Parses the JSON body (or the query string) with a Zod schema before the
 * handler runs. Invalid input is answered with a 400 and never reaches the
 * handler; valid input is stored on the context, typed by the schema.
 *
 * @example
 * ```typescript
 * router.post('/', validate(createKnowledgePointSchema), async (c) => {
 *   const input = c.get('validatedBody'); // CreateKnowledgePointInput
 *   ...
 * });
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { ErrorCodes } from './error-handler';
import { error } from '../utils/response';

function toDetails(err: z.ZodError): ValidationErrorDetail[] {
  return err.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validates the JSON request body.
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedBody: z.infer<T> } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return error(c, ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return error(c, ErrorCodes.VALIDATION_ERROR, 'Invalid request body', 400, toDetails(result.error));
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

/**
 * Validates the query string. Every value arrives as a string.
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedQuery: z.infer<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return error(c, ErrorCodes.VALIDATION_ERROR, 'Invalid query parameters', 400, toDetails(result.error));
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}
