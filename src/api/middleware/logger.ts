/**
 * Request Logger
 *
 * One line per request, written once the response is ready:
 *
 * ```
 * [API] POST    /api/knowledge-points/7:3/outcome 200 - 4ms
 * ```
 *
 * Colours are used outside production. Health checks are not logged.
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Path prefixes that are not logged */
  skipPaths: string[];
  colorize: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function statusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  return colors.green;
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ colorize: false }));
 * ```
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const { prefix, skipPaths, colorize } = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startedAt = performance.now();
    await next();
    const elapsed = formatDuration(Math.round(performance.now() - startedAt));

    const method = c.req.method.padEnd(7);
    const status = c.res.status;

    console.log(
      colorize
        ? `${prefix} ${method} ${path} ${statusColor(status)}${status}${colors.reset} - ${colors.dim}${elapsed}${colors.reset}`
        : `${prefix} ${method} ${path} ${status} - ${elapsed}`
    );
  };
}
