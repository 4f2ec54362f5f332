/**
 * CORS Middleware
 *
 * The companion server is called from a local presentation layer (a dev
 * server or a desktop shell). Allowed origins come from ALLOWED_ORIGINS;
 * without any, the Vite dev server defaults apply.
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
  /** Preflight cache duration in seconds */
  maxAge: number;
}

export const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: ['http://localhost:5173', 'http://127.0.0.1:5173'],
  allowedMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  maxAge: 86400,
};

export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const allowedOrigins =
    config.allowedOrigins && config.allowedOrigins.length > 0
      ? config.allowedOrigins
      : DEFAULT_CORS_CONFIG.allowedOrigins;
  const finalConfig: CorsConfig = { ...DEFAULT_CORS_CONFIG, ...config, allowedOrigins };

  return cors({
    origin: finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    maxAge: finalConfig.maxAge,
  });
}
