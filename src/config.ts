/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration loaded from environment variables.
 * There is no module-level instance: the entry points call `loadConfig()`
 * once and hand the result to `createContainer`, and tests build their own
 * with `parseConfig`.
 *
 * Usage:
 *   import { loadConfig, validateConfig } from './config';
 *
 *   const config = loadConfig();
 *   validateConfig(config); // production checks, throws if invalid
 *   console.log(config.server.port);
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
export const configSchema = z.object({
  // Local companion HTTP server
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('127.0.0.1'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // On-device store
  localStore: z.object({
    dbPath: z.string().min(1).default('./data/knowledge-points.db'),
    maxGuestPoints: z.number().int().nonnegative().default(20),
  }),

  // Remote store API
  remote: z.object({
    baseUrl: z.string().url().default('http://localhost:8000/api'),
    timeoutMs: z.number().int().positive().default(15000),
    apiToken: z.string().min(1).optional(),
  }),

  // Reconciliation triggers
  reconciliation: z.object({
    foregroundThresholdMs: z.number().int().nonnegative().default(60 * 60 * 1000),
    promotionDelayMs: z.number().int().nonnegative().default(500),
  }),

  // CORS configuration
  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

/** Environment variables the loader reads */
export type Environment = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Unset variables yield undefined (the schema default applies); anything
 * that is not an integer is passed through as NaN so the schema rejects it.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : Number.NaN;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Constructs the raw, unvalidated config object from environment variables.
 */
function loadFromEnvironment(env: Environment) {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: emptyToUndefined(env.HOST),
      nodeEnv: emptyToUndefined(env.NODE_ENV),
    },
    localStore: {
      dbPath: emptyToUndefined(env.LOCAL_DB_PATH),
      maxGuestPoints: parseIntOrUndefined(env.MAX_GUEST_POINTS),
    },
    remote: {
      baseUrl: emptyToUndefined(env.REMOTE_API_URL),
      timeoutMs: parseIntOrUndefined(env.REMOTE_TIMEOUT_MS),
      apiToken: emptyToUndefined(env.REMOTE_API_TOKEN),
    },
    reconciliation: {
      foregroundThresholdMs: parseIntOrUndefined(env.SYNC_FOREGROUND_THRESHOLD_MS),
      promotionDelayMs: parseIntOrUndefined(env.SYNC_PROMOTION_DELAY_MS),
    },
    cors: {
      allowedOrigins: parseCommaSeparated(env.ALLOWED_ORIGINS),
    },
  };
}

/** Environment variable behind each config path, for error messages */
const ENV_NAMES: Record<string, string> = {
  'server.port': 'PORT',
  'server.host': 'HOST',
  'server.nodeEnv': 'NODE_ENV',
  'localStore.dbPath': 'LOCAL_DB_PATH',
  'localStore.maxGuestPoints': 'MAX_GUEST_POINTS',
  'remote.baseUrl': 'REMOTE_API_URL',
  'remote.timeoutMs': 'REMOTE_TIMEOUT_MS',
  'remote.apiToken': 'REMOTE_API_TOKEN',
  'reconciliation.foregroundThresholdMs': 'SYNC_FOREGROUND_THRESHOLD_MS',
  'reconciliation.promotionDelayMs': 'SYNC_PROMOTION_DELAY_MS',
  'cors.allowedOrigins': 'ALLOWED_ORIGINS',
};

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses configuration from an environment map.
 *
 * @throws {ConfigValidationError} listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = parseConfig({ PORT: '4000', MAX_GUEST_POINTS: '5' });
 * config.localStore.maxGuestPoints; // 5
 * ```
 */
export function parseConfig(env: Environment): Config {
  const result = configSchema.safeParse(loadFromEnvironment(env));
  if (result.success) {
    return result.data;
  }

  const invalidVars = result.error.errors.map((issue) => {
    const path = issue.path.slice(0, 2).join('.');
    return { name: ENV_NAMES[path] ?? path, reason: issue.message };
  });
  throw new ConfigValidationError(
    `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
    [],
    invalidVars
  );
}

/**
 * Parses configuration from `process.env`.
 */
export function loadConfig(): Config {
  return parseConfig(process.env);
}

/**
 * Validates the configuration and throws detailed errors for production requirements.
 *
 * In production mode:
 * - REMOTE_API_URL must use https
 * - LOCAL_DB_PATH must not be ':memory:'
 *
 * @throws {ConfigValidationError} If the configuration is unfit for production
 *
 * @example
 * ```typescript
 * try {
 *   validateConfig(config);
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Invalid vars:', error.invalidVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function validateConfig(config: Config): void {
  const invalidVars: { name: string; reason: string }[] = [];

  if (config.server.nodeEnv === 'production') {
    if (!config.remote.baseUrl.startsWith('https://')) {
      invalidVars.push({
        name: 'REMOTE_API_URL',
        reason: 'The remote API must be reached over https in production',
      });
    }
    if (config.localStore.dbPath === ':memory:') {
      invalidVars.push({
        name: 'LOCAL_DB_PATH',
        reason: 'An in-memory database loses guest data on restart',
      });
    }
  }

  if (invalidVars.length > 0) {
    const invalidDescriptions = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    const fullMessage = [
      '╔═══════════════════════════════════════════════════════════════════════╗',
      '║  CONFIGURATION ERROR                                                  ║',
      '╠═══════════════════════════════════════════════════════════════════════╣',
      `║  Invalid configuration: ${invalidDescriptions}`,
      '╚═══════════════════════════════════════════════════════════════════════╝',
    ].join('\n');

    throw new ConfigValidationError(fullMessage, [], invalidVars);
  }
}

/**
 * Helper function to check if a configuration runs in production mode.
 */
export function isProduction(config: Config): boolean {
  return config.server.nodeEnv === 'production';
}
