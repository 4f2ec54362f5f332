/**
 * Knowledge Point Sync - Library Entry Point
 *
 * Identity resolution, mastery tracking, the on-device store and
 * reconciliation with the remote store, plus the container that wires them
 * and the Hono app of the companion server. The server entry point lives in
 * src/api/server.ts and the CLI in src/cli/index.ts.
 *
 * @example
 * ```typescript
 * import { createContainer, parseConfig } from 'knowledge-point-sync';
 *
 * const container = createContainer(parseConfig(process.env));
 * await container.repository.create({ category: 'Greetings', correctPhrase: 'How do you do?' });
 * ```
 */

export * from './core/models';
export * from './core/errors';
export * from './core/identity';
export * from './core/mastery';
export * from './core/concurrency';
export * from './core/knowledge-points';
export * from './core/sync';
export * from './remote';
export * from './storage';
export * from './api';

export {
  configSchema,
  parseConfig,
  loadConfig,
  validateConfig,
  isProduction,
  ConfigValidationError,
  type Config,
  type Environment,
} from './config';

export { createContainer, type Container, type ContainerOverrides } from './container';
