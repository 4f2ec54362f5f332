/**
 * CLI Entry Point
 *
 * Usage:
 * ```bash
 * npm run cli -- list --tier weak
 * npm run cli -- add "Greetings" "How do you do?"
 * npm run cli -- review 7:3 --wrong --severity high
 * npm run cli -- sync
 * ```
 *
 * Configuration comes from the same environment variables as the server
 * (LOCAL_DB_PATH, REMOTE_API_URL, REMOTE_API_TOKEN, ...). Without a token
 * every command works on the guest store.
 */

import { ZodError } from 'zod';
import { loadConfig } from '@/config';
import { createContainer, type Container } from '@/container';
import { KnowledgePointError } from '@/core/errors';
import { createProgram } from './program';
import { dim, red } from './utils/terminal';

function describeError(error: unknown): string {
  if (error instanceof KnowledgePointError) {
    return `${error.message} ${dim(`(${error.code})`)}`;
  }
  if (error instanceof ZodError) {
    return error.errors.map((issue) => issue.message).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<void> {
  let container: Container | null = null;
  try {
    container = createContainer(loadConfig());
    await createProgram(container).parseAsync(process.argv);
  } catch (error) {
    console.error(red(`Error: ${describeError(error)}`));
    if (process.env.DEBUG && error instanceof Error && error.stack) {
      console.error(dim(error.stack));
    }
    process.exitCode = 1;
  } finally {
    container?.close();
  }
}

main().catch((error: unknown) => {
  console.error(red('\nFatal error:'), error);
  process.exit(1);
});
