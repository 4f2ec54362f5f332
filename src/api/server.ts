/**
 * Companion API Server
 *
 * Starts the Hono app on Node with @hono/node-server. Besides serving
 * requests it drives the automatic sync triggers:
 * - at start-up, when REMOTE_API_TOKEN is set, pending local points are
 *   promoted (the sign-in trigger)
 * - every minute it offers a foreground trigger, which runs only when the
 *   last run is older than SYNC_FOREGROUND_THRESHOLD_MS
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT, HOST, LOCAL_DB_PATH, REMOTE_API_URL, REMOTE_API_TOKEN, ...
 *   (see src/config.ts)
 */

import { createServer } from 'node:net';
import { serve } from '@hono/node-server';
import { loadConfig, validateConfig } from '@/config';
import { createContainer } from '@/container';
import { createApp } from './app';

const MAX_PORT_ATTEMPTS = 100;
const FOREGROUND_CHECK_INTERVAL_MS = 60 * 1000;

/**
 * Finds a free port, starting at `preferredPort` and counting up.
 *
 * @throws Error when none of the next MAX_PORT_ATTEMPTS ports is free
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = preferredPort + MAX_PORT_ATTEMPTS
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    if (await isPortFree(port)) {
      return port;
    }
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }
  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

function isPortFree(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = createServer();
    probe.once('error', () => resolve(false));
    probe.listen(port, () => {
      probe.close(() => resolve(true));
    });
  });
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const container = createContainer(config);
  const app = createApp(container);
  const port = await findAvailablePort(config.server.port);

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host });

  console.log('');
  console.log('╔═══════════════════════════════════════════════════════════╗');
  console.log('║           Knowledge Point Sync Server                     ║');
  console.log('╠═══════════════════════════════════════════════════════════╣');
  console.log(`║  Listening:   http://${config.server.host}:${port}`);
  console.log(`║  Environment: ${config.server.nodeEnv}`);
  console.log(`║  Local store: ${config.localStore.dbPath}`);
  console.log(`║  Remote API:  ${config.remote.baseUrl}`);
  console.log(`║  Signed in:   ${container.session.isAuthenticated() ? 'yes' : 'no (guest)'}`);
  console.log('╚═══════════════════════════════════════════════════════════╝');
  console.log('');

  if (container.session.isAuthenticated()) {
    await container.coordinator.onAuthenticated();
  }

  const foregroundTimer = setInterval(() => {
    container.coordinator.onForeground().catch((error: unknown) => {
      console.error('[Server] Foreground sync check failed:', error);
    });
  }, FOREGROUND_CHECK_INTERVAL_MS);

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    clearInterval(foregroundTimer);
    container.coordinator.onLogout();
    server.close(() => {
      container.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
