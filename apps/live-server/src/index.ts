import { serve } from '@hono/node-server';
import { createLogger, flushLoggers } from '@parlor/chat-observability';
import {
  createLiveUpdates,
  createMessageEventsRouteHandler,
  loadLiveConfig,
  PgMessageSource,
} from '@parlor/chat-messages';
import { Client, Pool } from 'pg';
import { createApp } from './app.js';
import { listenClientConfig, messagePoolConfig } from './database.js';
import { resolveViewerId } from './viewer.js';

/**
 * Live update server entry point.
 * Starts the change feed and topic router, then serves the per-channel
 * event streams on PORT.
 */

const logger = createLogger('LiveServer');
const config = loadLiveConfig();

const pool = new Pool(messagePoolConfig(config));
pool.on('error', (error) => {
  logger.error({ err: error }, 'Idle database client error');
});

const live = await createLiveUpdates({
  source: new PgMessageSource(pool),
  createListenClient: () => new Client(listenClientConfig(config)),
  registrationTimeoutMs: config.registrationTimeoutMs,
  idleTimeoutMs: config.idleTimeoutMs,
  reconnectDelayMs: config.reconnectDelayMs,
});

const app = createApp({
  handleMessageEvents: createMessageEventsRouteHandler({
    gateway: live.gateway,
    resolveViewerId,
    keepAliveMs: config.keepAliveMs,
  }),
  healthCheck: () => live.healthCheck(),
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port }, 'Live server listening');
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down live server');

  server.close();
  await live.stop();
  await pool.end();
  await flushLoggers();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Live server shutdown failed');
        process.exit(1);
      },
    );
  });
}
