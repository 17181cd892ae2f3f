/**
 * Server entry point
 *
 * Usage:
 *   JIRA_DOMAIN=acme.atlassian.net JIRA_EMAIL=... JIRA_API_TOKEN=... npx tsx src/main.ts
 *   # or without credentials, for webhook intake and dreaming only:
 *   npx tsx src/main.ts
 */

import { logger as processLogger, toError } from '@sprint-garden/core';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createHttpServer } from './http/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const app = await createApp(config);
  const { logger, queue } = app;

  const server = createHttpServer({ routes: app.routes, logger });
  queue.start();

  server.listen(config.port, () => {
    logger.info('Server listening', {
      port: config.port,
      providers: app.registry.list().map((provider) => ({
        name: provider.name,
        configured: provider.isConfigured(),
      })),
      garden: config.garden.url ?? 'log-only',
      dreamStore: config.dreaming.store,
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down', { signal, queue: queue.status() });

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await queue.drain();
    await queue.stop();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', toError(error));
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  processLogger.error('Startup failed', toError(error));
  process.exit(1);
});
