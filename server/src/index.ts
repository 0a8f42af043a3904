/**
 * modsync server entry point
 */

import dotenv from 'dotenv';
import { getLog, loadServerConfig } from '@modsync/core';
import { createApp } from './app';
import { createServerContext } from './context';

dotenv.config();

const log = getLog('server');

async function main(): Promise<void> {
  const config = loadServerConfig(process.env);
  const context = await createServerContext(config);
  await context.blobs.cleanupTemp();

  const app = createApp(context);
  const server = app.listen(config.port, () => {
    log.info(
      { port: config.port, database: config.databasePath, uploads: config.uploadsDirectory },
      'Server listening'
    );
  });
  server.requestTimeout = config.requestTimeoutMs;

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    server.close(() => {
      context.close().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error({ err: error }, 'Failed to close database');
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
