/**
 * Node.js entry point
 *
 * Startup order: configuration, book data, context, HTTP server.
 * A data file that exists but cannot be read aborts startup.
 * SIGHUP reloads the data file in place.
 */

import { serve } from '@hono/node-server';
import { loadConfig, type AppConfig } from './config.js';
import { AppContext } from './context.js';
import { createApp } from './app.js';
import { Logger } from '../lib/logger.js';
import { loadBooks } from './services/book-loader.js';
import { BookStore } from './services/book-store.js';

async function loadStore(config: AppConfig, type: 'startup' | 'reload'): Promise<BookStore> {
  const logger = Logger.forStartup(config.logging, type);
  const result = await loadBooks(config.data.file, logger);
  return BookStore.from(result.records, { source: config.data.file, skipped: result.skipped });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logging);
  logger.info('API startup', { version: config.version });

  const store = await loadStore(config, 'startup');
  const context = new AppContext({ config, logger, store });
  const app = createApp(context);

  const server = serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  }, (info) => {
    logger.info(`Listening on http://${info.address}:${info.port}`, { books: store.size });
  });

  process.on('SIGHUP', () => {
    loadStore(config, 'reload').then(
      (fresh) => {
        context.replaceStore(fresh);
        logger.info('Book data reloaded', { books: fresh.size, skipped: fresh.skipped });
      },
      (error: unknown) => {
        logger.error('Book data reload failed, keeping the current collection', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    );
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', { error: error.message });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('[FATAL] Startup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
