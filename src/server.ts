/**
 * =============================================================================
 * FOODGO BACKEND - MAIN SERVER
 * =============================================================================
 *
 * Starts the HTTP listener for the app built in app.ts and owns process
 * lifecycle: fatal error handlers and graceful shutdown (stop accepting
 * connections, then close the store's pool).
 * =============================================================================
 */

import { createServer } from 'http';
import { config } from './config/environment';
import { logError, logger } from './shared/services/logger.service';
import { closeStore, getStore } from './shared/database/db';
import { createApp, API_PREFIX } from './app';

const app = createApp();
const server = createServer(app);

const PORT = config.port;

server.listen(PORT, '0.0.0.0', () => {
  server.timeout = 30000;
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  logger.info('Server started', {
    port: PORT,
    environment: config.nodeEnv,
    driver: getStore().driver,
    emailMode: config.email.mode,
    api: API_PREFIX
  });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('Unhandled rejection', reason);
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');

    closeStore()
      .then(() => {
        logger.info('Graceful shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Error closing database connection', {
          error: error instanceof Error ? error.message : String(error)
        });
        process.exit(1);
      });
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
