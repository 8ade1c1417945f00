/**
 * Courtroom Debate Engine server
 * Main entry point: wires config, storage and the debate service into Express
 */

import { config } from 'dotenv';
config();

import type { Server } from 'http';
import { createApp } from './app.js';
import { DebateService } from './services/debate/debate-service.js';
import { createDebateStore } from './services/storage/index.js';
import { storageConfig } from './config/storage.js';
import { validateLLMConfig } from './config/llm.js';
import { debateRunConfig } from './config/debate-protocol.js';
import { runMigrationsOnStartup } from './db/runMigrations.js';
import { testConnection } from './db/connection.js';
import { logger, logShutdown, logStartup, loggedOperation } from './services/logging/index.js';

const PORT = process.env.PORT || 3000;

const store = createDebateStore(storageConfig);
const service = new DebateService({ store });
const app = createApp(service);

let server: Server | null = null;

/**
 * Start the server
 * Validates configuration and runs migrations for the postgres driver first
 */
async function start(): Promise<void> {
  try {
    if (!debateRunConfig.useMockAgents) {
      validateLLMConfig();
    }

    if (storageConfig.driver === 'postgres') {
      if (!(await testConnection())) {
        logger.error('Database unreachable - server not started');
        process.exit(1);
      }

      const migrationResult = await runMigrationsOnStartup();
      if (!migrationResult.success) {
        logger.error({ error: migrationResult.error }, 'Database migration failed - server not started');
        process.exit(1);
      }
    }

    await loggedOperation('recover_interrupted', () => service.recoverInterrupted(), {
      storage: storageConfig.driver,
    });

    logStartup(PORT);
    server = app.listen(PORT, () => {
      logger.info({ port: PORT, storage: storageConfig.driver, mockAgents: debateRunConfig.useMockAgents }, 'Server started');
    });

    server.on('error', (error: Error) => {
      logger.error({ error: error.message }, 'Server error');
      process.exit(1);
    });
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 * Stops accepting requests, waits for running debates, then closes storage
 */
async function shutdown(signal: string): Promise<void> {
  logShutdown(signal);

  if (server) {
    server.close(() => {
      logger.info('HTTP server closed');
    });
  }

  try {
    await service.drain();
    await store.close();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
  void shutdown('uncaughtException');
});

void start();

export { app, service, start, shutdown };
