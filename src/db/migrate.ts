/**
 * Database migration CLI
 *
 * Usage: npm run db:migrate [run|status]
 */

import pino from 'pino';
import { pool, closePool } from './connection.js';
import { getMigrationFiles, isMigrationApplied, runMigrationsOnStartup } from './runMigrations.js';

const logger = pino({
  name: 'migrate',
  level: process.env.LOG_LEVEL || 'info',
});

async function runMigrations(): Promise<void> {
  const result = await runMigrationsOnStartup();
  if (!result.success) {
    process.exitCode = 1;
    return;
  }
  logger.info({ applied: result.applied, skipped: result.skipped }, 'All migrations completed');
}

async function showMigrationStatus(): Promise<void> {
  const result = await pool.query<{ version: string; applied_at: Date }>(
    'SELECT version, applied_at FROM schema_migrations ORDER BY applied_at ASC'
  ).catch((error: unknown) => {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Could not read schema_migrations');
    return null;
  });

  logger.info({ applied: result?.rows ?? [] }, 'Applied migrations');

  for (const migration of getMigrationFiles()) {
    const version = migration.replace('.sql', '');
    logger.info({ version, applied: await isMigrationApplied(version) }, 'Available migration');
  }
}

const command = process.argv[2] ?? 'run';

try {
  if (command === 'status') {
    await showMigrationStatus();
  } else {
    await runMigrations();
  }
} catch (error) {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Migration command failed');
  process.exitCode = 1;
} finally {
  await closePool();
}
