/**
 * Programmatic migration runner
 * Applies pending SQL files from ./migrations in name order
 */

import { readFileSync, readdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import pino from 'pino';
import { pool } from './connection.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATIONS_DIR = join(__dirname, 'migrations');

const logger = pino({
  name: 'migrations',
  level: process.env.LOG_LEVEL || 'info',
});

export interface MigrationResult {
  success: boolean;
  applied: string[];
  skipped: string[];
  error?: string;
}

/**
 * Check if a migration has already been applied
 */
export async function isMigrationApplied(version: string): Promise<boolean> {
  try {
    const result = await pool.query(
      'SELECT version FROM schema_migrations WHERE version = $1',
      [version]
    );
    return result.rowCount !== null && result.rowCount > 0;
  } catch (error) {
    // No schema_migrations table yet means nothing has run
    if (error instanceof Error && error.message.includes('does not exist')) {
      return false;
    }
    throw error;
  }
}

/**
 * Migration file names in order
 */
export function getMigrationFiles(): string[] {
  try {
    return readdirSync(MIGRATIONS_DIR)
      .filter((f) => f.endsWith('.sql'))
      .sort();
  } catch (error) {
    logger.warn({ dir: MIGRATIONS_DIR, error: error instanceof Error ? error.message : String(error) }, 'No migrations directory found');
    return [];
  }
}

async function executeMigration(filename: string): Promise<boolean> {
  const version = filename.replace('.sql', '');

  if (await isMigrationApplied(version)) {
    logger.debug({ version }, 'Migration already applied, skipping');
    return false;
  }

  logger.info({ version }, 'Running migration');
  const sql = readFileSync(join(MIGRATIONS_DIR, filename), 'utf-8');
  await pool.query(sql);
  logger.info({ version }, 'Migration completed');
  return true;
}

/**
 * Run all pending migrations. Safe to call on every start.
 */
export async function runMigrationsOnStartup(): Promise<MigrationResult> {
  const applied: string[] = [];
  const skipped: string[] = [];

  try {
    const client = await pool.connect();
    client.release();

    for (const migration of getMigrationFiles()) {
      const version = migration.replace('.sql', '');
      if (await executeMigration(migration)) {
        applied.push(version);
      } else {
        skipped.push(version);
      }
    }

    logger.info({ applied: applied.length, skipped: skipped.length }, 'Database schema is up to date');
    return { success: true, applied, skipped };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error({ error: errorMessage }, 'Migration failed');
    return { success: false, applied, skipped, error: errorMessage };
  }
}
