/**
 * PostgreSQL database connection pool
 * Used by the postgres storage driver and the migration runner
 */

import pg from 'pg';
import dotenv from 'dotenv';
import pino from 'pino';

dotenv.config();

const { Pool } = pg;

const logger = pino({
  name: 'db',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Database configuration from environment variables
 */
const dbConfig: pg.PoolConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'courtroom_debates',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD,
  // DATABASE_URL wins over the individual settings when present
  connectionString: process.env.DATABASE_URL,
  ssl: process.env.DATABASE_URL && process.env.DB_SSL !== 'false'
    ? { rejectUnauthorized: false }
    : undefined,

  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};

/**
 * Shared connection pool. Connections open lazily on first query.
 */
export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.error({ error: err.message }, 'Unexpected error on idle database client');
});

/**
 * Test database connection
 */
export async function testConnection(): Promise<boolean> {
  let client: pg.PoolClient | undefined;
  try {
    client = await pool.connect();
    await client.query('SELECT NOW()');
    logger.info('Database connected successfully');
    return true;
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Database connection failed');
    return false;
  } finally {
    client?.release();
  }
}

/**
 * Gracefully close the database pool
 */
export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}

/**
 * Execute a query with slow-query logging
 */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await pool.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > 100) {
      logger.warn({ text, duration_ms: duration, rows: result.rowCount }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    logger.error({ text, error: error instanceof Error ? error.message : String(error) }, 'Query error');
    throw error;
  }
}

export type { Pool, PoolClient, QueryResult } from 'pg';
