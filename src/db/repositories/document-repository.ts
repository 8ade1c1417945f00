/**
 * Document Repository
 * Reads and upserts JSON documents in the document_store table
 */

import pino from 'pino';
import { query } from '../connection.js';

const logger = pino({
  name: 'document-repository',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Raw row shape of document_store
 */
export interface DocumentRow {
  key: string;
  value: unknown;
  updated_at: Date;
}

/**
 * Find a document by key. Resolves undefined when it was never written.
 */
export async function findByKey(key: string): Promise<unknown> {
  const sql = 'SELECT key, value, updated_at FROM document_store WHERE key = $1';

  try {
    const result = await query<DocumentRow>(sql, [key]);
    const row = result.rows[0];
    return row ? row.value : undefined;
  } catch (error) {
    logger.error({ key, error: error instanceof Error ? error.message : String(error) }, 'Error reading document');
    throw new Error(
      `Failed to read document ${key}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Insert or replace a document
 */
export async function upsert(key: string, value: unknown): Promise<void> {
  const sql = `
    INSERT INTO document_store (key, value, updated_at)
    VALUES ($1, $2, NOW())
    ON CONFLICT (key)
    DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()
  `;

  try {
    await query(sql, [key, JSON.stringify(value)]);
  } catch (error) {
    logger.error({ key, error: error instanceof Error ? error.message : String(error) }, 'Error writing document');
    throw new Error(
      `Failed to write document ${key}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export default {
  findByKey,
  upsert,
};
