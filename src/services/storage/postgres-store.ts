/**
 * PostgreSQL key/value store over the document_store table
 */

import type { DocumentKey, KeyValueStore } from '../../types/store.js';
import * as documentRepository from '../../db/repositories/document-repository.js';
import { closePool } from '../../db/connection.js';

export class PostgresKeyValueStore implements KeyValueStore {
  readonly driver = 'postgres';

  async get(key: DocumentKey): Promise<unknown> {
    return documentRepository.findByKey(key);
  }

  async set(key: DocumentKey, value: unknown): Promise<void> {
    await documentRepository.upsert(key, value);
  }

  async close(): Promise<void> {
    await closePool();
  }
}
