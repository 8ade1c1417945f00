/**
 * In-process key/value store for tests and throwaway runs
 */

import type { DocumentKey, KeyValueStore } from '../../types/store.js';

export class MemoryKeyValueStore implements KeyValueStore {
  readonly driver = 'memory';
  private readonly documents = new Map<DocumentKey, string>();

  async get(key: DocumentKey): Promise<unknown> {
    const stored = this.documents.get(key);
    return stored === undefined ? undefined : JSON.parse(stored);
  }

  // Stored serialized so callers never share references with the store
  async set(key: DocumentKey, value: unknown): Promise<void> {
    this.documents.set(key, JSON.stringify(value));
  }
}
