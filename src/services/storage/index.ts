/**
 * Storage Services Barrel Export
 */

import type { KeyValueStore } from '../../types/store.js';
import { storageConfig, type StorageConfig } from '../../config/storage.js';
import { DebateStore } from './debate-store.js';
import { FileKeyValueStore } from './file-store.js';
import { MemoryKeyValueStore } from './memory-store.js';
import { PostgresKeyValueStore } from './postgres-store.js';

export { DebateStore } from './debate-store.js';
export { FileKeyValueStore } from './file-store.js';
export { MemoryKeyValueStore } from './memory-store.js';
export { PostgresKeyValueStore } from './postgres-store.js';

/**
 * Driver selected by STORAGE_DRIVER
 */
export function createKeyValueStore(config: StorageConfig = storageConfig): KeyValueStore {
  switch (config.driver) {
    case 'postgres':
      return new PostgresKeyValueStore();
    case 'memory':
      return new MemoryKeyValueStore();
    case 'file':
      return new FileKeyValueStore(config.dataDir);
  }
}

export function createDebateStore(config: StorageConfig = storageConfig): DebateStore {
  return new DebateStore(createKeyValueStore(config));
}
