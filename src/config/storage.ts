/**
 * Storage Configuration
 *
 * Selects the persistence driver for cases, debates and statistics.
 */

import { config } from 'dotenv';
import { getEnvVar } from './env.js';

config();

export type StorageDriver = 'file' | 'postgres' | 'memory';

export interface StorageConfig {
  driver: StorageDriver;
  /** Directory holding debates.json and statistics.json for the file driver */
  dataDir: string;
}

function validateDriver(driver: string): StorageDriver {
  if (driver !== 'file' && driver !== 'postgres' && driver !== 'memory') {
    throw new Error(`Invalid storage driver: ${driver}. Must be 'file', 'postgres' or 'memory'`);
  }
  return driver;
}

export const storageConfig: StorageConfig = {
  driver: validateDriver(getEnvVar('STORAGE_DRIVER', false, 'file')),
  dataDir: getEnvVar('DATA_DIR', false, './data'),
};
