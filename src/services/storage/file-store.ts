/**
 * File-backed key/value store
 *
 * Each key maps to `<dataDir>/<key>.json`. Writes go to a temp file that is
 * then renamed over the target, so readers never see a half-written file.
 */

import { promises as fs } from 'fs';
import path from 'path';
import pino from 'pino';
import type { DocumentKey, KeyValueStore } from '../../types/store.js';

const logger = pino({
  name: 'file-store',
  level: process.env.LOG_LEVEL || 'info',
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileKeyValueStore implements KeyValueStore {
  readonly driver = 'file';

  constructor(private readonly dataDir: string) {}

  filePath(key: DocumentKey): string {
    return path.join(this.dataDir, `${key}.json`);
  }

  /**
   * Parsed document, or undefined when the file is missing or not valid JSON
   */
  async get(key: DocumentKey): Promise<unknown> {
    const filePath = this.filePath(key);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn({ filePath, error: error instanceof Error ? error.message : String(error) }, 'Could not read store file');
      }
      return undefined;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      logger.warn({ filePath, error: error instanceof Error ? error.message : String(error) }, 'Store file is not valid JSON; ignoring');
      return undefined;
    }
  }

  async set(key: DocumentKey, value: unknown): Promise<void> {
    const filePath = this.filePath(key);
    const tmpPath = `${filePath}.${process.pid}.tmp`;

    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    await fs.rename(tmpPath, filePath);
  }
}
