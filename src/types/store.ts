/**
 * Persistence types
 */

import type { CaseRecord, DebateStatistics, DebateTranscript } from './debate.js';

/**
 * Keys under which the two documents are stored
 */
export const DEBATES_KEY = 'debates';
export const STATISTICS_KEY = 'statistics';

export type DocumentKey = typeof DEBATES_KEY | typeof STATISTICS_KEY;

/**
 * Minimal document store every driver implements.
 * `get` resolves undefined when the key has never been written.
 */
export interface KeyValueStore {
  readonly driver: string;
  get(key: DocumentKey): Promise<unknown>;
  set(key: DocumentKey, value: unknown): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Cases and debates, keyed by id
 */
export interface DebateStoreData {
  cases: Record<string, CaseRecord>;
  debates: Record<string, DebateTranscript>;
}

export type StatisticsData = DebateStatistics;
