/**
 * Debate Store
 *
 * Typed access to the two persisted documents (cases plus debates, and
 * statistics) over any KeyValueStore driver. Every read-modify-write goes
 * through withLock, a single-slot Bottleneck queue, so concurrent debates
 * never overwrite each other's updates.
 */

import Bottleneck from 'bottleneck';
import type { DebateStoreData, KeyValueStore, StatisticsData } from '../../types/store.js';
import { DEBATES_KEY, STATISTICS_KEY } from '../../types/store.js';
import { sanitizeDebateStore, sanitizeStatistics } from '../validation/validators.js';
import { loggers } from '../logging/log-helpers.js';

export class DebateStore {
  private readonly lock = new Bottleneck({ maxConcurrent: 1 });

  constructor(private readonly kv: KeyValueStore) {}

  get driver(): string {
    return this.kv.driver;
  }

  async loadDebateStore(): Promise<DebateStoreData> {
    return this.timed('load_debates', async () => sanitizeDebateStore(await this.kv.get(DEBATES_KEY)));
  }

  async saveDebateStore(store: DebateStoreData): Promise<void> {
    await this.timed('save_debates', () => this.kv.set(DEBATES_KEY, store));
  }

  async loadStatistics(): Promise<StatisticsData> {
    return this.timed('load_statistics', async () => sanitizeStatistics(await this.kv.get(STATISTICS_KEY)));
  }

  async saveStatistics(stats: StatisticsData): Promise<void> {
    await this.timed('save_statistics', () => this.kv.set(STATISTICS_KEY, stats));
  }

  /**
   * Run `fn` while holding the store lock. Callers queue in FIFO order; the
   * lock is released when `fn` settles, whether it resolved or threw.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.schedule(fn);
  }

  async close(): Promise<void> {
    await this.lock.stop({ dropWaitingJobs: false });
    await this.kv.close?.();
  }

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      loggers.storeOperation(operation, this.kv.driver, Date.now() - start, true);
      return result;
    } catch (error) {
      loggers.storeOperation(operation, this.kv.driver, Date.now() - start, false);
      throw error;
    }
  }
}
