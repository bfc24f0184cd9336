import { ARequestDeduplicator } from './ARequestDeduplicator.js';
import type { RequestDeduplicatorConfig } from './ARequestDeduplicator.js';
import type { RequestDeduplicatorStats } from './ARequestDeduplicator.js';
import type { DeduplicateResult } from './ARequestDeduplicator.js';
import { logger } from '../logging/logger.js';

export type {
  RequestDeduplicatorConfig,
  RequestDeduplicatorStats,
  DeduplicateResult,
} from './ARequestDeduplicator.js';

const DEFAULT_CONFIG: RequestDeduplicatorConfig = {
  name: 'default',
};

export class RequestDeduplicator extends ARequestDeduplicator {
  private config: RequestDeduplicatorConfig;
  private pending: Map<string, Promise<unknown>> = new Map();

  private deduplicatedCount = 0;
  private executedCount = 0;
  private successCount = 0;
  private failureCount = 0;

  constructor(config: Partial<RequestDeduplicatorConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async deduplicate<T>(key: string, operation: () => Promise<T>): Promise<DeduplicateResult<T>> {
    const existing = this.pending.get(key);

    if (existing) {
      this.deduplicatedCount++;

      logger.debug(`Request deduplicated [${this.config.name}]`, {
        component: 'RequestDeduplicator',
        key,
        pendingCount: this.pending.size,
      });

      // Only this class stores promises under `key`, always from operation(): Promise<T>
      const data = (await existing) as T;
      return { data, wasDeduplicated: true, key };
    }

    this.executedCount++;
    const promise = operation();
    this.pending.set(key, promise);

    try {
      const data = await promise;
      this.successCount++;
      return { data, wasDeduplicated: false, key };
    } catch (error) {
      this.failureCount++;
      throw error;
    } finally {
      if (this.pending.get(key) === promise) {
        this.pending.delete(key);
      }
    }
  }

  isPending(key: string): boolean {
    return this.pending.has(key);
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  getStats(): RequestDeduplicatorStats {
    return {
      pendingCount: this.pending.size,
      deduplicatedCount: this.deduplicatedCount,
      executedCount: this.executedCount,
      successCount: this.successCount,
      failureCount: this.failureCount,
    };
  }

  resetStats(): void {
    this.deduplicatedCount = 0;
    this.executedCount = 0;
    this.successCount = 0;
    this.failureCount = 0;
  }

  /**
   * Forget in-flight operations. Callers already waiting keep their promise;
   * the next caller starts a new operation.
   */
  clear(): void {
    this.pending.clear();
  }

  override async dispose(): Promise<void> {
    this.clear();
  }
}
