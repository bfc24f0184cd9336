/**
 * Abstract Request Deduplicator
 *
 * When several callers ask for the same resource at once, the deduplicator
 * runs the operation a single time and hands every caller the same result.
 */
import { AService } from '../../services/abstracts/AService.js';

export interface RequestDeduplicatorConfig {
  /** Name for logging and debugging purposes */
  name: string;
}

export interface RequestDeduplicatorStats {
  /** In-flight operations */
  pendingCount: number;
  /** Callers that joined an existing in-flight operation */
  deduplicatedCount: number;
  /** Operations actually started */
  executedCount: number;
  successCount: number;
  failureCount: number;
}

export interface DeduplicateResult<T> {
  data: T;
  /** True if this caller reused another caller's in-flight request */
  wasDeduplicated: boolean;
  key: string;
}

export abstract class ARequestDeduplicator extends AService {
  abstract deduplicate<T>(key: string, operation: () => Promise<T>): Promise<DeduplicateResult<T>>;

  abstract isPending(key: string): boolean;

  abstract getPendingCount(): number;

  abstract getStats(): RequestDeduplicatorStats;

  abstract resetStats(): void;

  abstract clear(): void;
}
