/**
 * Cache Types
 *
 * Type definitions for the cache coordinator.
 */

/**
 * Where an optimistic insert lands in a domain's ordered collection.
 */
export type InsertPosition = 'start' | 'end';

/**
 * Lifecycle state of a single slot, derived from its age.
 */
export type SlotState = 'empty' | 'fresh' | 'stale-servable' | 'expired';

/**
 * How one domain is fetched and identified.
 */
export interface DomainDefinition<T> {
  /** Fetch the whole collection; rejects with a RefreshError */
  fetch: () => Promise<T[]>;
  /** Identity key for optimistic update/remove. Domains without one are read-only. */
  keyOf?: (item: T) => string;
  /** Position for optimistic inserts (default: 'end') */
  insertAt?: InsertPosition;
}

/**
 * Domain name -> record type.
 */
export type DomainRecordMap = Record<string, unknown>;

export type DomainDefinitions<M extends DomainRecordMap> = {
  [D in keyof M]: DomainDefinition<M[D]>;
};

export type DomainName<M extends DomainRecordMap> = Extract<keyof M, string>;

/**
 * Cache coordinator configuration
 */
export interface CacheCoordinatorConfig {
  /** Age below which cached data is served without a network call (default: 5 minutes) */
  freshWindowMs: number;
  /** Age at which a cache hit also schedules a background refresh (default: 1 minute) */
  backgroundThresholdMs: number;
  /** Share one in-flight fetch between concurrent callers of a domain (default: false) */
  singleFlight: boolean;
  /** Millisecond clock (default: Date.now) */
  clock: () => number;
}

/**
 * Options for a single read
 */
export interface GetOptions {
  /** Skip the cache and fetch synchronously (default: false) */
  forceRefresh?: boolean;
  /** Allow a hit in the background zone to schedule a refresh (default: true) */
  allowBackgroundRefresh?: boolean;
}

/**
 * Per-domain counters kept by the coordinator.
 */
export interface DomainCounters {
  hits: number;
  misses: number;
  fetches: number;
  fetchFailures: number;
  backgroundRefreshes: number;
  backgroundFailures: number;
}

/**
 * One domain's entry in a statistics snapshot.
 */
export interface DomainStatistics extends DomainCounters {
  count: number;
  /** Milliseconds since the last successful fetch; Infinity if never fetched */
  ageMs: number;
  isFresh: boolean;
  state: SlotState;
}

export interface CacheStatistics<D extends string = string> {
  takenAt: number;
  freshWindowMs: number;
  backgroundThresholdMs: number;
  domains: Record<D, DomainStatistics>;
}
