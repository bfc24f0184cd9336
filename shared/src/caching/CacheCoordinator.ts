/**
 * Cache Coordinator
 *
 * Generic stale-while-revalidate engine. Owns one CacheSlot per domain and
 * decides, per read, whether to serve cached items, serve them while a
 * background refresh runs, or block on a fetch.
 *
 * Every slot read-check and every slot write runs inside that domain's
 * critical section. Fetches run outside it, so a slow fetch for one domain
 * never holds up reads of another, or of the same domain.
 *
 * @example
 * ```typescript
 * const cache = new CacheCoordinator({
 *   tasks: { fetch: () => source.fetchTasks(), keyOf: (task) => task.id },
 * });
 *
 * const tasks = await cache.get('tasks');
 * await cache.insert('tasks', draftTask);
 * ```
 */
import { AService } from '../services/abstracts/AService.js';
import { CacheSlot } from './CacheSlot.js';
import { BackgroundRefreshRunner } from './backgroundRefresh.js';
import { buildStatistics, type DomainSample } from './statistics.js';
import { CACHE } from '../config/constants.js';
import { KeyedMutex } from '../utils/concurrency/mutex.js';
import { RequestDeduplicator } from '../utils/resilience/requestDeduplicator.js';
import { CacheConfigError, toRefreshError } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';

import type {
  CacheCoordinatorConfig,
  CacheStatistics,
  DomainCounters,
  DomainDefinition,
  DomainDefinitions,
  DomainName,
  DomainRecordMap,
  GetOptions,
} from './types.js';

export const DEFAULT_COORDINATOR_CONFIG: CacheCoordinatorConfig = {
  freshWindowMs: CACHE.FRESH_WINDOW,
  backgroundThresholdMs: CACHE.BACKGROUND_THRESHOLD,
  singleFlight: CACHE.SINGLE_FLIGHT,
  clock: () => Date.now(),
};

type Slots<M extends DomainRecordMap> = { [D in keyof M]?: CacheSlot<M[D]> };

export class CacheCoordinator<M extends DomainRecordMap> extends AService {
  override readonly order: number = -30;

  private readonly config: CacheCoordinatorConfig;
  private readonly domains: DomainName<M>[];
  private readonly slots: Slots<M> = {};
  private readonly counters = new Map<DomainName<M>, DomainCounters>();
  private readonly locks = new KeyedMutex<DomainName<M>>();
  private readonly background = new BackgroundRefreshRunner();
  private readonly deduplicator = new RequestDeduplicator({ name: 'cache-refresh' });

  constructor(
    private readonly definitions: DomainDefinitions<M>,
    config: Partial<CacheCoordinatorConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_COORDINATOR_CONFIG, ...config };
    validateConfig(this.config);

    this.domains = Object.keys(definitions).filter((key): key is DomainName<M> => key in definitions);
    if (this.domains.length === 0) {
      throw new CacheConfigError('CacheCoordinator needs at least one domain');
    }
    for (const domain of this.domains) {
      this.slotFor(domain);
      this.counters.set(domain, emptyCounters());
    }
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Get a domain's items, from cache when fresh enough, otherwise from the
   * remote source. Rejects with a RefreshError if a required fetch fails;
   * the slot is left as it was.
   */
  async get<D extends DomainName<M>>(domain: D, options: GetOptions = {}): Promise<M[D][]> {
    const { forceRefresh = false, allowBackgroundRefresh = true } = options;

    if (!forceRefresh) {
      const cached = await this.locks.runExclusive(domain, () => {
        const slot = this.slotFor(domain);
        const { items, ageMs } = slot.read(this.config.clock());
        const counters = this.countersFor(domain);

        if (slot.isEmpty || ageMs >= this.config.freshWindowMs) {
          counters.misses++;
          logger.debug('Cache miss', { component: 'CacheCoordinator', domain, ageMs });
          return null;
        }

        counters.hits++;
        if (allowBackgroundRefresh && ageMs >= this.config.backgroundThresholdMs) {
          this.spawnBackgroundRefresh(domain);
        }
        return items;
      });

      if (cached) {
        return cached;
      }
    }

    return this.refresh(domain);
  }

  /**
   * Cached items without any network activity, fresh or not.
   */
  async peek<D extends DomainName<M>>(domain: D): Promise<M[D][]> {
    return this.locks.runExclusive(domain, () => this.slotFor(domain).read(this.config.clock()).items);
  }

  // ==========================================================================
  // Optimistic mutations
  // ==========================================================================

  /**
   * Add an item locally. Does not change the slot's age.
   */
  async insert<D extends DomainName<M>>(domain: D, item: M[D]): Promise<void> {
    const definition = this.mutableDefinition(domain);
    await this.locks.runExclusive(domain, () => {
      this.slotFor(domain).insertOptimistic(item, definition.insertAt ?? 'end');
    });
    logger.debug('Optimistic insert', { component: 'CacheCoordinator', domain });
  }

  /**
   * Replace the cached item with the same key. Returns false if it is not cached.
   */
  async update<D extends DomainName<M>>(domain: D, item: M[D]): Promise<boolean> {
    this.mutableDefinition(domain);
    const updated = await this.locks.runExclusive(domain, () => this.slotFor(domain).updateOptimistic(item));
    logger.debug('Optimistic update', { component: 'CacheCoordinator', domain, updated });
    return updated;
  }

  /**
   * Drop cached items with the given key. Returns the number removed.
   */
  async remove<D extends DomainName<M>>(domain: D, key: string): Promise<number> {
    this.mutableDefinition(domain);
    const removed = await this.locks.runExclusive(domain, () => this.slotFor(domain).removeOptimistic(key));
    logger.debug('Optimistic remove', { component: 'CacheCoordinator', domain, removed });
    return removed;
  }

  // ==========================================================================
  // Invalidation
  // ==========================================================================

  async invalidate(domain: DomainName<M>): Promise<void> {
    await this.locks.runExclusive(domain, () => {
      this.slotFor(domain).invalidate();
    });
    logger.info('Cache invalidated', { component: 'CacheCoordinator', domain });
  }

  /**
   * Invalidate several domains in one step, holding all of their locks, so no
   * reader sees some of them cleared and others still cached.
   */
  async invalidateMany(domains: readonly DomainName<M>[]): Promise<void> {
    await this.clearSlots(domains);
    logger.info('Caches invalidated', { component: 'CacheCoordinator', domains: domains.join(',') });
  }

  async invalidateAll(): Promise<void> {
    await this.clearSlots(this.domains);
    logger.info('All caches cleared', { component: 'CacheCoordinator', domains: this.domains.length });
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  /**
   * Consistent view of every slot, taken while holding all domain locks.
   */
  async snapshot(): Promise<CacheStatistics<DomainName<M>>> {
    return this.locks.runExclusiveAll(this.domains, () => {
      const now = this.config.clock();
      const samples = this.domains.map((domain): DomainSample<DomainName<M>> => ({
        domain,
        slot: this.slotFor(domain),
        counters: { ...this.countersFor(domain) },
      }));
      return buildStatistics(samples, this.config, now);
    });
  }

  getDomains(): DomainName<M>[] {
    return [...this.domains];
  }

  getConfig(): Readonly<CacheCoordinatorConfig> {
    return { ...this.config };
  }

  /**
   * Resolve once all background refreshes spawned so far have settled.
   */
  whenIdle(): Promise<void> {
    return this.background.whenIdle();
  }

  override async dispose(): Promise<void> {
    await this.whenIdle();
    await this.deduplicator.dispose();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async refresh<D extends DomainName<M>>(domain: D): Promise<M[D][]> {
    let items: M[D][];
    try {
      items = await this.fetchDomain(domain);
    } catch (error) {
      this.countersFor(domain).fetchFailures++;
      const refreshError = toRefreshError(error);
      logger.debug(`Fetch failed: ${refreshError.message}`, {
        component: 'CacheCoordinator',
        domain,
        kind: refreshError.kind,
      });
      throw refreshError;
    }

    await this.commit(domain, items);
    return [...items];
  }

  private fetchDomain<D extends DomainName<M>>(domain: D): Promise<M[D][]> {
    const definition = this.definitions[domain];
    const run = (): Promise<M[D][]> => {
      this.countersFor(domain).fetches++;
      return definition.fetch();
    };

    if (!this.config.singleFlight) {
      return run();
    }
    return this.deduplicator.deduplicate(`cache:${domain}`, run).then((result) => result.data);
  }

  private async commit<D extends DomainName<M>>(domain: D, items: readonly M[D][]): Promise<void> {
    await this.locks.runExclusive(domain, () => {
      this.slotFor(domain).write(items, this.config.clock());
    });
    logger.debug(`Cache updated (${items.length} ${domain})`, { component: 'CacheCoordinator', domain });
  }

  private spawnBackgroundRefresh<D extends DomainName<M>>(domain: D): void {
    const counters = this.countersFor(domain);
    counters.backgroundRefreshes++;
    this.background.spawn<M[D]>({
      domain,
      fetch: () => this.fetchDomain(domain),
      commit: (items) => this.commit(domain, items),
      onFailure: () => {
        counters.backgroundFailures++;
      },
    });
  }

  private clearSlots(domains: readonly DomainName<M>[]): Promise<void> {
    return this.locks.runExclusiveAll(domains, () => {
      for (const domain of domains) {
        this.slotFor(domain).invalidate();
      }
    });
  }

  private slotFor<D extends DomainName<M>>(domain: D): CacheSlot<M[D]> {
    const existing = this.slots[domain];
    if (existing) {
      return existing;
    }
    const definition = this.definitions[domain];
    if (!definition) {
      throw new CacheConfigError(`Unknown cache domain: ${domain}`);
    }
    const slot = new CacheSlot<M[D]>(definition.keyOf);
    this.slots[domain] = slot;
    return slot;
  }

  private countersFor(domain: DomainName<M>): DomainCounters {
    let counters = this.counters.get(domain);
    if (!counters) {
      counters = emptyCounters();
      this.counters.set(domain, counters);
    }
    return counters;
  }

  private mutableDefinition<D extends DomainName<M>>(domain: D): DomainDefinition<M[D]> {
    const definition = this.definitions[domain];
    if (!definition?.keyOf) {
      throw new CacheConfigError(`Cache domain '${domain}' does not accept optimistic mutations`);
    }
    return definition;
  }
}

function validateConfig(config: CacheCoordinatorConfig): void {
  const { freshWindowMs, backgroundThresholdMs } = config;
  if (!Number.isFinite(freshWindowMs) || freshWindowMs < 0) {
    throw new CacheConfigError(`freshWindowMs must be a non-negative number, got ${freshWindowMs}`);
  }
  if (!Number.isFinite(backgroundThresholdMs) || backgroundThresholdMs < 0) {
    throw new CacheConfigError(`backgroundThresholdMs must be a non-negative number, got ${backgroundThresholdMs}`);
  }
  if (backgroundThresholdMs > freshWindowMs) {
    throw new CacheConfigError(
      `backgroundThresholdMs (${backgroundThresholdMs}) must not exceed freshWindowMs (${freshWindowMs})`
    );
  }
}

function emptyCounters(): DomainCounters {
  return {
    hits: 0,
    misses: 0,
    fetches: 0,
    fetchFailures: 0,
    backgroundRefreshes: 0,
    backgroundFailures: 0,
  };
}
