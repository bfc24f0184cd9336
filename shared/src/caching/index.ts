/**
 * Caching Module
 *
 * Stale-while-revalidate cache for the workspace domains. Reads are served
 * from memory while fresh, refreshed in the background as they age, and
 * refetched synchronously once expired.
 *
 * @example
 * ```typescript
 * import { WorkspaceCache, HttpRemoteDataSource } from '@taskdesk/shared';
 *
 * const cache = new WorkspaceCache(new HttpRemoteDataSource());
 * const tasks = await cache.getTasks();
 * const fresh = await cache.getTasks({ forceRefresh: true });
 * ```
 */

// Abstract class for dependency injection
export { AWorkspaceCache, type WorkspaceDomain, type WorkspaceRecords } from './AWorkspaceCache.js';

// Engine
export { CacheSlot, type SlotRead, type SlotWindows } from './CacheSlot.js';
export { CacheCoordinator, DEFAULT_COORDINATOR_CONFIG } from './CacheCoordinator.js';
export { BackgroundRefreshRunner, type BackgroundRefreshTask } from './backgroundRefresh.js';
export { buildStatistics, formatStatistics, formatAge, type DomainSample, type SlotView } from './statistics.js';

// Concrete implementations
export { WorkspaceCache, createWorkspaceDefinitions } from './WorkspaceCache.js';

// Types
export type {
  InsertPosition,
  SlotState,
  DomainDefinition,
  DomainDefinitions,
  DomainRecordMap,
  DomainName,
  CacheCoordinatorConfig,
  GetOptions,
  DomainCounters,
  DomainStatistics,
  CacheStatistics,
} from './types.js';
