/**
 * Workspace Cache
 *
 * Binds each workspace domain to its remote fetch and exposes the per-domain
 * API on top of a single CacheCoordinator.
 *
 * @example
 * ```typescript
 * const cache = new WorkspaceCache(new HttpRemoteDataSource());
 *
 * const notes = await cache.getNotes();
 * await cache.addNote(draft);           // visible immediately, newest first
 * console.log(await cache.describeStatistics());
 * ```
 */
import { AWorkspaceCache, type WorkspaceDomain, type WorkspaceRecords } from './AWorkspaceCache.js';
import { CacheCoordinator } from './CacheCoordinator.js';
import { formatStatistics } from './statistics.js';
import { DecodingError } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';

import type { ARemoteDataSource } from '../api/ARemoteDataSource.js';
import type { GymSession, Matter, Note, RunningStats, SessionSuggestion, Task } from '../api/schemas.js';
import type { CacheCoordinatorConfig, CacheStatistics, DomainDefinitions, GetOptions } from './types.js';

const byId = (record: { id: string }): string => record.id;

const STATISTICS_LABELS: Record<WorkspaceDomain, string> = {
  tasks: 'Tasks',
  matters: 'Matters',
  notes: 'Notes',
  sessions: 'Sessions',
  suggestion: 'Suggestion',
  runningStats: 'Running stats',
};

const FITNESS_DOMAINS: readonly WorkspaceDomain[] = ['sessions', 'suggestion', 'runningStats'];

export function createWorkspaceDefinitions(source: ARemoteDataSource): DomainDefinitions<WorkspaceRecords> {
  return {
    tasks: { fetch: () => source.fetchTasks(), keyOf: byId, insertAt: 'end' },
    matters: { fetch: () => source.fetchMatters(), keyOf: byId, insertAt: 'end' },
    notes: { fetch: () => source.fetchNotes(), keyOf: byId, insertAt: 'start' },
    sessions: { fetch: () => source.fetchSessions(), keyOf: byId, insertAt: 'start' },
    // Singletons: stored as zero or one item, read-only
    suggestion: { fetch: async () => [await source.fetchSuggestion()] },
    runningStats: { fetch: async () => [await source.fetchRunningStats()] },
  };
}

export class WorkspaceCache extends AWorkspaceCache {
  private readonly coordinator: CacheCoordinator<WorkspaceRecords>;

  constructor(source: ARemoteDataSource, config: Partial<CacheCoordinatorConfig> = {}) {
    super();
    this.coordinator = new CacheCoordinator<WorkspaceRecords>(createWorkspaceDefinitions(source), config);
  }

  // Tasks

  getTasks(options?: GetOptions): Promise<Task[]> {
    return this.coordinator.get('tasks', options);
  }

  addTask(task: Task): Promise<void> {
    return this.coordinator.insert('tasks', task);
  }

  updateTask(task: Task): Promise<boolean> {
    return this.coordinator.update('tasks', task);
  }

  removeTask(id: string): Promise<number> {
    return this.coordinator.remove('tasks', id);
  }

  invalidateTasks(): Promise<void> {
    return this.coordinator.invalidate('tasks');
  }

  // Matters

  getMatters(options?: GetOptions): Promise<Matter[]> {
    return this.coordinator.get('matters', options);
  }

  addMatter(matter: Matter): Promise<void> {
    return this.coordinator.insert('matters', matter);
  }

  updateMatter(matter: Matter): Promise<boolean> {
    return this.coordinator.update('matters', matter);
  }

  removeMatter(id: string): Promise<number> {
    return this.coordinator.remove('matters', id);
  }

  invalidateMatters(): Promise<void> {
    return this.coordinator.invalidate('matters');
  }

  // Notes

  getNotes(options?: GetOptions): Promise<Note[]> {
    return this.coordinator.get('notes', options);
  }

  addNote(note: Note): Promise<void> {
    return this.coordinator.insert('notes', note);
  }

  updateNote(note: Note): Promise<boolean> {
    return this.coordinator.update('notes', note);
  }

  removeNote(id: string): Promise<number> {
    return this.coordinator.remove('notes', id);
  }

  invalidateNotes(): Promise<void> {
    return this.coordinator.invalidate('notes');
  }

  // Fitness

  getSessions(options?: GetOptions): Promise<GymSession[]> {
    return this.coordinator.get('sessions', options);
  }

  addSession(session: GymSession): Promise<void> {
    return this.coordinator.insert('sessions', session);
  }

  async getSuggestion(options?: GetOptions): Promise<SessionSuggestion> {
    const [suggestion] = await this.coordinator.get('suggestion', options);
    if (!suggestion) {
      throw new DecodingError('Session suggestion response was empty');
    }
    return suggestion;
  }

  async getRunningStats(options?: GetOptions): Promise<RunningStats> {
    const [stats] = await this.coordinator.get('runningStats', options);
    if (!stats) {
      throw new DecodingError('Running stats response was empty');
    }
    return stats;
  }

  invalidateFitness(): Promise<void> {
    return this.coordinator.invalidateMany(FITNESS_DOMAINS);
  }

  // Management

  async clearAll(): Promise<void> {
    await this.coordinator.invalidateAll();
  }

  getStatistics(): Promise<CacheStatistics<WorkspaceDomain>> {
    return this.coordinator.snapshot();
  }

  async describeStatistics(): Promise<string> {
    return formatStatistics(await this.getStatistics(), STATISTICS_LABELS);
  }

  /**
   * Resolve once in-flight background refreshes have settled.
   */
  whenIdle(): Promise<void> {
    return this.coordinator.whenIdle();
  }

  async dispose(): Promise<void> {
    await this.coordinator.dispose();
    logger.debug('Workspace cache disposed', { component: 'WorkspaceCache' });
  }
}
