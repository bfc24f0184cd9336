/**
 * Abstract Workspace Cache
 *
 * Per-domain cache API used by the client: tasks, matters, notes, gym
 * sessions, the next-session suggestion and running stats.
 */
import { AService } from '../services/abstracts/AService.js';

import type { GetOptions, CacheStatistics } from './types.js';
import type { GymSession, Matter, Note, RunningStats, SessionSuggestion, Task } from '../api/schemas.js';

/**
 * Record type held by each workspace domain.
 */
export type WorkspaceRecords = {
  tasks: Task;
  matters: Matter;
  notes: Note;
  sessions: GymSession;
  suggestion: SessionSuggestion;
  runningStats: RunningStats;
};

export type WorkspaceDomain = keyof WorkspaceRecords;

export abstract class AWorkspaceCache extends AService {
  readonly order = -30; // After logging, before anything that reads workspace data

  // Tasks
  abstract getTasks(options?: GetOptions): Promise<Task[]>;
  abstract addTask(task: Task): Promise<void>;
  abstract updateTask(task: Task): Promise<boolean>;
  abstract removeTask(id: string): Promise<number>;
  abstract invalidateTasks(): Promise<void>;

  // Matters
  abstract getMatters(options?: GetOptions): Promise<Matter[]>;
  abstract addMatter(matter: Matter): Promise<void>;
  abstract updateMatter(matter: Matter): Promise<boolean>;
  abstract removeMatter(id: string): Promise<number>;
  abstract invalidateMatters(): Promise<void>;

  // Notes
  abstract getNotes(options?: GetOptions): Promise<Note[]>;
  abstract addNote(note: Note): Promise<void>;
  abstract updateNote(note: Note): Promise<boolean>;
  abstract removeNote(id: string): Promise<number>;
  abstract invalidateNotes(): Promise<void>;

  // Fitness
  abstract getSessions(options?: GetOptions): Promise<GymSession[]>;
  abstract addSession(session: GymSession): Promise<void>;
  abstract getSuggestion(options?: GetOptions): Promise<SessionSuggestion>;
  abstract getRunningStats(options?: GetOptions): Promise<RunningStats>;

  /**
   * Invalidate sessions, the suggestion and running stats together.
   */
  abstract invalidateFitness(): Promise<void>;

  abstract clearAll(): Promise<void>;

  abstract getStatistics(): Promise<CacheStatistics<WorkspaceDomain>>;

  /**
   * Multi-line text summary of `getStatistics()`.
   */
  abstract describeStatistics(): Promise<string>;
}
