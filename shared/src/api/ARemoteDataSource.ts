/**
 * Abstract Remote Data Source
 *
 * One fetch per cache domain. Implementations reject with a `NetworkError`
 * or `DecodingError`; the cache treats both the same way.
 */
import { AService } from '../services/abstracts/AService.js';

import type { Task, Matter, Note, GymSession, SessionSuggestion, RunningStats } from './schemas.js';

export abstract class ARemoteDataSource extends AService {
  abstract fetchTasks(): Promise<Task[]>;

  abstract fetchMatters(): Promise<Matter[]>;

  abstract fetchNotes(): Promise<Note[]>;

  abstract fetchSessions(): Promise<GymSession[]>;

  abstract fetchSuggestion(): Promise<SessionSuggestion>;

  abstract fetchRunningStats(): Promise<RunningStats>;
}
