/**
 * Background refresh runner.
 *
 * Starts fire-and-forget refreshes for the coordinator. A spawned refresh
 * cannot be cancelled: it fetches outside any lock, commits through the
 * coordinator's exclusive write path, and on failure only logs. Nothing is
 * ever rethrown to the caller that triggered it.
 */
import { toRefreshError, type RefreshError } from '../utils/errorTypes.js';
import { logger, type LogContext } from '../utils/logging/logger.js';

export interface BackgroundRefreshTask<T> {
  domain: string;
  fetch: () => Promise<T[]>;
  /** Write the result back under the domain's exclusivity */
  commit: (items: T[]) => Promise<void>;
  onSuccess?: (items: T[]) => void;
  onFailure?: (error: RefreshError) => void;
}

export class BackgroundRefreshRunner {
  private readonly inFlight = new Set<Promise<void>>();

  spawn<T>(task: BackgroundRefreshTask<T>): void {
    const run = this.execute(task)
      .catch((error: unknown) => {
        logger.error('Background refresh crashed', error, { component: 'BackgroundRefresh', domain: task.domain });
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Resolve once every refresh spawned so far, and any it spawns while
   * settling, has finished.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private async execute<T>(task: BackgroundRefreshTask<T>): Promise<void> {
    const context = { component: 'BackgroundRefresh', domain: task.domain };
    let items: T[];
    try {
      items = await task.fetch();
      await task.commit(items);
    } catch (error) {
      const refreshError = toRefreshError(error);
      logger.warn(`Background refresh failed: ${refreshError.message}`, {
        ...context,
        kind: refreshError.kind,
      });
      runHook('onFailure', context, () => task.onFailure?.(refreshError));
      return;
    }

    logger.debug(`Background refresh completed (${items.length} ${task.domain})`, context);
    runHook('onSuccess', context, () => task.onSuccess?.(items));
  }
}

// Hooks belong to the caller; a throwing hook must not turn into a refresh failure.
function runHook(name: string, context: LogContext, hook: () => void): void {
  try {
    hook();
  } catch (error) {
    logger.error(`Background refresh ${name} hook threw`, error, context);
  }
}
