/**
 * Centralized Constants Configuration
 *
 * Namespaced access to the timeouts, limits and cache windows used throughout
 * the package. All values are environment-overridable via env.ts.
 *
 * Usage:
 *   import { CACHE, TIMEOUTS, LIMITS } from '../config/constants.js';
 *
 *   new CacheCoordinator(domains, { freshWindowMs: CACHE.FRESH_WINDOW });
 */

import {
  CACHE_FRESH_WINDOW_MS,
  CACHE_BACKGROUND_THRESHOLD_MS,
  CACHE_SINGLE_FLIGHT,
  TASK_API_TIMEOUT_MS,
  TASK_API_TASKS_LIMIT,
  TASK_API_MATTERS_LIMIT,
  TASK_API_NOTES_LIMIT,
  TASK_API_SESSIONS_LIMIT,
} from './env.js';

export const CACHE = {
  /** Age below which cached data is served without any network activity */
  FRESH_WINDOW: CACHE_FRESH_WINDOW_MS,
  /** Age past which a cache hit also schedules a background refresh */
  BACKGROUND_THRESHOLD: CACHE_BACKGROUND_THRESHOLD_MS,
  /** Share one in-flight fetch between concurrent callers of the same domain */
  SINGLE_FLIGHT: CACHE_SINGLE_FLIGHT,
} as const;

export const TIMEOUTS = {
  HTTP: {
    REQUEST: TASK_API_TIMEOUT_MS,
  },
} as const;

export const LIMITS = {
  PAGE_SIZE: {
    TASKS: TASK_API_TASKS_LIMIT,
    MATTERS: TASK_API_MATTERS_LIMIT,
    NOTES: TASK_API_NOTES_LIMIT,
    SESSIONS: TASK_API_SESSIONS_LIMIT,
  },
} as const;
