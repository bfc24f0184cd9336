/**
 * HTTP Remote Data Source
 *
 * Fetches each cache domain from the task API with `fetch`, validating every
 * response body with zod before it reaches the cache.
 */
import { z } from 'zod';

import { ARemoteDataSource } from './ARemoteDataSource.js';
import {
  dataEnvelope,
  gymSessionSchema,
  matterSchema,
  noteSchema,
  runningStatsSchema,
  sessionSuggestionSchema,
  tasksResponseSchema,
  type GymSession,
  type Matter,
  type Note,
  type RunningStats,
  type SessionSuggestion,
  type Task,
} from './schemas.js';
import { TASK_API_BASE_URL } from '../config/env.js';
import { LIMITS, TIMEOUTS } from '../config/constants.js';
import { DecodingError, NetworkError, getErrorCode, getErrorMessage } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';

export interface HttpRemoteDataSourceConfig {
  baseUrl: string;
  timeoutMs: number;
  defaultHeaders: Record<string, string>;
  pageSize: {
    tasks: number;
    matters: number;
    notes: number;
    sessions: number;
  };
  fetchImpl?: typeof fetch;
}

const DEFAULT_CONFIG: HttpRemoteDataSourceConfig = {
  baseUrl: TASK_API_BASE_URL,
  timeoutMs: TIMEOUTS.HTTP.REQUEST,
  defaultHeaders: {},
  pageSize: {
    tasks: LIMITS.PAGE_SIZE.TASKS,
    matters: LIMITS.PAGE_SIZE.MATTERS,
    notes: LIMITS.PAGE_SIZE.NOTES,
    sessions: LIMITS.PAGE_SIZE.SESSIONS,
  },
};

type QueryParams = Record<string, string | number>;

export class HttpRemoteDataSource extends ARemoteDataSource {
  private readonly config: HttpRemoteDataSourceConfig;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: Partial<HttpRemoteDataSourceConfig> = {}) {
    super();
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      pageSize: { ...DEFAULT_CONFIG.pageSize, ...config.pageSize },
    };
    this.baseUrl = this.config.baseUrl.endsWith('/') ? this.config.baseUrl.slice(0, -1) : this.config.baseUrl;
    this.fetchImpl = this.config.fetchImpl ?? fetch.bind(globalThis);
  }

  async fetchTasks(): Promise<Task[]> {
    const body = await this.getJson('/api/all-tasks', tasksResponseSchema, {
      offset: 0,
      limit: this.config.pageSize.tasks,
    });
    return body.tasks;
  }

  async fetchMatters(): Promise<Matter[]> {
    const body = await this.getJson('/api/matters', dataEnvelope(z.array(matterSchema)), {
      limit: this.config.pageSize.matters,
    });
    return body.data;
  }

  async fetchNotes(): Promise<Note[]> {
    const body = await this.getJson('/api/notes', dataEnvelope(z.array(noteSchema)), {
      offset: 0,
      limit: this.config.pageSize.notes,
    });
    return body.data;
  }

  async fetchSessions(): Promise<GymSession[]> {
    const body = await this.getJson('/api/gym/sessions', dataEnvelope(z.array(gymSessionSchema)), {
      limit: this.config.pageSize.sessions,
    });
    return body.data;
  }

  async fetchSuggestion(): Promise<SessionSuggestion> {
    const body = await this.getJson('/api/gym/suggest', dataEnvelope(sessionSuggestionSchema));
    return body.data;
  }

  async fetchRunningStats(): Promise<RunningStats> {
    const body = await this.getJson('/api/gym/running/stats', dataEnvelope(runningStatsSchema));
    return body.data;
  }

  buildUrl(path: string, query: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [name, value] of Object.entries(query)) {
      url.searchParams.set(name, String(value));
    }
    return url.toString();
  }

  private async getJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, query?: QueryParams): Promise<T> {
    const url = this.buildUrl(path, query);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json', ...this.config.defaultHeaders },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new NetworkError(`Request to ${path} failed: ${getErrorMessage(error)}`, {
        code: getErrorCode(error) ?? (isTimeout(error) ? 'ETIMEDOUT' : undefined),
        cause: error,
      });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new NetworkError(`Request failed (${response.status} ${response.statusText}) for ${path}`, {
        statusCode: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new DecodingError(`Response from ${path} is not valid JSON`, { cause: error });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logger.debug(`Response from ${path} failed validation`, {
        component: 'HttpRemoteDataSource',
        issues: issues.length,
      });
      throw new DecodingError(`Unexpected response shape from ${path}`, { issues, cause: parsed.error });
    }
    return parsed.data;
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
