/**
 * Abstract Log Capture Service
 *
 * Keeps recent log entries in memory so diagnostics and tests can read back
 * what the cache logged.
 */
import { AService } from '../../services/abstracts/AService.js';

import type { LogContext } from './ALogger.js';

export interface CapturedLog {
  timestamp: string;
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
  };
}

export interface LogFilter {
  level?: CapturedLog['level'];
  component?: string;
  domain?: string;
  /** Most recent entries to return (default 100) */
  limit?: number;
}

export interface LogQueryResult {
  logs: CapturedLog[];
  /** Entries held before filtering */
  total: number;
}

export abstract class ALogCapture extends AService {
  override readonly order: number = -90;

  abstract capture(level: CapturedLog['level'], message: string, context?: LogContext, error?: unknown): void;

  abstract getLogs(filter?: LogFilter): LogQueryResult;

  abstract clear(): void;
}
