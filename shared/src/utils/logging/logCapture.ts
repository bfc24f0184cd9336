import { ALogCapture } from './ALogCapture.js';

import type { CapturedLog, LogFilter, LogQueryResult } from './ALogCapture.js';
import type { LogContext } from './ALogger.js';

export type { CapturedLog, LogFilter, LogQueryResult } from './ALogCapture.js';

const DEFAULT_CAPACITY = 500;
const DEFAULT_LIMIT = 100;

/**
 * Bounded in-memory log buffer; the oldest entry is dropped once full.
 */
export class LogCapture extends ALogCapture {
  private entries: CapturedLog[] = [];

  constructor(private readonly capacity: number = DEFAULT_CAPACITY) {
    super();
  }

  capture(level: CapturedLog['level'], message: string, context?: LogContext, error?: unknown): void {
    const entry: CapturedLog = { timestamp: new Date().toISOString(), level, message, context };
    if (error !== undefined) {
      entry.error = error instanceof Error ? { message: error.message, stack: error.stack } : { message: String(error) };
    }

    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  getLogs(filter: LogFilter = {}): LogQueryResult {
    const { level, component, domain, limit = DEFAULT_LIMIT } = filter;
    const matching = this.entries.filter(
      (entry) =>
        (!level || entry.level === level) &&
        (!component || entry.context?.component === component) &&
        (!domain || entry.context?.domain === domain)
    );

    return { logs: matching.slice(-limit), total: this.entries.length };
  }

  clear(): void {
    this.entries = [];
  }
}

export const logCapture: ALogCapture = new LogCapture();
