import { logCapture } from './logCapture.js';
import { ALogger } from './ALogger.js';
import { LOG_LEVEL, type LogLevel } from '../../config/env.js';
import type { LogContext } from './ALogger.js';

export type { LogContext } from './ALogger.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class Logger extends ALogger {
  private level: LogLevel;

  constructor(level: LogLevel = LOG_LEVEL) {
    super();
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    let contextStr = '';
    if (context) {
      const parts: string[] = [];
      if (context.component) parts.push(`component=${context.component}`);
      if (context.domain) parts.push(`domain=${context.domain}`);

      // Other custom fields
      Object.keys(context).forEach(key => {
        if (!['component', 'domain'].includes(key)) {
          parts.push(`${key}=${String(context[key])}`);
        }
      });

      if (parts.length > 0) {
        contextStr = ` [${parts.join(', ')}]`;
      }
    }

    return `${timestamp} ${levelStr}${contextStr} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    logCapture.capture('debug', message, context);
    if (this.enabled('debug')) {
      console.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    logCapture.capture('info', message, context);
    if (this.enabled('info')) {
      console.log(this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    logCapture.capture('warn', message, context);
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, context));
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    logCapture.capture('error', message, context, error);
    if (!this.enabled('error')) return;
    console.error(this.formatMessage('error', message, context));
    if (error) {
      if (error instanceof Error) {
        console.error(`  Error: ${error.message}`);
        if (error.stack && this.level === 'debug') {
          console.error(`  Stack: ${error.stack}`);
        }
      } else {
        console.error(`  Details: ${JSON.stringify(error, null, 2)}`);
      }
    }
  }
}

export const logger = new Logger();
