/**
 * Abstract Logger Service
 *
 * Base class for structured logging services. Initializes first to ensure
 * other services can log during their initialization.
 *
 * @see Logger for the concrete implementation
 */
import { AService } from '../../services/abstracts/AService.js';

/**
 * Context metadata attached to log entries.
 */
export interface LogContext {
  /** Service component name (e.g., 'CacheCoordinator', 'HttpRemoteDataSource') */
  component?: string;
  /** Cache domain the entry is about (e.g., 'tasks', 'notes') */
  domain?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Abstract logger service.
 *
 * Provides leveled logging with structured context. Initialize order is -100
 * to ensure logging is available before other services initialize.
 */
export abstract class ALogger extends AService {
  override readonly order: number = -100; // Initialize first - other services need logging

  abstract debug(message: string, context?: LogContext): void;

  abstract info(message: string, context?: LogContext): void;

  abstract warn(message: string, context?: LogContext): void;

  abstract error(message: string, error?: Error | unknown, context?: LogContext): void;
}
