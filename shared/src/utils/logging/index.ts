/**
 * Logging utilities
 * @module utils/logging
 */

// Abstract classes and types
export { ALogger, type LogContext } from './ALogger.js';
export { ALogCapture, type CapturedLog, type LogFilter, type LogQueryResult } from './ALogCapture.js';

// Implementations
export { Logger, logger } from './logger.js';
export { LogCapture, logCapture } from './logCapture.js';
