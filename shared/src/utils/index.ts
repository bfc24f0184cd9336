/**
 * Shared utilities
 * @module utils
 */

// Re-export all utility categories
export * from './logging/index.js';
export * from './resilience/index.js';
export * from './concurrency/index.js';
export * from './errorTypes.js';
