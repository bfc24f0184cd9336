/**
 * Workspace cache and the task API client it reads through.
 */

// =============================================================================
// UTILITIES - Logging, errors, concurrency, request deduplication
// =============================================================================
export * from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================
export * from './config/index.js';

// =============================================================================
// API - Remote data source and response schemas
// =============================================================================
export * from './api/index.js';

// =============================================================================
// CACHING - Stale-while-revalidate workspace cache
// =============================================================================
export * from './caching/index.js';

// =============================================================================
// SERVICES - Base service class and lifecycle helpers
// =============================================================================
export { AService, initializeServices, disposeServices } from './services/abstracts/AService.js';
