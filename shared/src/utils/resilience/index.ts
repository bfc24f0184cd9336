export {
  ARequestDeduplicator,
  type RequestDeduplicatorConfig,
  type RequestDeduplicatorStats,
  type DeduplicateResult,
} from './ARequestDeduplicator.js';
export { RequestDeduplicator } from './requestDeduplicator.js';
