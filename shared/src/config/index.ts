export * from './env.js';
export { CACHE, TIMEOUTS, LIMITS } from './constants.js';
