export { Mutex, KeyedMutex, type Release } from './mutex.js';
