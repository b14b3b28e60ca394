// Logging with redaction
export * from './logging/index.js';

export { AsyncLock } from './utils/lock/async-lock.js';
