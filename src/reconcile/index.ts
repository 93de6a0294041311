/**
 * Reconciliation engine
 */

export * from './types.js';
export * from './errors.js';
export * from './identity.js';
export * from './normalize.js';
export * from './diff.js';
export * from './priority.js';
export * from './plan.js';
export * from './live.js';
export * from './readiness.js';
export * from './wait.js';
export * from './execute.js';
export * from './render.js';
export * from './reconcile.js';
export { runPool } from './pool.js';
export {
  isJsonObject,
  toJsonValue,
  toJsonObject,
  deepEqual,
  getPath,
  getString,
  getNumber,
  getObject,
  getArray,
  setPath,
  removePath,
  formatPath,
} from './json.js';
