/**
 * @fileoverview Task engine exports
 */

export * from './types.js';
export {
  DEADLINE_FORMAT,
  parseDeadline,
  createTask,
  applyTaskUpdate,
  isExpired,
  shortId,
  toTaskSummary,
  compareByCreation,
  compareByDeadline,
  type TaskIdentity,
} from './task.js';
export { startTimer, stopTimer, elapsedNow } from './timer.js';
export {
  DOCUMENT_VERSION,
  TaskFileRepository,
  emptyDocument,
  parseDocument,
  serializeDocument,
  serializeTask,
  type TaskDocument,
  type TaskPersistence,
} from './persistence.js';
export { TaskStore, UnsavedSweepError, DEFAULT_CATEGORY, type TaskStoreOptions } from './store.js';
export {
  ExpirySweeper,
  DEFAULT_SWEEP_INTERVAL_MS,
  type ExpirySweeperOptions,
  type SweeperState,
} from './sweeper.js';
