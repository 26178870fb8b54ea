/**
 * @fileoverview Main entry point for @taskforge/core
 *
 * Task store and lifecycle engine: task model, timers, write-through JSON
 * persistence and the background expiry sweeper.
 */

// Re-export the task engine
export * from './tasks/index.js';

// Re-export runtime wiring
export * from './runtime.js';

// Re-export settings
export * from './settings/index.js';

// Re-export logging
export * from './logging/index.js';

// Re-export errors, mutex and clock
export * from './utils/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'taskforge';
