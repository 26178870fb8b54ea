/**
 * @fileoverview Utils Module
 *
 * Errors, locking and the clock abstraction.
 */

export * from './errors.js';
export * from './mutex.js';
export * from './clock.js';
