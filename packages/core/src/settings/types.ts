/**
 * @fileoverview Settings Types
 */

import type { LogLevel } from '../logging/index.js';

export interface TaskforgeSettings {
  /** Task store document; relative paths resolve against the working directory */
  storePath: string;
  /** Time between expiry sweeps */
  sweepIntervalMs: number;
  /** Category given to tasks created without one */
  defaultCategory: string;
  logLevel: LogLevel;
}

/**
 * User settings override (partial version of TaskforgeSettings)
 */
export type UserSettings = Partial<TaskforgeSettings>;
