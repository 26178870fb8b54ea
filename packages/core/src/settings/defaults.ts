/**
 * @fileoverview Default Settings
 *
 * Fallback values when neither the settings file, the environment nor the
 * command line specify a setting.
 */

import type { TaskforgeSettings } from './types.js';

export const DEFAULT_STORE_FILE = 'tasks.json';

export const DEFAULT_SETTINGS: TaskforgeSettings = {
  storePath: DEFAULT_STORE_FILE,
  sweepIntervalMs: 60_000,
  defaultCategory: 'general',
  logLevel: 'warn',
};
