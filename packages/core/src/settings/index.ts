/**
 * @fileoverview Settings exports
 */

export * from './types.js';
export { DEFAULT_SETTINGS, DEFAULT_STORE_FILE } from './defaults.js';
export {
  getSettingsDir,
  getSettingsPath,
  resolveStorePath,
  loadUserSettings,
  loadSettings,
  mergeSettings,
  applyEnvOverrides,
  resolveSettings,
  parsePositiveInteger,
  type ResolveSettingsOptions,
  type SettingsLogger,
} from './loader.js';
