/**
 * @fileoverview Settings Loader
 *
 * Resolves settings in precedence order:
 * defaults < ~/.taskforge/settings.json < environment < explicit overrides.
 *
 * A missing settings file is expected. A malformed one is reported and
 * ignored so a typo never keeps the tracker from starting.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { createLogger, isLogLevel, type LogLevel } from '../logging/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import type { TaskforgeSettings, UserSettings } from './types.js';

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.taskforge';
const SETTINGS_FILE = 'settings.json';

const userSettingsSchema = z
  .object({
    storePath: z.string().trim().min(1),
    sweepIntervalMs: z.number().int().positive(),
    defaultCategory: z.string().trim().min(1),
    logLevel: z.custom<LogLevel>(isLogLevel, 'unknown log level'),
  })
  .partial();

const POSITIVE_INTEGER_MESSAGE = 'must be a positive whole number';

const positiveIntegerText = z
  .string()
  .trim()
  .regex(/^\d+$/, POSITIVE_INTEGER_MESSAGE)
  .transform(Number)
  .pipe(
    z
      .number()
      .positive(POSITIVE_INTEGER_MESSAGE)
      .max(Number.MAX_SAFE_INTEGER, POSITIVE_INTEGER_MESSAGE)
  );

/**
 * Receives warnings about settings that were ignored
 */
export interface SettingsLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

function defaultLogger(): SettingsLogger {
  return {
    warn: (message, context) => createLogger('settings').warn(message, context),
  };
}

/**
 * Parse text such as an env value or a flag as a whole number >= 1
 */
export function parsePositiveInteger(
  raw: string
): { success: true; value: number } | { success: false; reason: string } {
  const result = positiveIntegerText.safeParse(raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, reason: result.error.issues[0]?.message ?? POSITIVE_INTEGER_MESSAGE };
}

// =============================================================================
// Paths
// =============================================================================

export function getSettingsDir(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR);
}

export function getSettingsPath(homeDir?: string): string {
  return path.join(getSettingsDir(homeDir), SETTINGS_FILE);
}

/**
 * Absolute store location; relative paths resolve against `cwd`
 */
export function resolveStorePath(settings: TaskforgeSettings, cwd: string = process.cwd()): string {
  return path.resolve(cwd, settings.storePath);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load user settings from file
 * @returns User settings or null if the file is missing or unusable
 */
export async function loadUserSettings(
  settingsPath?: string,
  logger: SettingsLogger = defaultLogger()
): Promise<UserSettings | null> {
  const filePath = settingsPath ?? getSettingsPath();

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    // ENOENT is expected if file doesn't exist - not an error
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    logger.warn('Failed to read settings, using defaults', {
      filePath,
      err: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', {
      filePath,
      err: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const result = userSettingsSchema.safeParse(raw);
  if (!result.success) {
    logger.warn('Settings file has invalid values, using defaults', {
      filePath,
      issues: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }
  return result.data;
}

/**
 * Load and merge settings with defaults
 */
export async function loadSettings(
  settingsPath?: string,
  logger?: SettingsLogger
): Promise<TaskforgeSettings> {
  const userSettings = await loadUserSettings(settingsPath, logger);
  return mergeSettings(DEFAULT_SETTINGS, userSettings ?? {});
}

export function mergeSettings(base: TaskforgeSettings, override: UserSettings): TaskforgeSettings {
  const result = { ...base };
  if (override.storePath !== undefined) result.storePath = override.storePath;
  if (override.sweepIntervalMs !== undefined) result.sweepIntervalMs = override.sweepIntervalMs;
  if (override.defaultCategory !== undefined) result.defaultCategory = override.defaultCategory;
  if (override.logLevel !== undefined) result.logLevel = override.logLevel;
  return result;
}

// =============================================================================
// Environment Variable Overrides
// =============================================================================

/**
 * Apply environment variable overrides to settings
 */
export function applyEnvOverrides(
  settings: TaskforgeSettings,
  env: NodeJS.ProcessEnv = process.env,
  logger: SettingsLogger = defaultLogger()
): TaskforgeSettings {
  const result = { ...settings };

  const store = env.TASKFORGE_STORE?.trim();
  if (store) {
    result.storePath = store;
  }

  const interval = env.TASKFORGE_SWEEP_INTERVAL_MS;
  if (interval !== undefined) {
    const parsed = parsePositiveInteger(interval);
    if (parsed.success) {
      result.sweepIntervalMs = parsed.value;
    } else {
      logger.warn('Invalid environment value, using fallback', {
        variable: 'TASKFORGE_SWEEP_INTERVAL_MS',
        value: interval,
        reason: parsed.reason,
        fallback: result.sweepIntervalMs,
      });
    }
  }

  const category = env.TASKFORGE_DEFAULT_CATEGORY?.trim();
  if (category) {
    result.defaultCategory = category;
  }

  const level = env.LOG_LEVEL;
  if (level !== undefined) {
    if (isLogLevel(level)) {
      result.logLevel = level;
    } else {
      logger.warn('Invalid environment value, using fallback', {
        variable: 'LOG_LEVEL',
        value: level,
        fallback: result.logLevel,
      });
    }
  }

  return result;
}

export interface ResolveSettingsOptions {
  settingsPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, typically command-line flags */
  overrides?: UserSettings;
  logger?: SettingsLogger;
}

/**
 * Full resolution: defaults, file, environment, then explicit overrides
 */
export async function resolveSettings(options: ResolveSettingsOptions = {}): Promise<TaskforgeSettings> {
  const fromFile = await loadSettings(options.settingsPath, options.logger);
  const fromEnv = applyEnvOverrides(fromFile, options.env ?? process.env, options.logger ?? defaultLogger());
  return mergeSettings(fromEnv, options.overrides ?? {});
}
