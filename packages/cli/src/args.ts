/**
 * @fileoverview Command-line argument parsing
 */

import { parseArgs } from 'util';
import { ValidationError, parsePositiveInteger } from '@taskforge/core';

export interface CliArgs {
  storePath?: string;
  sweepIntervalMs?: number;
  settingsPath?: string;
  resetCorrupt: boolean;
  debug: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Parse argv (without the node and script entries). Unknown flags throw.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      store: { type: 'string', short: 's' },
      interval: { type: 'string', short: 'i' },
      settings: { type: 'string' },
      'reset-corrupt': { type: 'boolean' },
      debug: { type: 'boolean', short: 'd' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean' },
    },
    allowPositionals: false,
    strict: true,
  });

  let sweepIntervalMs: number | undefined;
  if (values.interval !== undefined) {
    const seconds = parsePositiveInteger(values.interval);
    if (!seconds.success) {
      throw new ValidationError(`--interval must be a whole number of seconds >= 1, got "${values.interval}"`);
    }
    sweepIntervalMs = seconds.value * 1000;
  }

  return {
    storePath: values.store,
    sweepIntervalMs,
    settingsPath: values.settings,
    resetCorrupt: values['reset-corrupt'] ?? false,
    debug: values.debug ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}

export const HELP_TEXT = `
Taskforge - personal task tracker with timers and deadlines

USAGE:
  taskforge [options]

OPTIONS:
  -s, --store <path>        Task store file (default: tasks.json in the current directory)
  -i, --interval <seconds>  Seconds between expiry sweeps (default: 60)
  --settings <path>         Settings file (default: ~/.taskforge/settings.json)
  --reset-corrupt           Move an unreadable store aside and start empty
  -d, --debug               Debug logging to stderr
  -h, --help                Show this help message
  --version                 Show version number

ENVIRONMENT:
  TASKFORGE_STORE               Task store file
  TASKFORGE_SWEEP_INTERVAL_MS   Milliseconds between expiry sweeps
  TASKFORGE_DEFAULT_CATEGORY    Category for tasks created without one
  LOG_LEVEL                     trace | debug | info | warn | error | fatal | silent

Deadlines are entered as YYYY-MM-DD HH:mm (local time). Tasks are removed
automatically once their deadline passes.
`;
