#!/usr/bin/env tsx
/**
 * @fileoverview Taskforge CLI Entry Point
 */
import {
  CorruptStateError,
  DEADLINE_FORMAT,
  VERSION,
  formatError,
  getLogger,
  openTaskforge,
  resetLogger,
  resolveSettings,
  resolveStorePath,
  type TaskSummary,
  type TaskforgeRuntime,
  type TaskforgeRuntimeOptions,
} from '@taskforge/core';
import { HELP_TEXT, parseCliArgs } from './args.js';
import { TaskMenu } from './menu.js';
import { createReadlinePrompter } from './prompter.js';

function printExpired(tasks: TaskSummary[]): void {
  for (const task of tasks) {
    console.log(`[auto] Removed expired task: [${task.shortId}] ${task.title}`);
  }
}

/**
 * A corrupt store is fatal unless --reset-corrupt was given
 */
async function openOrExit(options: TaskforgeRuntimeOptions): Promise<TaskforgeRuntime> {
  try {
    return await openTaskforge(options);
  } catch (error) {
    if (error instanceof CorruptStateError) {
      console.error(`\n${error.message}\n`);
      console.error('Run again with --reset-corrupt to move it aside and start with an empty store.\n');
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(`taskforge v${VERSION}`);
    return;
  }

  const settings = await resolveSettings({
    settingsPath: args.settingsPath,
    overrides: {
      storePath: args.storePath,
      sweepIntervalMs: args.sweepIntervalMs,
      logLevel: args.debug ? 'debug' : undefined,
    },
  });

  // Loggers created from here on use the resolved level
  resetLogger();
  getLogger({ level: settings.logLevel });

  const storePath = resolveStorePath(settings);
  const runtime = await openOrExit({
    storePath,
    sweepIntervalMs: settings.sweepIntervalMs,
    defaultCategory: settings.defaultCategory,
    onCorrupt: args.resetCorrupt ? 'reset' : 'fail',
    onExpired: printExpired,
  });

  if (runtime.quarantinedPath) {
    console.log(`Unreadable store moved to ${runtime.quarantinedPath}; starting empty.`);
  }
  console.log(`\n\t=== TASKFORGE ===\n\nStore: ${storePath} | Dates: ${DEADLINE_FORMAT}`);

  const prompter = createReadlinePrompter();
  const menu = new TaskMenu(runtime.store, runtime.sweeper, {
    prompter,
    print: (line) => console.log(line),
  });

  // Closing input ends the menu loop, which then runs the shutdown below
  process.on('SIGTERM', () => {
    prompter.close();
  });

  try {
    await menu.run();
  } finally {
    prompter.close();
    // Waits for an in-flight sweep so its save is never torn
    await runtime.shutdown();
  }
}

main().catch((error) => {
  console.error(`Error: ${formatError(error)}`);
  process.exit(1);
});
