/**
 * @fileoverview Taskforge runtime
 *
 * Wires persistence, store and expiry sweeper together and owns their
 * shutdown order. The presentation shell talks to `store` and listens to
 * `sweeper`; it never touches persistence directly.
 */

import { createLogger } from './logging/index.js';
import { CorruptStateError } from './utils/errors.js';
import { systemClock, type Clock } from './utils/clock.js';
import { TaskFileRepository } from './tasks/persistence.js';
import { TaskStore } from './tasks/store.js';
import { ExpirySweeper } from './tasks/sweeper.js';
import type { TaskSummary } from './tasks/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * What to do when the store document cannot be parsed:
 * - fail: rethrow CorruptStateError (default)
 * - reset: move the file aside and start with an empty store
 */
export type CorruptStorePolicy = 'fail' | 'reset';

export interface TaskforgeRuntimeOptions {
  storePath: string;
  sweepIntervalMs?: number;
  defaultCategory?: string;
  onCorrupt?: CorruptStorePolicy;
  clock?: Clock;
  /** Sweep immediately after opening, before the first interval elapses */
  sweepOnStart?: boolean;
  /** Registered before the first sweep so startup removals are reported too */
  onExpired?: (tasks: TaskSummary[]) => void;
}

export interface TaskforgeRuntime {
  store: TaskStore;
  sweeper: ExpirySweeper;
  repository: TaskFileRepository;
  /** Set when a corrupt store was moved aside under the 'reset' policy */
  quarantinedPath: string | null;
  /** Stop the sweeper and wait for any in-flight sweep */
  shutdown(): Promise<void>;
}

// =============================================================================
// Factory
// =============================================================================

export async function openTaskforge(options: TaskforgeRuntimeOptions): Promise<TaskforgeRuntime> {
  const logger = createLogger('runtime');
  const clock = options.clock ?? systemClock;
  const repository = new TaskFileRepository(options.storePath);
  const storeOptions = {
    persistence: repository,
    clock,
    defaultCategory: options.defaultCategory,
  };

  let store: TaskStore;
  let quarantinedPath: string | null = null;
  try {
    store = await TaskStore.open(storeOptions);
  } catch (error) {
    if (!(error instanceof CorruptStateError) || options.onCorrupt !== 'reset') {
      throw error;
    }
    quarantinedPath = await repository.quarantine(clock.now());
    logger.warn('Starting with an empty task store', {
      storePath: repository.getPath(),
      quarantinedPath,
    });
    store = await TaskStore.open(storeOptions);
  }

  const sweeper = new ExpirySweeper(store, { intervalMs: options.sweepIntervalMs });
  if (options.onExpired) {
    sweeper.on('tasks_expired', options.onExpired);
  }
  if (options.sweepOnStart ?? true) {
    await sweeper.runOnce();
  }
  sweeper.start();

  logger.info('Taskforge runtime ready', {
    storePath: repository.getPath(),
    sweepIntervalMs: options.sweepIntervalMs,
  });

  let shutdownPromise: Promise<void> | null = null;
  return {
    store,
    sweeper,
    repository,
    quarantinedPath,
    shutdown: () => {
      if (!shutdownPromise) {
        shutdownPromise = sweeper.stop().then(() => {
          logger.info('Taskforge runtime stopped');
        });
      }
      return shutdownPromise;
    },
  };
}
