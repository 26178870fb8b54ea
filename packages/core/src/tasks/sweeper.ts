/**
 * @fileoverview Expiry Sweeper
 *
 * Background loop that removes tasks whose deadline has passed. Each sweep
 * goes through TaskStore.sweepExpired, which holds the store lock for the
 * scan, the deletions and the save.
 *
 * States: idle -> scanning -> idle, terminal stopped.
 *
 * Events:
 * - `tasks_expired` (tasks: TaskSummary[]) after a sweep removed something,
 *   whether or not its save succeeded
 * - `sweep_failed` (error: unknown, removed: TaskSummary[]) when the sweep's
 *   save failed; `removed` lists the tasks already gone from memory
 */

import { EventEmitter } from 'events';
import { createLogger, type TaskforgeLogger } from '../logging/index.js';
import { UnsavedSweepError, type TaskStore } from './store.js';
import type { TaskSummary } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type SweeperState = 'idle' | 'scanning' | 'stopped';

export interface ExpirySweeperOptions {
  /** Time between sweeps (default: 60 seconds) */
  intervalMs?: number;
  logger?: TaskforgeLogger;
}

export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

// =============================================================================
// ExpirySweeper
// =============================================================================

export class ExpirySweeper extends EventEmitter {
  private readonly store: TaskStore;
  private readonly intervalMs: number;
  private readonly logger: TaskforgeLogger;
  private interval: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<TaskSummary[]> | null = null;
  private state: SweeperState = 'idle';
  private completedSweeps = 0;

  constructor(store: TaskStore, options: ExpirySweeperOptions = {}) {
    super();
    this.store = store;
    this.intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.logger = options.logger ?? createLogger('expiry-sweeper');

    if (!Number.isFinite(this.intervalMs) || this.intervalMs <= 0) {
      throw new RangeError(`Sweep interval must be a positive number of ms, got ${this.intervalMs}`);
    }
  }

  /**
   * Begin sweeping on the configured interval. Calling twice is a no-op.
   */
  start(): void {
    if (this.state === 'stopped') {
      throw new Error('Expiry sweeper has been stopped');
    }
    if (this.interval) {
      return;
    }

    this.interval = setInterval(() => {
      this.tick().catch((error) => {
        this.logger.error('Sweep tick failed', error instanceof Error ? error : { err: String(error) });
      });
    }, this.intervalMs);
    // Shutdown is driven by stop(); the timer alone must not keep the process alive
    this.interval.unref();

    this.logger.debug('Expiry sweeper started', { intervalMs: this.intervalMs });
  }

  /**
   * Run one sweep now. Joins the in-flight sweep if there is one.
   * Resolves with the removed tasks, including those whose removal could
   * not be saved.
   */
  async runOnce(): Promise<TaskSummary[]> {
    if (this.state === 'stopped') {
      return [];
    }
    if (this.inFlight) {
      return this.inFlight;
    }

    this.state = 'scanning';
    this.inFlight = this.sweep().finally(() => {
      this.inFlight = null;
      if (this.state === 'scanning') {
        this.state = 'idle';
      }
    });
    return this.inFlight;
  }

  /**
   * Cancel the interval and wait for any in-flight sweep to finish.
   * Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    const wasStopped = this.state === 'stopped';
    this.state = 'stopped';

    if (this.inFlight) {
      await this.inFlight;
    }
    if (!wasStopped) {
      this.logger.debug('Expiry sweeper stopped', { completedSweeps: this.completedSweeps });
    }
  }

  getState(): SweeperState {
    return this.state;
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  getCompletedSweeps(): number {
    return this.completedSweeps;
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug('Previous sweep still running, skipping tick');
      return;
    }
    await this.runOnce();
  }

  private async sweep(): Promise<TaskSummary[]> {
    try {
      const removed = await this.store.sweepExpired();
      this.completedSweeps += 1;
      if (removed.length > 0) {
        this.emit('tasks_expired', removed);
      }
      return removed;
    } catch (error) {
      // Skipped, not retried: the next sweep or foreground save persists the state
      const removed = error instanceof UnsavedSweepError ? error.removed : [];
      this.logger.error('Expiry sweep failed', error instanceof Error ? error : { err: String(error) });
      this.emit('sweep_failed', error, removed);
      if (removed.length > 0) {
        this.emit('tasks_expired', removed);
      }
      return removed;
    }
  }
}
