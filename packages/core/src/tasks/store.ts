/**
 * @fileoverview Task Store
 *
 * Authoritative in-memory task collection with write-through persistence.
 *
 * Every operation (reads included) runs under one exclusive lock, and
 * mutations save the whole document before releasing it, so a save always
 * reflects a consistent snapshot and the expiry sweep can never interleave
 * with a foreground edit.
 */

import { randomUUID } from 'crypto';
import { createLogger, type TaskforgeLogger } from '../logging/index.js';
import { NotFoundError, TaskErrorCode, TaskforgeError } from '../utils/errors.js';
import { Mutex } from '../utils/mutex.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  applyTaskUpdate,
  compareByCreation,
  compareByDeadline,
  createTask,
  isExpired,
  toTaskSummary,
} from './task.js';
import { elapsedNow, startTimer, stopTimer } from './timer.js';
import type { TaskDocument, TaskPersistence } from './persistence.js';
import type {
  CreateTaskInput,
  StopTimerResult,
  Task,
  TaskSummary,
  TaskUpdate,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface TaskStoreOptions {
  persistence: TaskPersistence;
  clock?: Clock;
  /** Category given to tasks created without one */
  defaultCategory?: string;
  /** Id generator, injectable for deterministic tests */
  generateId?: () => string;
  logger?: TaskforgeLogger;
}

export const DEFAULT_CATEGORY = 'general';

/**
 * A sweep removed tasks from memory but its save failed. The removal stands
 * and is written by the next successful save.
 */
export class UnsavedSweepError extends TaskforgeError {
  readonly removed: TaskSummary[];

  constructor(removed: TaskSummary[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      TaskErrorCode.IO_ERROR,
      `Removed ${removed.length} expired task(s) but could not save: ${reason}`,
      { cause }
    );
    this.name = 'UnsavedSweepError';
    this.removed = removed;
  }
}

// =============================================================================
// TaskStore
// =============================================================================

export class TaskStore {
  private tasks = new Map<string, Task>();
  private nextSeq = 1;
  private readonly mutex = new Mutex();
  private readonly persistence: TaskPersistence;
  private readonly clock: Clock;
  private readonly defaultCategory: string;
  private readonly generateId: () => string;
  private readonly logger: TaskforgeLogger;

  constructor(options: TaskStoreOptions, document?: TaskDocument) {
    this.persistence = options.persistence;
    this.clock = options.clock ?? systemClock;
    this.defaultCategory = options.defaultCategory ?? DEFAULT_CATEGORY;
    this.generateId = options.generateId ?? randomUUID;
    this.logger = options.logger ?? createLogger('task-store');

    if (document) {
      this.nextSeq = document.nextSeq;
      for (const task of document.tasks) {
        this.tasks.set(task.id, task);
      }
    }
  }

  /**
   * Load persisted state and return a ready store. Running timers are kept
   * running with their original start instant.
   */
  static async open(options: TaskStoreOptions): Promise<TaskStore> {
    const document = await options.persistence.load();
    const store = new TaskStore(options, document);
    const running = document.tasks.filter((task) => task.timerState === 'running').length;
    store.logger.info('Task store opened', { taskCount: document.tasks.length, runningTimers: running });
    return store;
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  async createTask(input: CreateTaskInput): Promise<TaskSummary> {
    return this.mutex.withLock(async () => {
      const now = this.clock.now();
      const task = createTask(input, {
        id: this.nextUniqueId(),
        seq: this.nextSeq,
        now,
        defaultCategory: this.defaultCategory,
      });

      this.tasks.set(task.id, task);
      this.nextSeq += 1;
      await this.persist();

      this.logger.info('Task created', { taskId: task.id, title: task.title });
      return toTaskSummary(task, now);
    });
  }

  async editTask(id: string, update: TaskUpdate): Promise<TaskSummary> {
    return this.mutex.withLock(async () => {
      const updated = applyTaskUpdate(this.require(id), update);
      this.tasks.set(id, updated);
      await this.persist();

      this.logger.info('Task edited', { taskId: id, fields: Object.keys(update) });
      return toTaskSummary(updated, this.clock.now());
    });
  }

  async deleteTask(id: string): Promise<TaskSummary> {
    return this.mutex.withLock(async () => {
      const task = this.require(id);
      this.tasks.delete(id);
      await this.persist();

      this.logger.info('Task deleted', { taskId: id });
      return toTaskSummary(task, this.clock.now());
    });
  }

  /**
   * Mark a task completed. Completing a completed task is a no-op.
   */
  async completeTask(id: string): Promise<TaskSummary> {
    return this.mutex.withLock(async () => {
      const task = this.require(id);
      const now = this.clock.now();
      if (task.status === 'completed') {
        return toTaskSummary(task, now);
      }

      const updated: Task = { ...task, status: 'completed', completedAt: now };
      this.tasks.set(id, updated);
      await this.persist();

      this.logger.info('Task completed', { taskId: id });
      return toTaskSummary(updated, now);
    });
  }

  /**
   * Move a completed task back to pending. Reopening a pending task is a no-op.
   */
  async reopenTask(id: string): Promise<TaskSummary> {
    return this.mutex.withLock(async () => {
      const task = this.require(id);
      const now = this.clock.now();
      if (task.status === 'pending') {
        return toTaskSummary(task, now);
      }

      const updated: Task = { ...task, status: 'pending', completedAt: null };
      this.tasks.set(id, updated);
      await this.persist();

      this.logger.info('Task reopened', { taskId: id });
      return toTaskSummary(updated, now);
    });
  }

  async startTimer(id: string): Promise<TaskSummary> {
    return this.mutex.withLock(async () => {
      const now = this.clock.now();
      const updated = startTimer(this.require(id), now);
      this.tasks.set(id, updated);
      await this.persist();

      this.logger.debug('Timer started', { taskId: id });
      return toTaskSummary(updated, now);
    });
  }

  async stopTimer(id: string): Promise<StopTimerResult> {
    return this.mutex.withLock(async () => {
      const now = this.clock.now();
      const { task, elapsedMs } = stopTimer(this.require(id), now);
      this.tasks.set(id, task);
      await this.persist();

      this.logger.debug('Timer stopped', { taskId: id, elapsedMs });
      return { task: toTaskSummary(task, now), elapsedMs };
    });
  }

  /**
   * Remove every task whose deadline has passed, regardless of status or
   * timer state. Saves only when something was removed.
   */
  async sweepExpired(): Promise<TaskSummary[]> {
    return this.mutex.withLock(async () => {
      const now = this.clock.now();
      const expired = [...this.tasks.values()]
        .filter((task) => isExpired(task, now))
        .sort(compareByCreation);

      if (expired.length === 0) {
        return [];
      }

      for (const task of expired) {
        this.tasks.delete(task.id);
      }
      const removed = expired.map((task) => toTaskSummary(task, now));
      try {
        await this.persist();
      } catch (error) {
        throw new UnsavedSweepError(removed, error);
      }

      this.logger.info('Expired tasks removed', {
        count: expired.length,
        taskIds: expired.map((task) => task.id),
      });
      return removed;
    });
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async getTask(id: string): Promise<TaskSummary> {
    return this.mutex.withLock(() => toTaskSummary(this.require(id), this.clock.now()));
  }

  /**
   * Live elapsed time, including a run in progress
   */
  async elapsedNow(id: string): Promise<number> {
    return this.mutex.withLock(() => elapsedNow(this.require(id), this.clock.now()));
  }

  /**
   * Tasks whose id starts with `prefix` (case-insensitive), in creation order
   */
  async findByIdPrefix(prefix: string): Promise<TaskSummary[]> {
    const needle = prefix.trim().toLowerCase();
    return this.query(
      (task) => needle !== '' && task.id.toLowerCase().startsWith(needle),
      compareByCreation
    );
  }

  /**
   * Tasks whose title contains `substring`, in creation order
   */
  async findByTitle(substring: string, caseInsensitive = true): Promise<TaskSummary[]> {
    const needle = caseInsensitive ? substring.toLowerCase() : substring;
    if (needle.trim() === '') {
      return [];
    }
    return this.query((task) => {
      const title = caseInsensitive ? task.title.toLowerCase() : task.title;
      return title.includes(needle);
    }, compareByCreation);
  }

  /**
   * Id-prefix matches and case-insensitive title matches, in creation order
   */
  async search(query: string): Promise<TaskSummary[]> {
    const needle = query.trim().toLowerCase();
    if (needle === '') {
      return [];
    }
    return this.query(
      (task) => task.id.toLowerCase().startsWith(needle) || task.title.toLowerCase().includes(needle),
      compareByCreation
    );
  }

  async listPending(): Promise<TaskSummary[]> {
    return this.query((task) => task.status === 'pending', compareByDeadline);
  }

  async listCompleted(): Promise<TaskSummary[]> {
    return this.query((task) => task.status === 'completed', compareByDeadline);
  }

  async listAll(): Promise<TaskSummary[]> {
    return this.query(() => true, compareByCreation);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async query(
    predicate: (task: Task) => boolean,
    compare: (a: Task, b: Task) => number
  ): Promise<TaskSummary[]> {
    return this.mutex.withLock(() => {
      const now = this.clock.now();
      return [...this.tasks.values()]
        .filter(predicate)
        .sort(compare)
        .map((task) => toTaskSummary(task, now));
    });
  }

  private require(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError(id);
    }
    return task;
  }

  private nextUniqueId(): string {
    let id = this.generateId();
    while (this.tasks.has(id)) {
      id = this.generateId();
    }
    return id;
  }

  /**
   * Write-through under the caller's lock. On failure the in-memory change
   * stays; it is written by the next successful save.
   */
  private async persist(): Promise<void> {
    const document: TaskDocument = {
      nextSeq: this.nextSeq,
      tasks: [...this.tasks.values()].sort(compareByCreation),
    };
    try {
      await this.persistence.save(document);
    } catch (error) {
      this.logger.error('Task store save failed', error instanceof Error ? error : { err: String(error) });
      throw error;
    }
  }
}
