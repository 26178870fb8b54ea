/**
 * @fileoverview Task timer
 *
 * Start/stop accumulation and the read-only live projection. Accumulation
 * only happens on stop, so a persisted running timer keeps its original
 * start instant and nothing is lost if the process dies mid-run.
 */

import { InvalidStateError } from '../utils/errors.js';
import type { Task } from './types.js';

function runDuration(runStartedAt: Date, now: Date): number {
  // A start instant ahead of the clock (clock skew) contributes nothing
  return Math.max(0, now.getTime() - runStartedAt.getTime());
}

export function startTimer(task: Task, now: Date): Task {
  if (task.timerState === 'running') {
    throw new InvalidStateError(task.id, `Timer already running for task ${task.id}`);
  }
  return {
    ...task,
    timerState: 'running',
    runStartedAt: new Date(now.getTime()),
  };
}

export function stopTimer(task: Task, now: Date): { task: Task; elapsedMs: number } {
  if (task.timerState !== 'running' || task.runStartedAt === null) {
    throw new InvalidStateError(task.id, `Timer is not running for task ${task.id}`);
  }
  const elapsedMs = runDuration(task.runStartedAt, now);
  return {
    task: {
      ...task,
      timerState: 'stopped',
      runStartedAt: null,
      lastElapsedMs: elapsedMs,
      totalElapsedMs: task.totalElapsedMs + elapsedMs,
    },
    elapsedMs,
  };
}

/**
 * Total elapsed time including the in-flight run, without mutating the task
 */
export function elapsedNow(task: Task, now: Date): number {
  if (task.timerState === 'running' && task.runStartedAt !== null) {
    return task.totalElapsedMs + runDuration(task.runStartedAt, now);
  }
  return task.totalElapsedMs;
}
