/**
 * @fileoverview Task Types
 *
 * In-memory task model and the summary shape handed to the shell.
 */

// =============================================================================
// Task
// =============================================================================

export type TaskStatus = 'pending' | 'completed';

export type TimerState = 'stopped' | 'running';

/**
 * One trackable unit of work. Records are treated as immutable values:
 * every operation produces a new record.
 */
export interface Task {
  /** Stable unique identifier (UUID), never reused */
  readonly id: string;
  /** Creation sequence number, used as the creation-order tie breaker */
  readonly seq: number;
  readonly title: string;
  readonly category: string;
  readonly description: string | null;
  readonly quantity: number | null;
  /** Fixed point in time; null means the task never expires */
  readonly deadline: Date | null;
  readonly status: TaskStatus;
  readonly createdAt: Date;
  readonly completedAt: Date | null;
  /** Duration of the most recently stopped run */
  readonly lastElapsedMs: number;
  /** Cumulative duration of every stopped run */
  readonly totalElapsedMs: number;
  readonly timerState: TimerState;
  /** Set iff timerState is 'running' */
  readonly runStartedAt: Date | null;
}

/**
 * Read-only projection of a task at query time
 */
export interface TaskSummary extends Task {
  /** First 8 characters of the id, as shown in listings */
  readonly shortId: string;
  /** totalElapsedMs plus the in-flight run, if any */
  readonly elapsedNowMs: number;
}

// =============================================================================
// Inputs
// =============================================================================

export type DeadlineInput = Date | string | null | undefined;

export interface CreateTaskInput {
  title: string;
  category?: string;
  deadline?: DeadlineInput;
  description?: string | null;
  quantity?: number | null;
}

/**
 * Partial edit. Omitted fields are kept; `null` clears an optional field.
 */
export interface TaskUpdate {
  title?: string;
  category?: string;
  deadline?: Date | string | null;
  description?: string | null;
  quantity?: number | null;
}

export interface StopTimerResult {
  task: TaskSummary;
  elapsedMs: number;
}
