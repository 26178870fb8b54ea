/**
 * @fileoverview Error types for the task engine
 *
 * Provides a typed error hierarchy so callers branch on `code` or
 * `instanceof` instead of matching message strings.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const TaskErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_STATE: 'INVALID_STATE',
  IO_ERROR: 'IO_ERROR',
  CORRUPT_STATE: 'CORRUPT_STATE',
} as const;

export type TaskErrorCodeType = (typeof TaskErrorCode)[keyof typeof TaskErrorCode];

/**
 * One failed check from input validation
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

// =============================================================================
// Error Class Hierarchy
// =============================================================================

/**
 * Base error class carrying a machine-readable code
 */
export class TaskforgeError extends Error {
  readonly code: TaskErrorCodeType;

  constructor(code: TaskErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TaskforgeError';
    this.code = code;
  }
}

/**
 * Bad input: empty title, unparseable deadline, out-of-range field
 */
export class ValidationError extends TaskforgeError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(TaskErrorCode.VALIDATION_ERROR, message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends TaskforgeError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(TaskErrorCode.NOT_FOUND, `Task not found: ${taskId}`);
    this.name = 'NotFoundError';
    this.taskId = taskId;
  }
}

/**
 * Timer operation that conflicts with the task's current timer state
 */
export class InvalidStateError extends TaskforgeError {
  readonly taskId: string;

  constructor(taskId: string, message: string) {
    super(TaskErrorCode.INVALID_STATE, message);
    this.name = 'InvalidStateError';
    this.taskId = taskId;
  }
}

export class PersistenceIOError extends TaskforgeError {
  readonly filePath: string;

  constructor(filePath: string, operation: 'read' | 'write' | 'rename', cause: unknown) {
    super(
      TaskErrorCode.IO_ERROR,
      `Failed to ${operation} task store ${filePath}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'PersistenceIOError';
    this.filePath = filePath;
  }
}

/**
 * The store document exists but cannot be parsed or fails validation
 */
export class CorruptStateError extends TaskforgeError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, cause?: unknown) {
    super(TaskErrorCode.CORRUPT_STATE, `Task store ${filePath} is corrupt: ${detail}`, { cause });
    this.name = 'CorruptStateError';
    this.filePath = filePath;
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isTaskforgeError(error: unknown): error is TaskforgeError {
  return error instanceof TaskforgeError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * Format an error as a single line for display in the shell
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError && error.issues.length > 0) {
    return error.issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
