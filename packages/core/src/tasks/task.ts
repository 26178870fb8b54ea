/**
 * @fileoverview Task entity
 *
 * Construction-time validation, deadline parsing, partial updates and
 * ordering helpers. Records are plain immutable values keyed by id.
 */

import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../utils/errors.js';
import { elapsedNow } from './timer.js';
import type { CreateTaskInput, DeadlineInput, Task, TaskSummary, TaskUpdate } from './types.js';

// =============================================================================
// Schemas
// =============================================================================

const titleSchema = z.string().trim().min(1, 'title is required');

const descriptionSchema = z
  .string()
  .trim()
  .transform((value) => (value === '' ? null : value))
  .nullable();

const quantitySchema = z
  .number()
  .int('quantity must be a whole number')
  .nonnegative('quantity cannot be negative')
  .nullable();

const createTaskSchema = z.object({
  title: titleSchema,
  category: z.string().trim().optional(),
  description: descriptionSchema.optional(),
  quantity: quantitySchema.optional(),
});

const taskUpdateSchema = z.object({
  title: titleSchema.optional(),
  category: z.string().trim().min(1, 'category cannot be empty').optional(),
  description: descriptionSchema.optional(),
  quantity: quantitySchema.optional(),
});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toIssues(result.error);
    const detail = issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(`Invalid ${what}: ${detail}`, issues);
  }
  return result.data;
}

// =============================================================================
// Deadlines
// =============================================================================

/** Display format of the interactive shell, interpreted in local time */
export const DEADLINE_FORMAT = 'YYYY-MM-DD HH:mm';

const LOCAL_DEADLINE_REGEX = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})$/;
const ISO_DEADLINE_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,3})?)?(?:Z|[+-]\d{2}:\d{2})$/;

/** Widest UTC year range the persisted ISO timestamps can represent */
const MIN_DEADLINE_YEAR = 0;
const MAX_DEADLINE_YEAR = 9999;

function invalidDeadline(raw: string, reason?: string): ValidationError {
  const message = reason ?? `expected ${DEADLINE_FORMAT} or an ISO-8601 timestamp, got "${raw}"`;
  return new ValidationError(`Invalid deadline: ${message}`, [{ path: 'deadline', message }]);
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Calendar and clock fields as written, before Date gets a chance to roll
 * impossible values over (Feb 30 -> Mar 2)
 */
function isRealDateTime(fields: number[]): boolean {
  const [year, month, day, hour, minute, second = 0] = fields;
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined
  ) {
    return false;
  }
  return (
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59
  );
}

function checkRange(date: Date, raw: string): Date {
  const year = date.getUTCFullYear();
  if (year < MIN_DEADLINE_YEAR || year > MAX_DEADLINE_YEAR) {
    throw invalidDeadline(
      raw,
      `deadline must fall between years ${MIN_DEADLINE_YEAR} and ${MAX_DEADLINE_YEAR} UTC, got "${raw}"`
    );
  }
  return date;
}

/**
 * Parse a deadline into a fixed point in time. Empty input means no deadline.
 */
export function parseDeadline(input: DeadlineInput): Date | null {
  if (input === undefined || input === null) {
    return null;
  }

  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw invalidDeadline(String(input));
    }
    return checkRange(new Date(input.getTime()), input.toISOString());
  }

  const raw = input.trim();
  if (raw === '') {
    return null;
  }

  const local = raw.match(LOCAL_DEADLINE_REGEX);
  if (local) {
    const fields = local.slice(1).map(Number);
    const [year, month, day, hour, minute] = fields;
    if (
      !isRealDateTime(fields) ||
      year === undefined ||
      month === undefined ||
      day === undefined ||
      hour === undefined ||
      minute === undefined
    ) {
      throw invalidDeadline(raw);
    }
    const date = new Date(year, month - 1, day, hour, minute);
    // Local years 0-99 are read by Date as 1900-1999
    date.setFullYear(year);
    return checkRange(date, raw);
  }

  const iso = raw.match(ISO_DEADLINE_REGEX);
  if (iso) {
    const fields = iso
      .slice(1, 7)
      .filter((value): value is string => value !== undefined)
      .map(Number);
    const time = Date.parse(raw);
    if (isRealDateTime(fields) && !Number.isNaN(time)) {
      return checkRange(new Date(time), raw);
    }
  }

  throw invalidDeadline(raw);
}

// =============================================================================
// Construction & Update
// =============================================================================

export interface TaskIdentity {
  id: string;
  seq: number;
  now: Date;
  defaultCategory: string;
}

/**
 * Build a new Pending task with zeroed timers
 */
export function createTask(input: CreateTaskInput, identity: TaskIdentity): Task {
  const fields = validate(createTaskSchema, input, 'task');
  const deadline = parseDeadline(input.deadline);

  return {
    id: identity.id,
    seq: identity.seq,
    title: fields.title,
    category: fields.category ? fields.category : identity.defaultCategory,
    description: fields.description ?? null,
    quantity: fields.quantity ?? null,
    deadline,
    status: 'pending',
    createdAt: new Date(identity.now.getTime()),
    completedAt: null,
    lastElapsedMs: 0,
    totalElapsedMs: 0,
    timerState: 'stopped',
    runStartedAt: null,
  };
}

/**
 * Apply a validated partial update, returning a new record
 */
export function applyTaskUpdate(task: Task, update: TaskUpdate): Task {
  const fields = validate(taskUpdateSchema, update, 'task update');
  const deadline = update.deadline === undefined ? task.deadline : parseDeadline(update.deadline);

  return {
    ...task,
    title: fields.title ?? task.title,
    category: fields.category ?? task.category,
    description: fields.description === undefined ? task.description : fields.description,
    quantity: fields.quantity === undefined ? task.quantity : fields.quantity,
    deadline,
  };
}

export function isExpired(task: Task, now: Date): boolean {
  return task.deadline !== null && task.deadline.getTime() <= now.getTime();
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}

function copyDate(date: Date | null): Date | null {
  return date === null ? null : new Date(date.getTime());
}

/**
 * Detached view of a task: the Date fields are copies, so a caller mutating
 * them never reaches the stored record
 */
export function toTaskSummary(task: Task, now: Date): TaskSummary {
  return {
    ...task,
    deadline: copyDate(task.deadline),
    createdAt: new Date(task.createdAt.getTime()),
    completedAt: copyDate(task.completedAt),
    runStartedAt: copyDate(task.runStartedAt),
    shortId: shortId(task.id),
    elapsedNowMs: elapsedNow(task, now),
  };
}

// =============================================================================
// Ordering
// =============================================================================

export function compareByCreation(a: Task, b: Task): number {
  return a.seq - b.seq;
}

/**
 * Deadline ascending, tasks without a deadline last, then creation order
 */
export function compareByDeadline(a: Task, b: Task): number {
  if (a.deadline === null && b.deadline === null) {
    return compareByCreation(a, b);
  }
  if (a.deadline === null) {
    return 1;
  }
  if (b.deadline === null) {
    return -1;
  }
  const diff = a.deadline.getTime() - b.deadline.getTime();
  return diff !== 0 ? diff : compareByCreation(a, b);
}
