/**
 * @fileoverview Task file persistence
 *
 * Stores the whole task collection as one pretty-printed JSON document.
 * Writes are atomic (write to tmp file, then rename) so a crash never leaves
 * a partially written file as the canonical one. Every optional value is
 * written as an explicit null.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { createLogger, type TaskforgeLogger } from '../logging/index.js';
import { CorruptStateError, PersistenceIOError } from '../utils/errors.js';
import type { Task } from './types.js';

// =============================================================================
// Types
// =============================================================================

export const DOCUMENT_VERSION = 1;

/**
 * In-memory form of the store document
 */
export interface TaskDocument {
  /** Sequence number the next created task receives */
  nextSeq: number;
  tasks: Task[];
}

/**
 * Anything that can load and save the store document. The file repository
 * is the only production implementation; tests may substitute their own.
 */
export interface TaskPersistence {
  load(): Promise<TaskDocument>;
  save(document: TaskDocument): Promise<void>;
}

export function emptyDocument(): TaskDocument {
  return { nextSeq: 1, tasks: [] };
}

// =============================================================================
// Serialized Schema
// =============================================================================

const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const persistedTaskSchema = z
  .object({
    id: z.string().min(1),
    seq: z.number().int().positive(),
    title: z.string().trim().min(1),
    category: z.string(),
    description: z.string().nullable(),
    quantity: z.number().int().nonnegative().nullable(),
    deadline: timestampSchema.nullable(),
    status: z.enum(['pending', 'completed']),
    createdAt: timestampSchema,
    completedAt: timestampSchema.nullable(),
    lastElapsedSeconds: z.number().nonnegative(),
    totalElapsedSeconds: z.number().nonnegative(),
    timerState: z.enum(['stopped', 'running']),
    runStartedAt: timestampSchema.nullable(),
  })
  .superRefine((task, ctx) => {
    if (task.timerState === 'running' && task.runStartedAt === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['runStartedAt'],
        message: 'running timer has no runStartedAt',
      });
    }
    if (task.timerState === 'stopped' && task.runStartedAt !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['runStartedAt'],
        message: 'stopped timer has a runStartedAt',
      });
    }
  });

const documentSchema = z
  .object({
    version: z.literal(DOCUMENT_VERSION),
    nextSeq: z.number().int().positive(),
    tasks: z.array(persistedTaskSchema),
  })
  .superRefine((document, ctx) => {
    const ids = new Set<string>();
    const seqs = new Set<number>();
    document.tasks.forEach((task, index) => {
      if (ids.has(task.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'id'],
          message: `duplicate id ${task.id}`,
        });
      }
      if (seqs.has(task.seq)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'seq'],
          message: `duplicate seq ${task.seq}`,
        });
      }
      if (task.seq >= document.nextSeq) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'seq'],
          message: `seq ${task.seq} is not below nextSeq ${document.nextSeq}`,
        });
      }
      ids.add(task.id);
      seqs.add(task.seq);
    });
  });

type PersistedTask = z.input<typeof persistedTaskSchema>;
type PersistedDocument = z.input<typeof documentSchema>;

// =============================================================================
// Conversion
// =============================================================================

function toSeconds(ms: number): number {
  return ms / 1000;
}

function toMilliseconds(seconds: number): number {
  return Math.round(seconds * 1000);
}

function toIso(date: Date | null): string | null {
  return date === null ? null : date.toISOString();
}

export function serializeTask(task: Task): PersistedTask {
  return {
    id: task.id,
    seq: task.seq,
    title: task.title,
    category: task.category,
    description: task.description,
    quantity: task.quantity,
    deadline: toIso(task.deadline),
    status: task.status,
    createdAt: task.createdAt.toISOString(),
    completedAt: toIso(task.completedAt),
    lastElapsedSeconds: toSeconds(task.lastElapsedMs),
    totalElapsedSeconds: toSeconds(task.totalElapsedMs),
    timerState: task.timerState,
    runStartedAt: toIso(task.runStartedAt),
  };
}

export function serializeDocument(document: TaskDocument): string {
  const persisted: PersistedDocument = {
    version: DOCUMENT_VERSION,
    nextSeq: document.nextSeq,
    tasks: document.tasks.map(serializeTask),
  };
  return `${JSON.stringify(persisted, null, 2)}\n`;
}

/**
 * Parse and validate document text. Unknown legacy fields are dropped.
 */
export function parseDocument(content: string, filePath: string): TaskDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CorruptStateError(filePath, 'not valid JSON', error);
  }

  const result = documentSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.errors
      .map((issue) => `${issue.path.join('.') || 'document'}: ${issue.message}`)
      .join('; ');
    throw new CorruptStateError(filePath, detail, result.error);
  }

  return {
    nextSeq: result.data.nextSeq,
    tasks: result.data.tasks.map((task) => ({
      id: task.id,
      seq: task.seq,
      title: task.title,
      category: task.category,
      description: task.description,
      quantity: task.quantity,
      deadline: task.deadline,
      status: task.status,
      createdAt: task.createdAt,
      completedAt: task.completedAt,
      lastElapsedMs: toMilliseconds(task.lastElapsedSeconds),
      totalElapsedMs: toMilliseconds(task.totalElapsedSeconds),
      timerState: task.timerState,
      runStartedAt: task.runStartedAt,
    })),
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// =============================================================================
// File Repository
// =============================================================================

export class TaskFileRepository implements TaskPersistence {
  private filePath: string;
  private logger: TaskforgeLogger;

  constructor(filePath: string, logger?: TaskforgeLogger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger ?? createLogger('task-persistence');
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * Load the document. A missing file is a first run, not an error.
   */
  async load(): Promise<TaskDocument> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.debug('No task store yet, starting empty', { filePath: this.filePath });
        return emptyDocument();
      }
      throw new PersistenceIOError(this.filePath, 'read', error);
    }

    const document = parseDocument(content, this.filePath);
    this.logger.debug('Task store loaded', {
      filePath: this.filePath,
      taskCount: document.tasks.length,
    });
    return document;
  }

  /**
   * Write the document atomically: tmp file in the same directory, then rename
   */
  async save(document: TaskDocument): Promise<void> {
    const content = serializeDocument(document);
    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, content, 'utf-8');
    } catch (error) {
      await this.removeTmp(tmpPath);
      throw new PersistenceIOError(this.filePath, 'write', error);
    }

    try {
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await this.removeTmp(tmpPath);
      throw new PersistenceIOError(this.filePath, 'rename', error);
    }

    this.logger.trace('Task store saved', {
      filePath: this.filePath,
      taskCount: document.tasks.length,
    });
  }

  /**
   * Move a corrupt store aside so a fresh one can be started without
   * destroying the old data. Returns the new location.
   */
  async quarantine(now: Date): Promise<string> {
    const stamp = now.toISOString().replace(/[:.]/g, '-');
    const target = `${this.filePath}.corrupt-${stamp}`;
    try {
      await fs.rename(this.filePath, target);
    } catch (error) {
      throw new PersistenceIOError(this.filePath, 'rename', error);
    }
    this.logger.warn('Corrupt task store moved aside', { filePath: this.filePath, target });
    return target;
  }

  private async removeTmp(tmpPath: string): Promise<void> {
    try {
      await fs.rm(tmpPath, { force: true });
    } catch (cleanupError) {
      this.logger.debug('Could not remove temp file', {
        tmpPath,
        err: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
  }
}
