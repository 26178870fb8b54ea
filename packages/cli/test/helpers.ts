/**
 * @fileoverview Menu test helpers: scripted prompter, manual clock, memory store
 */
import {
  TaskStore,
  emptyDocument,
  parseDocument,
  serializeDocument,
  type Clock,
  type TaskDocument,
  type TaskPersistence,
} from '@taskforge/core';
import { PromptClosedError, type Prompter } from '../src/prompter.js';

/** An answer, or a callback run when the question is asked */
export type ScriptedAnswer = string | (() => string);

export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private answers: ScriptedAnswer[];
  closed = false;

  constructor(answers: ScriptedAnswer[] = []) {
    this.answers = [...answers];
  }

  queue(...answers: ScriptedAnswer[]): void {
    this.answers.push(...answers);
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const next = this.answers.shift();
    if (this.closed || next === undefined) {
      throw new PromptClosedError();
    }
    return typeof next === 'function' ? next() : next;
  }

  close(): void {
    this.closed = true;
  }
}

export class ManualClock implements Clock {
  private current = new Date('2026-03-01T09:00:00.000Z').getTime();

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class MemoryPersistence implements TaskPersistence {
  private saved: string | null = null;

  async load(): Promise<TaskDocument> {
    return this.saved === null ? emptyDocument() : parseDocument(this.saved, 'memory');
  }

  async save(document: TaskDocument): Promise<void> {
    this.saved = serializeDocument(document);
  }
}

export async function openMemoryStore(clock: Clock): Promise<TaskStore> {
  let n = 0;
  return TaskStore.open({
    persistence: new MemoryPersistence(),
    clock,
    generateId: () => {
      n += 1;
      return `task${String(n).padStart(4, '0')}-0000-4000-8000-${String(n).padStart(12, '0')}`;
    },
  });
}
