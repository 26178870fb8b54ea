/**
 * @fileoverview Interactive menu
 *
 * Thin shell over the task store: every command gathers input first and
 * then makes a single store call, so the store lock is never held while
 * waiting on the user.
 */

import {
  DEADLINE_FORMAT,
  formatError,
  isTaskforgeError,
  type ExpirySweeper,
  type TaskStore,
  type TaskSummary,
  type TaskUpdate,
} from '@taskforge/core';
import { formatDeadline, formatDuration, formatSection, formatTaskLine } from './format.js';
import { PromptClosedError, type Prompter } from './prompter.js';

// =============================================================================
// Types
// =============================================================================

export interface MenuIO {
  prompter: Prompter;
  print: (line: string) => void;
}

export const MENU_PROMPT =
  '\n[A]dd [L]ist [S]earch [C]ronometer [T]start [P]stop [E]dit [M]complete [R]eopen [D]elete [Q]uit: ';

/** Answer that clears an optional field while editing */
const CLEAR_TOKEN = '-';

const YES_ANSWERS = new Set(['y', 'yes']);

// =============================================================================
// TaskMenu
// =============================================================================

export class TaskMenu {
  private readonly store: TaskStore;
  private readonly sweeper: ExpirySweeper;
  private readonly prompter: Prompter;
  private readonly print: (line: string) => void;

  constructor(store: TaskStore, sweeper: ExpirySweeper, io: MenuIO) {
    this.store = store;
    this.sweeper = sweeper;
    this.prompter = io.prompter;
    this.print = io.print;
  }

  /**
   * Loop until the user quits or input ends
   */
  async run(): Promise<void> {
    try {
      let keepGoing = true;
      while (keepGoing) {
        const choice = await this.prompter.ask(MENU_PROMPT);
        keepGoing = await this.handle(choice);
      }
    } catch (error) {
      if (!(error instanceof PromptClosedError)) {
        throw error;
      }
    }
  }

  /**
   * Run one menu command. Returns false when the user chose to quit.
   * Task errors are reported and the menu carries on.
   */
  async handle(choice: string): Promise<boolean> {
    const key = choice.trim().toLowerCase();
    if (key === 'q') {
      return false;
    }

    try {
      switch (key) {
        case 'a':
          await this.addTask();
          break;
        case 'l':
          await this.listTasks();
          break;
        case 's':
          await this.searchTasks();
          break;
        case 'c':
          await this.runCronometer();
          break;
        case 't':
          await this.startTimer();
          break;
        case 'p':
          await this.stopTimer();
          break;
        case 'e':
          await this.editTask();
          break;
        case 'm':
          await this.completeTask();
          break;
        case 'r':
          await this.reopenTask();
          break;
        case 'd':
          await this.deleteTask();
          break;
        default:
          this.print('Invalid option.');
      }
    } catch (error) {
      if (!isTaskforgeError(error)) {
        throw error;
      }
      this.print(`Error: ${formatError(error)}`);
    }
    return true;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private async addTask(): Promise<void> {
    const title = await this.prompter.ask('Title: ');
    if (!title) {
      this.print('Title is required.');
      return;
    }
    const category = await this.prompter.ask('Category (Enter for default): ');
    const description = await this.prompter.ask('Description (optional): ');
    const quantity = parseQuantity(await this.prompter.ask('Quantity (optional): '));
    const deadline = await this.prompter.ask(`Deadline (${DEADLINE_FORMAT}) or Enter for none: `);

    const task = await this.store.createTask({
      title,
      category,
      description: description || null,
      quantity,
      deadline: deadline || null,
    });
    this.print(`Task created: ${task.shortId}`);
  }

  private async listTasks(): Promise<void> {
    await this.sweeper.runOnce();

    const pending = await this.store.listPending();
    const completed = await this.store.listCompleted();
    if (pending.length === 0 && completed.length === 0) {
      this.print('No tasks yet.');
      return;
    }

    for (const line of formatSection('Pending', pending)) {
      this.print(line);
    }
    for (const line of formatSection('Completed', completed)) {
      this.print(line);
    }
  }

  private async searchTasks(): Promise<void> {
    const query = await this.prompter.ask('Id prefix or part of the title: ');
    const matches = await this.store.search(query);
    if (matches.length === 0) {
      this.print('No matching task.');
      return;
    }
    for (const task of matches) {
      this.print(formatTaskLine(task));
    }
  }

  /**
   * Start, wait for Enter, stop. The wait happens between two store calls.
   */
  private async runCronometer(): Promise<void> {
    const task = await this.selectTask('Task to time: ');
    if (!task) return;

    const go = await this.prompter.ask('Enter starts | q cancels: ');
    if (go.toLowerCase() === 'q') {
      return;
    }
    await this.store.startTimer(task.id);
    await this.prompter.ask('Timing... press Enter to stop: ');
    const { elapsedMs } = await this.store.stopTimer(task.id);
    this.print(`Timer saved: ${formatDuration(elapsedMs)}`);
  }

  private async startTimer(): Promise<void> {
    const task = await this.selectTask('Task to start: ');
    if (!task) return;

    await this.store.startTimer(task.id);
    this.print(`Timer started for [${task.shortId}] ${task.title}`);
  }

  private async stopTimer(): Promise<void> {
    const task = await this.selectTask('Task to stop: ');
    if (!task) return;

    const result = await this.store.stopTimer(task.id);
    this.print(
      `Timer stopped: ${formatDuration(result.elapsedMs)} (total ${formatDuration(result.task.totalElapsedMs)})`
    );
  }

  private async editTask(): Promise<void> {
    const task = await this.selectTask();
    if (!task) return;

    this.print(`Leave blank to keep, "${CLEAR_TOKEN}" to clear an optional field.`);
    const update: TaskUpdate = {};

    const title = await this.prompter.ask(`Title [${task.title}]: `);
    if (title) update.title = title;

    const category = await this.prompter.ask(`Category [${task.category}]: `);
    if (category) update.category = category;

    const description = await this.prompter.ask(`Description [${task.description ?? ''}]: `);
    if (description === CLEAR_TOKEN) update.description = null;
    else if (description) update.description = description;

    const quantity = await this.prompter.ask(`Quantity [${task.quantity ?? ''}]: `);
    if (quantity === CLEAR_TOKEN) update.quantity = null;
    else if (quantity) update.quantity = parseQuantity(quantity);

    const deadline = await this.prompter.ask(`Deadline [${formatDeadline(task.deadline)}]: `);
    if (deadline === CLEAR_TOKEN) update.deadline = null;
    else if (deadline) update.deadline = deadline;

    if (Object.keys(update).length === 0) {
      this.print('Nothing changed.');
      return;
    }
    await this.store.editTask(task.id, update);
    this.print('Task updated.');
  }

  private async completeTask(): Promise<void> {
    const task = await this.selectTask();
    if (!task) return;

    await this.store.completeTask(task.id);
    this.print('Task completed.');
  }

  private async reopenTask(): Promise<void> {
    const task = await this.selectTask();
    if (!task) return;

    await this.store.reopenTask(task.id);
    this.print('Task reopened.');
  }

  private async deleteTask(): Promise<void> {
    const task = await this.selectTask();
    if (!task) return;

    const answer = await this.prompter.ask(`Delete [${task.title}]? (y/N): `);
    if (!YES_ANSWERS.has(answer.toLowerCase())) {
      return;
    }
    await this.store.deleteTask(task.id);
    this.print('Task deleted.');
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  /**
   * Pick a task by id prefix or part of the title; asks for a number when
   * several tasks match.
   */
  private async selectTask(question = 'Id or part of the title: '): Promise<TaskSummary | null> {
    const query = await this.prompter.ask(question);
    if (!query) {
      return null;
    }

    const matches = await this.store.search(query);
    if (matches.length === 0) {
      this.print('No matching task.');
      return null;
    }
    const [only] = matches;
    if (matches.length === 1 && only) {
      return only;
    }

    matches.forEach((task, index) => {
      this.print(`${index + 1} [${task.shortId}] ${task.title}`);
    });
    const picked = Number.parseInt(await this.prompter.ask('Choose: '), 10);
    const task = Number.isInteger(picked) ? matches[picked - 1] : undefined;
    if (!task) {
      this.print('Invalid choice.');
      return null;
    }
    return task;
  }
}

/**
 * Digits become a quantity; anything else means none
 */
export function parseQuantity(raw: string): number | null {
  return /^\d+$/.test(raw.trim()) ? Number.parseInt(raw.trim(), 10) : null;
}
