/**
 * @fileoverview Line prompts over readline
 */

import * as readline from 'readline';

/**
 * Source of user answers. The menu only depends on this interface, so tests
 * drive it with scripted answers.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Raised by ask() once input has ended (EOF or close())
 */
export class PromptClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptClosedError';
  }
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  let pendingReject: ((error: Error) => void) | null = null;

  // Ctrl+C ends input the same way EOF does
  rl.on('SIGINT', () => {
    rl.close();
  });

  rl.on('close', () => {
    closed = true;
    if (pendingReject) {
      pendingReject(new PromptClosedError());
      pendingReject = null;
    }
  });

  return {
    ask(question: string): Promise<string> {
      if (closed) {
        return Promise.reject(new PromptClosedError());
      }
      return new Promise((resolve, reject) => {
        pendingReject = reject;
        rl.question(question, (answer) => {
          pendingReject = null;
          resolve(answer.trim());
        });
      });
    },
    close(): void {
      rl.close();
    },
  };
}
