/**
 * @fileoverview Display formatting for the interactive shell
 */

import type { TaskSummary } from '@taskforge/core';

const NONE = '—';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Whole seconds as `XmYs`, e.g. 125_000 -> `2m5s`
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}m${seconds}s`;
}

/**
 * Local time in the same `YYYY-MM-DD HH:mm` format the prompts accept
 */
export function formatDeadline(deadline: Date | null): string {
  if (deadline === null) {
    return NONE;
  }
  return (
    `${deadline.getFullYear()}-${pad(deadline.getMonth() + 1)}-${pad(deadline.getDate())} ` +
    `${pad(deadline.getHours())}:${pad(deadline.getMinutes())}`
  );
}

export function formatTaskLine(task: TaskSummary): string {
  const parts = [
    `[${task.shortId}] ${task.title}`,
    task.category,
    `qty:${task.quantity ?? NONE}`,
    `deadline:${formatDeadline(task.deadline)}`,
  ];
  if (task.timerState === 'running') {
    parts.push('timer running');
  }
  return parts.join(' | ');
}

/**
 * Task line plus indented description and timing lines when present
 */
export function formatTaskDetails(task: TaskSummary): string[] {
  const lines = [formatTaskLine(task)];
  if (task.description) {
    lines.push(`   desc: ${task.description}`);
  }
  if (task.elapsedNowMs > 0) {
    lines.push(`   last: ${formatDuration(task.lastElapsedMs)} | total: ${formatDuration(task.elapsedNowMs)}`);
  }
  return lines;
}

export function formatSection(title: string, tasks: TaskSummary[]): string[] {
  return [`--- ${title} (${tasks.length}) ---`, ...tasks.flatMap(formatTaskDetails)];
}
