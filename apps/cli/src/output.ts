/**
 * chalk-based terminal output. Every line the CLI prints goes through here.
 */

import chalk from 'chalk';
import { daysBetween, shortId, todayString } from '@tasktrack/core';
import type { Task, TaskResult, DataResult, BatchResult, CalendarDate } from '@tasktrack/core';

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: number): string {
  return chalk.cyan(`P${priority}`);
}

export function formatDueDate(dueDate: CalendarDate, completed: boolean, now?: Date): string {
  if (completed) return chalk.dim(`Due: ${dueDate}`);

  const diff = daysBetween(todayString(now), dueDate);
  if (diff < 0) return chalk.red(`OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('Due: Today');
  if (diff === 1) return chalk.dim('Due: Tomorrow');
  return chalk.dim(`Due: ${dueDate}`);
}

/** One row of the task list */
export function formatTaskLine(task: Task, now?: Date): string {
  const title = task.completed ? chalk.strikethrough(task.title) : chalk.bold(task.title);
  return [
    chalk.dim(shortId(task.id)),
    formatCheckbox(task.completed),
    formatPriority(task.priority),
    title,
  ].join(' ') + '  ' + formatDueDate(task.dueDate, task.completed, now);
}

// --- Result output ---

export function printResult<T>(result: TaskResult | DataResult<T>): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'no-change': info(result.message); break;
    case 'invalid': error(`Error: ${result.message}`); break;
    case 'error': error(result.message); break;
  }
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) {
    printResult(result);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function debug(message: string): void {
  if (verbose) console.log(chalk.dim(`[debug] ${message}`));
}
