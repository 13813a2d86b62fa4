/**
 * chalk-based console output. Colour is switched off by setting `chalk.level`.
 */

import chalk from 'chalk';
import type { ColorSupportLevel } from 'chalk';
import type { Task } from '@todo-engine/core';
import { formatTask } from '@todo-engine/core';

export function formatTaskLine(task: Task): string {
  const line = formatTask(task);
  return task.isCompleted ? chalk.dim(line) : line;
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function colorLevel(): ColorSupportLevel {
  return chalk.level;
}

/** Colour for the next command: `level` when enabled, none otherwise */
export function setColor(enabled: boolean, level: ColorSupportLevel): void {
  chalk.level = enabled ? level : 0;
}
