/**
 * CLI helpers: argument parsing, line splitting and error handling.
 */

import { InvalidArgumentError } from 'commander';
import type { TaskId } from '@todo-engine/core';
import { isTaskError } from '@todo-engine/core';
import * as out from './output.js';

export type FailureHandler = (err: unknown) => void;

/**
 * Parse a task id argument. Only the digit check happens here; zero is
 * left for the repository to reject.
 */
export function parseTaskIdArg(value: string): TaskId {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`'${value}' is not a valid task ID.`);
  }
  const id = Number(trimmed);
  if (!Number.isSafeInteger(id)) {
    throw new InvalidArgumentError(`'${value}' is too large for a task ID.`);
  }
  return id;
}

/** User-facing text for a failed command */
export function describeFailure(err: unknown): string {
  if (isTaskError(err)) return `Error: ${err.message}`;
  if (err instanceof Error) return `Unexpected error: ${err.message}`;
  return `Unexpected error: ${String(err)}`;
}

/**
 * Run a command action, printing any failure and passing it on to
 * `onFailure` instead of letting it reach commander.
 */
export function $try(fn: () => void, onFailure?: FailureHandler): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(describeFailure(err));
    onFailure?.(err);
  }
}

/**
 * Split a shell-session line into arguments. Single and double quotes group
 * words; a backslash escapes the next character outside single quotes.
 */
export function splitArgs(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let inArg = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && i + 1 < line.length) {
        current += line.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inArg = true;
    } else if (ch === '\\' && i + 1 < line.length) {
      current += line.charAt(++i);
      inArg = true;
    } else if (/\s/.test(ch)) {
      if (inArg) {
        args.push(current);
        current = '';
        inArg = false;
      }
    } else {
      current += ch;
      inArg = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated ${quote === '"' ? 'double' : 'single'} quote`);
  }
  if (inArg) args.push(current);
  return args;
}
