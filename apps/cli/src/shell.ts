/**
 * Interactive session: reads one command per line and runs it on a fresh
 * program built over the same repository, so tasks survive from one command
 * to the next.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Command } from 'commander';
import { CommanderError } from 'commander';
import { splitArgs } from './helpers.js';
import * as out from './output.js';

export interface ShellOptions {
  input: Readable;
  output: Writable;
  prompt: string;
  /** Builds the program for one line; it must throw instead of exiting */
  createProgram: () => Command;
}

const EXIT_WORDS = new Set(['exit', 'quit']);

export async function runShell(opts: ShellOptions): Promise<void> {
  const rl = createInterface({ input: opts.input, output: opts.output, prompt: opts.prompt });

  rl.prompt();
  try {
    for await (const line of rl) {
      if (!(await runLine(opts.createProgram, line))) break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

/** Run one line; returns false when the session should end */
async function runLine(createProgram: () => Command, line: string): Promise<boolean> {
  let args: string[];
  try {
    args = splitArgs(line);
  } catch (err: unknown) {
    out.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return true;
  }

  const [first] = args;
  if (first === undefined) return true;
  if (EXIT_WORDS.has(first)) return false;

  try {
    await createProgram().parseAsync(args, { from: 'user' });
  } catch (err: unknown) {
    // commander has already printed usage errors and help text
    if (!(err instanceof CommanderError)) throw err;
  }
  return true;
}
