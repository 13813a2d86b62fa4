import { Command } from 'commander';
import { createTask } from '@todo-engine/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { CommandContext } from './context.js';

export function createAddCommand({ repo, onFailure }: CommandContext): Command {
  return new Command('add')
    .description('Create a new task')
    .argument('<title>', 'Task title (required, 1-200 characters)')
    .option('-d, --description <text>', 'Task description (optional, max 1000 characters)')
    .action((title: string, opts: { description?: string }) => $try(() => {
      const task = createTask(repo, title, opts.description);
      out.success(`✓ Task created: ${out.formatTaskLine(task)}`);
    }, onFailure));
}
