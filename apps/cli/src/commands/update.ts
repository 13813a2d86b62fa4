import { Command } from 'commander';
import { updateTask } from '@todo-engine/core';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';
import type { CommandContext } from './context.js';

export function createUpdateCommand({ repo, onFailure }: CommandContext): Command {
  return new Command('update')
    .description('Update task title and/or description by ID')
    .argument('<id>', 'Task ID to update', parseTaskIdArg)
    .option('-t, --title <text>', 'New title')
    .option('-d, --description <text>', 'New description (an empty string clears it)')
    .action((taskId: number, opts: { title?: string; description?: string }) => $try(() => {
      if (opts.title === undefined && opts.description === undefined) {
        out.warning('Nothing to update: pass --title and/or --description');
        return;
      }
      const task = updateTask(repo, taskId, opts);
      out.success(`✓ Task updated: ${out.formatTaskLine(task)}`);
    }, onFailure));
}
