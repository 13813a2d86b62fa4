import { Command } from 'commander';
import { deleteTask } from '@todo-engine/core';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';
import type { CommandContext } from './context.js';

export function createDeleteCommand({ repo, onFailure }: CommandContext): Command {
  return new Command('delete')
    .description('Remove a task by ID')
    .argument('<id>', 'Task ID to delete', parseTaskIdArg)
    .action((taskId: number) => $try(() => {
      deleteTask(repo, taskId);
      out.success(`✓ Task ${taskId} deleted`);
    }, onFailure));
}
