import { Command } from 'commander';
import { completeTask } from '@todo-engine/core';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';
import type { CommandContext } from './context.js';

export function createCompleteCommand({ repo, onFailure }: CommandContext): Command {
  return new Command('complete')
    .description('Mark a task as completed by ID')
    .argument('<id>', 'Task ID to complete', parseTaskIdArg)
    .action((taskId: number) => $try(() => {
      const task = completeTask(repo, taskId);
      out.success(`✓ Task completed: ${out.formatTaskLine(task)}`);
    }, onFailure));
}
