import { Command } from 'commander';
import { listTasks, formatTaskList, EMPTY_TASK_LIST_MESSAGE } from '@todo-engine/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { CommandContext } from './context.js';

export function createListCommand({ repo, onFailure }: CommandContext): Command {
  return new Command('list')
    .description('Display all tasks')
    .option('--json', 'Output in JSON format')
    .action((opts: { json?: boolean }) => $try(() => {
      const tasks = listTasks(repo);

      if (opts.json) {
        out.json(tasks.map(t => t.toRecord()));
        return;
      }

      if (tasks.length === 0) {
        out.info(EMPTY_TASK_LIST_MESSAGE);
        return;
      }
      out.info(formatTaskList(tasks));
    }, onFailure));
}
