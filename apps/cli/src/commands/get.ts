import { Command } from 'commander';
import chalk from 'chalk';
import type { Task } from '@todo-engine/core';
import { TaskStatusName, getTask, formatDateTime } from '@todo-engine/core';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';
import type { CommandContext } from './context.js';

export function createGetCommand({ repo, onFailure }: CommandContext): Command {
  return new Command('get')
    .description('Show detailed information about a task')
    .argument('<id>', 'Task ID to show', parseTaskIdArg)
    .option('--json', 'Output in JSON format')
    .action((taskId: number, opts: { json?: boolean }) => $try(() => {
      const task = getTask(repo, taskId);
      if (opts.json) {
        out.json(task.toRecord());
      } else {
        outputHumanReadable(task);
      }
    }, onFailure));
}

function outputHumanReadable(task: Task): void {
  const completedAt = task.completedAt;

  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Status:')}      ${TaskStatusName[task.status]}`);
  console.log(`${chalk.bold('Created:')}     ${formatDateTime(task.createdAt)}`);
  if (completedAt) {
    console.log(`${chalk.bold('Completed:')}   ${formatDateTime(completedAt)}`);
  }
  if (task.description) {
    console.log(`${chalk.bold('Description:')}`);
    console.log(task.description);
  }
}
