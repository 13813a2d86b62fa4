import { Command } from 'commander';
import type { OutputConfiguration } from 'commander';
import type { ColorSupportLevel } from 'chalk';
import type { TaskRepository } from '@todo-engine/core';
import type { FailureHandler } from './helpers.js';
import type { CommandContext } from './commands/context.js';
import * as out from './output.js';
import { loadConfig } from './config.js';
import { runShell } from './shell.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createUpdateCommand } from './commands/update.js';
import { createDeleteCommand } from './commands/delete.js';
import { createCompleteCommand } from './commands/complete.js';

export const VERSION = '1.0.0';

export interface ProgramOptions {
  /**
   * Running inside `todo shell` (or a test): commander throws instead of
   * exiting the process, and the `shell` command is not offered.
   */
  interactive?: boolean;
  /** Called after a command has printed its failure */
  onFailure?: FailureHandler;
  /** Where commander writes help and usage errors */
  output?: OutputConfiguration;
  /** Colour level restored for commands run without `--no-color`; defaults to the current one */
  colorLevel?: ColorSupportLevel;
}

export function createProgram(repo: TaskRepository, options: ProgramOptions = {}): Command {
  const ctx: CommandContext = { repo, onFailure: options.onFailure };
  const config = loadConfig();
  const colorLevel = options.colorLevel ?? out.colorLevel();

  const program = new Command()
    .name('todo')
    .description('Task management CLI - track your todos from the command line')
    .version(VERSION)
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const { color } = thisCommand.opts<{ color: boolean }>();
      out.setColor(color && config.color, colorLevel);
    });

  program.addCommand(createAddCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createGetCommand(ctx));
  program.addCommand(createUpdateCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createCompleteCommand(ctx));

  if (!options.interactive) {
    program.addCommand(createShellCommand(ctx, config.prompt));
  }

  // addCommand does not pass these settings down, so apply them to each command
  for (const cmd of [program, ...program.commands]) {
    if (options.interactive) cmd.exitOverride();
    if (options.output) cmd.configureOutput(options.output);
  }

  return program;
}

function createShellCommand(ctx: CommandContext, defaultPrompt: string): Command {
  return new Command('shell')
    .description('Start an interactive session; tasks are kept until you exit')
    .option('-p, --prompt <text>', 'Prompt shown before each command', defaultPrompt)
    .action(async (opts: { prompt: string }) => {
      // taken after `todo --no-color shell` has applied, so that choice lasts the session
      const colorLevel = out.colorLevel();
      out.info(`todo ${VERSION} - type a command (e.g. add "Buy milk"), "help", or "exit"`);
      await runShell({
        input: process.stdin,
        output: process.stdout,
        prompt: opts.prompt,
        createProgram: () => createProgram(ctx.repo, { interactive: true, colorLevel }),
      });
    });
}
