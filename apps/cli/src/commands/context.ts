import type { TaskRepository } from '@todo-engine/core';
import type { FailureHandler } from '../helpers.js';

/** What every command factory receives */
export interface CommandContext {
  readonly repo: TaskRepository;
  readonly onFailure?: FailureHandler;
}
