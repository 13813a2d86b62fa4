import type { TaskId } from './types/task.js';

export type TaskErrorCode = 'validation' | 'not-found' | 'invalid-argument';

export type ValidationErrorKind = 'empty-title' | 'title-too-long' | 'description-too-long';

/** Base class for every failure the task engine raises */
export abstract class TaskError extends Error {
  abstract readonly code: TaskErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Task content breaks an entity rule; fixed by supplying corrected input */
export class TaskValidationError extends TaskError {
  readonly code = 'validation' as const;

  constructor(readonly kind: ValidationErrorKind, message: string) {
    super(message);
  }
}

/** The id is well formed but no stored task has it (any more) */
export class TaskNotFoundError extends TaskError {
  readonly code = 'not-found' as const;

  constructor(readonly taskId: TaskId) {
    super(`Task with ID ${taskId} not found`);
  }
}

/** The id can never refer to a task: zero, negative or not an integer */
export class InvalidTaskIdError extends TaskError {
  readonly code = 'invalid-argument' as const;

  constructor(readonly value: number) {
    super(`Invalid task ID: ${value}`);
  }
}

export function isTaskError(value: unknown): value is TaskError {
  return value instanceof TaskError;
}
