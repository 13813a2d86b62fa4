// Types
export { TaskStatus, TaskStatusName } from './types/task-status.js';
export type { TaskId, TaskRecord, TaskChanges } from './types/task.js';
export {
  UNASSIGNED_TASK_ID, TITLE_MAX_LENGTH, DESCRIPTION_MAX_LENGTH, charLength, isValidTaskId,
} from './types/task.js';

// Errors
export {
  TaskError, TaskValidationError, TaskNotFoundError, InvalidTaskIdError, isTaskError,
} from './errors.js';
export type { TaskErrorCode, ValidationErrorKind } from './errors.js';

// Entity
export { Task, normalizeTitle, normalizeDescription } from './task.js';

// Repository
export { InMemoryTaskRepository } from './repository/index.js';
export type { TaskRepository } from './repository/index.js';

// Commands
export * from './commands/index.js';
