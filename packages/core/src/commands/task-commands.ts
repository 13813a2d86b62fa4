/**
 * Task commands: the public contract adapters (CLI, HTTP, chat tools) call.
 * Each takes a repository plus primitive arguments, and lets validation and
 * not-found errors propagate unchanged. Nothing here logs or performs I/O.
 */

import { Task } from '../task.js';
import type { TaskChanges, TaskId } from '../types/task.js';
import { TaskNotFoundError } from '../errors.js';
import type { TaskRepository } from '../repository/task-repository.js';

/** Create a pending task and store it */
export function createTask(
  repo: TaskRepository,
  title: string,
  description?: string | null,
): Task {
  return repo.add(Task.create(title, description));
}

/** All tasks in ascending id order; an empty array is a normal result */
export function listTasks(repo: TaskRepository): Task[] {
  return repo.getAll();
}

/** Fetch a task, failing when it does not exist */
export function getTask(repo: TaskRepository, taskId: TaskId): Task {
  const task = repo.getById(taskId);
  if (!task) throw new TaskNotFoundError(taskId);
  return task;
}

/**
 * Apply only the supplied fields; validation runs before anything is stored.
 * `changes` carries the optional `title` and `description` arguments as one
 * object: leave a key out (or `undefined`) to keep the current value.
 */
export function updateTask(
  repo: TaskRepository,
  taskId: TaskId,
  changes: TaskChanges,
): Task {
  const updated = getTask(repo, taskId).withChanges(changes);
  return repo.update(updated);
}

/** Remove a task; unlike `TaskRepository.delete`, absence is an error here */
export function deleteTask(repo: TaskRepository, taskId: TaskId): void {
  getTask(repo, taskId);
  repo.delete(taskId);
}

/** Mark a task completed. A task that is already completed is returned as stored. */
export function completeTask(repo: TaskRepository, taskId: TaskId): Task {
  const task = getTask(repo, taskId);
  if (task.isCompleted) return task;
  return repo.update(task.markComplete());
}
