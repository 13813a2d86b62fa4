import type { Task } from '../task.js';
import type { TaskId } from '../types/task.js';

/**
 * Storage contract for tasks. The command layer only talks to this
 * interface, so a file or database backend can replace the in-memory one.
 */
export interface TaskRepository {
  /** Assign the next unused id, store the task and return the stored copy */
  add(task: Task): Task;

  /**
   * Look a task up by id. Absence is an expected outcome and yields `null`.
   * @throws InvalidTaskIdError when `id` is not a positive integer
   */
  getById(id: TaskId): Task | null;

  /** Every stored task in ascending id order */
  getAll(): Task[];

  /**
   * Replace the stored task that has the same id.
   * @throws TaskNotFoundError when no task has that id
   */
  update(task: Task): Task;

  /**
   * Remove a task. Returns `false` when there was nothing to remove.
   * @throws InvalidTaskIdError when `id` is not a positive integer
   */
  delete(id: TaskId): boolean;
}
