import type { Task } from '../task.js';
import type { TaskId } from '../types/task.js';
import { isValidTaskId } from '../types/task.js';
import { InvalidTaskIdError, TaskNotFoundError } from '../errors.js';
import type { TaskRepository } from './task-repository.js';

/**
 * Volatile, single-actor task store. Ids come from a per-instance counter
 * that starts at 1 and only moves forward, so a deleted id is never handed
 * out again. Not safe for concurrent use; hosts serialize access.
 */
export class InMemoryTaskRepository implements TaskRepository {
  // Map iteration follows insertion, and ids are inserted in increasing order
  private readonly tasks = new Map<TaskId, Task>();
  private nextId: TaskId = 1;

  add(task: Task): Task {
    const stored = task.withId(this.nextId);
    this.nextId += 1;
    this.tasks.set(stored.id, stored);
    return stored;
  }

  getById(id: TaskId): Task | null {
    assertTaskId(id);
    return this.tasks.get(id) ?? null;
  }

  getAll(): Task[] {
    return [...this.tasks.values()];
  }

  update(task: Task): Task {
    if (!this.tasks.has(task.id)) {
      throw new TaskNotFoundError(task.id);
    }
    this.tasks.set(task.id, task);
    return task;
  }

  delete(id: TaskId): boolean {
    assertTaskId(id);
    return this.tasks.delete(id);
  }

  get size(): number {
    return this.tasks.size;
  }
}

function assertTaskId(id: TaskId): void {
  if (!isValidTaskId(id)) throw new InvalidTaskIdError(id);
}
