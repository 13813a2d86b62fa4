/**
 * The Task entity. Instances are frozen values: every edit returns a new
 * task, which only becomes visible to other callers once it is handed to
 * `TaskRepository.update`.
 */

import { TaskStatus } from './types/task-status.js';
import type { TaskChanges, TaskId, TaskRecord } from './types/task.js';
import {
  UNASSIGNED_TASK_ID, TITLE_MAX_LENGTH, DESCRIPTION_MAX_LENGTH, charLength, isValidTaskId,
} from './types/task.js';
import { InvalidTaskIdError, TaskValidationError } from './errors.js';

interface TaskProps {
  id: TaskId;
  title: string;
  description: string | null;
  status: TaskStatus;
  createdAt: number; // epoch ms
  completedAt: number | null; // epoch ms
}

/** Trim a title and enforce the 1-200 character rule */
export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new TaskValidationError('empty-title', 'Title cannot be empty');
  }
  if (charLength(trimmed) > TITLE_MAX_LENGTH) {
    throw new TaskValidationError(
      'title-too-long',
      `Title cannot exceed ${TITLE_MAX_LENGTH} characters`,
    );
  }
  return trimmed;
}

/** Trim a description; blank becomes `null`, over 1000 characters is rejected */
export function normalizeDescription(description: string | null | undefined): string | null {
  if (description == null) return null;
  const trimmed = description.trim();
  if (trimmed.length === 0) return null;
  if (charLength(trimmed) > DESCRIPTION_MAX_LENGTH) {
    throw new TaskValidationError(
      'description-too-long',
      `Description cannot exceed ${DESCRIPTION_MAX_LENGTH} characters`,
    );
  }
  return trimmed;
}

export class Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly status: TaskStatus;
  private readonly createdMs: number;
  private readonly completedMs: number | null;

  private constructor(props: TaskProps) {
    this.id = props.id;
    this.title = props.title;
    this.description = props.description;
    this.status = props.status;
    this.createdMs = props.createdAt;
    this.completedMs = props.completedAt;
    Object.freeze(this);
  }

  /** Build a new pending task with an unassigned id */
  static create(title: string, description?: string | null, now: Date = new Date()): Task {
    return new Task({
      id: UNASSIGNED_TASK_ID,
      title: normalizeTitle(title),
      description: normalizeDescription(description),
      status: TaskStatus.Pending,
      createdAt: now.getTime(),
      completedAt: null,
    });
  }

  get createdAt(): Date {
    return new Date(this.createdMs);
  }

  get completedAt(): Date | null {
    return this.completedMs == null ? null : new Date(this.completedMs);
  }

  get isAssigned(): boolean {
    return this.id !== UNASSIGNED_TASK_ID;
  }

  get isCompleted(): boolean {
    return this.status === TaskStatus.Completed;
  }

  /** Copy of this task carrying a repository-assigned id */
  withId(id: TaskId): Task {
    if (!isValidTaskId(id)) throw new InvalidTaskIdError(id);
    return new Task({ ...this.props(), id });
  }

  /**
   * Apply a partial edit. Supplied fields go through the same rules as
   * `create`; omitted fields keep their current value.
   */
  withChanges(changes: TaskChanges): Task {
    const props = this.props();
    if (changes.title !== undefined) {
      props.title = normalizeTitle(changes.title);
    }
    if (changes.description !== undefined) {
      props.description = normalizeDescription(changes.description);
    }
    return new Task(props);
  }

  /**
   * Transition to completed. Completing an already completed task is a
   * no-op: the original completion time is kept.
   */
  markComplete(now: Date = new Date()): Task {
    if (this.isCompleted) return this;
    return new Task({
      ...this.props(),
      status: TaskStatus.Completed,
      completedAt: Math.max(now.getTime(), this.createdMs),
    });
  }

  toRecord(): TaskRecord {
    return {
      id: this.id,
      title: this.title,
      description: this.description,
      status: this.status,
      created_at: new Date(this.createdMs).toISOString(),
      completed_at: this.completedMs == null ? null : new Date(this.completedMs).toISOString(),
    };
  }

  toJSON(): TaskRecord {
    return this.toRecord();
  }

  private props(): TaskProps {
    return {
      id: this.id,
      title: this.title,
      description: this.description,
      status: this.status,
      createdAt: this.createdMs,
      completedAt: this.completedMs,
    };
  }
}
