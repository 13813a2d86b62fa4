import type { TaskStatus } from './task-status.js';

export type TaskId = number;

/** Id carried by a task that has not been added to a repository yet */
export const UNASSIGNED_TASK_ID: TaskId = 0;

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 1000;

/** Plain serialization view of a task; absent values are `null`, never omitted */
export interface TaskRecord {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly status: TaskStatus;
  readonly created_at: string; // ISO string
  readonly completed_at: string | null; // ISO string
}

/**
 * Fields a caller may edit after creation.
 * `undefined` leaves a field as it is; a `null` or blank description clears it.
 */
export interface TaskChanges {
  readonly title?: string;
  readonly description?: string | null;
}

/** Length in characters (code points), so astral characters count once */
export function charLength(value: string): number {
  return [...value].length;
}

export function isValidTaskId(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}
