export const TaskStatus = {
  Pending: 'pending',
  Completed: 'completed',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Reverse mapping for display purposes */
export const TaskStatusName: Record<TaskStatus, string> = {
  [TaskStatus.Pending]: 'Pending',
  [TaskStatus.Completed]: 'Completed',
};
