import type { Task } from '../task.js';

export const EMPTY_TASK_LIST_MESSAGE = 'No tasks found. Create one with: todo add <title>';

/** `YYYY-MM-DD HH:MM:SS`, always UTC */
export function formatDateTime(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function formatStatusIcon(task: Task): string {
  return task.isCompleted ? '✓' : '○';
}

/** One-line summary: `[id] icon title - description` */
export function formatTask(task: Task): string {
  const desc = task.description ? ` - ${task.description}` : '';
  return `[${task.id}] ${formatStatusIcon(task)} ${task.title}${desc}`;
}

export function formatTaskList(tasks: readonly Task[]): string {
  const lines: string[] = [];
  for (const task of tasks) {
    lines.push(formatTask(task));
    lines.push(`    Created: ${formatDateTime(task.createdAt)}`);
    const completedAt = task.completedAt;
    if (task.isCompleted && completedAt) {
      lines.push(`    Completed: ${formatDateTime(completedAt)}`);
    }
  }
  return lines.join('\n');
}
