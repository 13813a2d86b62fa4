export type { TaskRepository } from './task-repository.js';
export { InMemoryTaskRepository } from './in-memory-task-repository.js';
