export {
  createTask,
  listTasks,
  getTask,
  updateTask,
  deleteTask,
  completeTask,
} from './task-commands.js';
export {
  EMPTY_TASK_LIST_MESSAGE,
  formatDateTime,
  formatStatusIcon,
  formatTask,
  formatTaskList,
} from './formatters.js';
