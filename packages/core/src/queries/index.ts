// Task helpers
export {
  SHORT_ID_LENGTH,
  shortId,
  isOverdue,
  toInput,
} from './task-helpers.js';

// Task queries
export {
  resolveTaskId,
  getTask,
  getSortedTasks,
  getStats,
  addTask,
  editTask,
  completeTask,
  completeTasks,
  removeTask,
  removeTasks,
} from './task-queries.js';
export type { TaskStats } from './task-queries.js';
