export { Priority, isPriority } from './priority.js';
export type { TaskId, CalendarDate, Task, TaskInput, TaskChanges } from './task.js';
export type { TaskResult, DataResult, BatchResult } from './results.js';
export { isSuccess, isError, successCount, anyFailed } from './results.js';
