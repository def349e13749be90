// Types
export { Priority, isPriority, isSuccess, isError, successCount, anyFailed } from './types/index.js';
export type {
  TaskId, CalendarDate, Task, TaskInput, TaskChanges,
  TaskResult, DataResult, BatchResult,
} from './types/index.js';

// Task construction
export { validateTask, createTask, generateTaskId, ValidationError, ValidationMessage } from './task/index.js';
export type { TaskOptions, TaskValidation, ValidationRule } from './task/index.js';

// Store
export { TaskStore } from './store/index.js';

// Parsers
export {
  parseDate, formatDate, addDays, startOfDay,
  todayString, isCalendarDate, toDate, daysBetween,
} from './parsers/index.js';

// Queries
export * from './queries/index.js';
