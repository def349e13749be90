export { validateTask, createTask, generateTaskId } from './task-factory.js';
export type { TaskOptions, TaskValidation } from './task-factory.js';
export { ValidationError, ValidationMessage } from './validation-error.js';
export type { ValidationRule } from './validation-error.js';
