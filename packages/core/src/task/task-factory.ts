import { randomUUID } from 'node:crypto';
import type { Task, TaskId, TaskInput } from '../types/task.js';
import { isPriority } from '../types/priority.js';
import { isCalendarDate, todayString } from '../parsers/date-parser.js';
import { ValidationError } from './validation-error.js';

export interface TaskOptions {
  /** Keep an existing identifier (edit flow); a fresh one is generated otherwise */
  readonly id?: TaskId;
  /** Override "today" for the due-date rule */
  readonly now?: Date;
}

export type TaskValidation =
  | { readonly type: 'valid'; readonly task: Task }
  | { readonly type: 'invalid'; readonly error: ValidationError };

/** Generate an opaque task identifier */
export function generateTaskId(): TaskId {
  return randomUUID();
}

/**
 * Build a Task from raw field values.
 * Rules run in order and the first one violated is reported:
 * title, due-date format, due date not in the past, priority range.
 */
export function validateTask(input: TaskInput, options: TaskOptions = {}): TaskValidation {
  const title = input.title.trim();
  if (title.length === 0) return invalid(new ValidationError('empty-title'));

  const dueDate = input.dueDate.trim();
  if (!isCalendarDate(dueDate)) return invalid(new ValidationError('invalid-due-date'));
  if (dueDate < todayString(options.now)) return invalid(new ValidationError('past-due-date'));

  const { priority } = input;
  if (!isPriority(priority)) return invalid(new ValidationError('priority-out-of-range'));

  const { description = null } = input;

  return {
    type: 'valid',
    task: {
      id: options.id ?? generateTaskId(),
      title,
      description: description?.trim() ? description : null,
      dueDate,
      priority,
      completed: input.completed ?? false,
    },
  };
}

/** Throwing form of validateTask */
export function createTask(input: TaskInput, options?: TaskOptions): Task {
  const result = validateTask(input, options);
  if (result.type === 'invalid') throw result.error;
  return result.task;
}

function invalid(error: ValidationError): TaskValidation {
  return { type: 'invalid', error };
}
