import type { Task, TaskId, TaskInput } from '../types/task.js';
import { todayString } from '../parsers/date-parser.js';

export const SHORT_ID_LENGTH = 8;

/** The abbreviated id shown to users */
export function shortId(id: TaskId): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

/** A stored task whose due date has since passed; only incomplete tasks count */
export function isOverdue(task: Task, now?: Date): boolean {
  return !task.completed && task.dueDate < todayString(now);
}

/** Raw input equivalent to a stored task, the starting point of an edit */
export function toInput(task: Task): TaskInput {
  return {
    title: task.title,
    description: task.description,
    dueDate: task.dueDate,
    priority: task.priority,
    completed: task.completed,
  };
}
