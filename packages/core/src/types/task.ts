import type { Priority } from './priority.js';

/** Simple type aliases for documentation */
export type TaskId = string;
/** yyyy-MM-dd, local time */
export type CalendarDate = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly dueDate: CalendarDate;
  readonly priority: Priority;
  readonly completed: boolean;
}

/** Raw field values as a caller collects them, before validation */
export interface TaskInput {
  readonly title: string;
  readonly description?: string | null;
  readonly dueDate: string;
  readonly priority: number;
  readonly completed?: boolean;
}

/** Fields an edit may replace; anything omitted keeps its stored value */
export interface TaskChanges {
  title?: string;
  /** null clears the description */
  description?: string | null;
  dueDate?: string;
  priority?: number;
}
