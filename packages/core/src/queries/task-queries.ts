/**
 * Task operations over a session's TaskStore.
 * Each one validates, mutates the store and reports a typed result.
 */

import type { TaskStore } from '../store/task-store.js';
import type { Task, TaskId, TaskInput, TaskChanges } from '../types/task.js';
import type { TaskResult, DataResult, BatchResult } from '../types/results.js';
import { validateTask } from '../task/task-factory.js';
import { shortId, isOverdue, toInput } from './task-helpers.js';

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/**
 * Resolve a user-typed reference to a stored id: an exact id first,
 * then a unique id prefix.
 */
export function resolveTaskId(store: TaskStore, ref: string): DataResult<TaskId> {
  const trimmed = ref.trim();
  if (trimmed.length === 0) return { type: 'not-found', taskId: ref };
  if (store.has(trimmed)) return { type: 'success', data: trimmed, message: '' };

  const matches = store.findByPrefix(trimmed);
  const [only] = matches;
  if (only === undefined) return { type: 'not-found', taskId: trimmed };
  if (matches.length > 1) {
    return { type: 'error', message: `Task id '${trimmed}' is ambiguous (${matches.length} matches)` };
  }
  return { type: 'success', data: only, message: '' };
}

/** Get a single task by id or unique id prefix */
export function getTask(store: TaskStore, ref: string): Task | null {
  const resolved = resolveTaskId(store, ref);
  return resolved.type === 'success' ? store.get(resolved.data) : null;
}

/** All tasks ordered by due date */
export function getSortedTasks(store: TaskStore): Task[] {
  return store.listSorted();
}

export interface TaskStats {
  readonly total: number;
  readonly active: number;
  readonly completed: number;
  readonly overdue: number;
}

export function getStats(store: TaskStore, now?: Date): TaskStats {
  const taskList = store.listSorted();
  const completed = taskList.filter(t => t.completed).length;
  return {
    total: taskList.length,
    active: taskList.length - completed,
    completed,
    overdue: taskList.filter(t => isOverdue(t, now)).length,
  };
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

/** Validate raw input and store the new task */
export function addTask(store: TaskStore, input: TaskInput, now?: Date): DataResult<Task> {
  const result = validateTask(input, { now });
  if (result.type === 'invalid') {
    return { type: 'invalid', rule: result.error.rule, message: result.error.message };
  }
  store.add(result.task);
  return { type: 'success', data: result.task, message: 'Task added successfully!' };
}

/**
 * Edit a stored task: overlay `changes` on its current values, keep its
 * completion flag and id, and re-validate the whole replacement.
 */
export function editTask(
  store: TaskStore,
  ref: string,
  changes: TaskChanges,
  now?: Date,
): DataResult<Task> {
  const resolved = resolveTaskId(store, ref);
  if (resolved.type !== 'success') return resolved;
  const id = resolved.data;

  const current = store.get(id);
  if (!current) return { type: 'not-found', taskId: ref };

  const result = validateTask(applyChanges(toInput(current), changes), { id, now });
  if (result.type === 'invalid') {
    return { type: 'invalid', rule: result.error.rule, message: result.error.message };
  }
  if (!store.update(id, result.task)) return { type: 'not-found', taskId: ref };
  return { type: 'success', data: result.task, message: 'Task updated successfully!' };
}

function applyChanges(input: TaskInput, changes: TaskChanges): TaskInput {
  return {
    ...input,
    title: changes.title ?? input.title,
    description: changes.description !== undefined ? changes.description : input.description,
    dueDate: changes.dueDate ?? input.dueDate,
    priority: changes.priority ?? input.priority,
  };
}

export function completeTask(store: TaskStore, ref: string): TaskResult {
  const resolved = resolveTaskId(store, ref);
  if (resolved.type !== 'success') return resolved;
  const id = resolved.data;

  const wasCompleted = store.get(id)?.completed ?? false;
  if (!store.markComplete(id)) return { type: 'not-found', taskId: ref };
  if (wasCompleted) return { type: 'no-change', message: `Task ${shortId(id)} is already completed` };
  return { type: 'success', message: `Completed task: ${shortId(id)}` };
}

export function completeTasks(store: TaskStore, refs: readonly string[]): BatchResult {
  return { results: refs.map(ref => completeTask(store, ref)) };
}

export function removeTask(store: TaskStore, ref: string): TaskResult {
  const resolved = resolveTaskId(store, ref);
  if (resolved.type !== 'success') return resolved;
  const id = resolved.data;

  if (!store.delete(id)) return { type: 'not-found', taskId: ref };
  return { type: 'success', message: `Deleted task: ${shortId(id)}` };
}

export function removeTasks(store: TaskStore, refs: readonly string[]): BatchResult {
  return { results: refs.map(ref => removeTask(store, ref)) };
}
