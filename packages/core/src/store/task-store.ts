/**
 * In-memory task collection keyed by id.
 * One instance per session; it owns the canonical copy of every task.
 */

import type { Task, TaskId } from '../types/task.js';

export class TaskStore {
  private readonly tasks = new Map<TaskId, Task>();

  get size(): number {
    return this.tasks.size;
  }

  /** Insert under task.id. An existing entry with the same id is overwritten. */
  add(task: Task): void {
    this.tasks.set(task.id, task);
  }

  get(id: TaskId): Task | null {
    return this.tasks.get(id) ?? null;
  }

  has(id: TaskId): boolean {
    return this.tasks.has(id);
  }

  /**
   * Replace the task stored under `id`. The stored value always keeps `id`,
   * whatever `task.id` says. Returns false (store untouched) when absent.
   */
  update(id: TaskId, task: Task): boolean {
    if (!this.tasks.has(id)) return false;
    this.tasks.set(id, { ...task, id });
    return true;
  }

  delete(id: TaskId): boolean {
    return this.tasks.delete(id);
  }

  /** Idempotent; returns whether the task exists */
  markComplete(id: TaskId): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;
    if (!task.completed) this.tasks.set(id, { ...task, completed: true });
    return true;
  }

  /** All tasks by ascending due date; equal dates keep insertion order */
  listSorted(): Task[] {
    return [...this.tasks.values()].sort((a, b) => a.dueDate.localeCompare(b.dueDate));
  }

  /** Ids that start with `prefix` */
  findByPrefix(prefix: string): TaskId[] {
    const needle = prefix.toLowerCase();
    return [...this.tasks.keys()].filter(id => id.toLowerCase().startsWith(needle));
  }
}
