/**
 * Task entity shapes.
 *
 * `Task` is the in-memory form handed to callers; `TaskRecord` is the exact
 * shape written to the task file.
 */
import type { PersistenceWarning, TaskOperationError } from '../utils/errors.js';

export interface Task {
  id: number;
  description: string;
  completed: boolean;
  createdAt: string;       // YYYY-MM-DD HH:MM:SS, local time
  completedAt?: string;    // only once completed
}

export interface TaskRecord {
  id: number;
  description: string;
  completed: boolean;
  created_at: string;
  completed_at?: string;
}

export interface TaskStats {
  total: number;
  completed: number;
  pending: number;
  completionRate: number;
}

export type TaskListing =
  | { kind: 'empty' }
  | { kind: 'tasks'; pending: Task[]; completed: Task[] };

export type PendingListing =
  | { kind: 'caught-up' }
  | { kind: 'tasks'; tasks: Task[] };

export interface CompletedTask {
  task: Task;
  alreadyCompleted: boolean;
}

export interface ClearedTasks {
  removed: number;
}

/**
 * Outcome of a mutating store operation. A successful mutation may still
 * carry a warning when the task file could not be written.
 */
export type StoreResult<T> =
  | { success: true; data: T; warning?: PersistenceWarning }
  | { success: false; error: TaskOperationError };
