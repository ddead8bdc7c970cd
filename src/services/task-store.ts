import type {
  ClearedTasks,
  CompletedTask,
  PendingListing,
  StoreResult,
  Task,
  TaskListing,
  TaskStats,
} from '../types/task.js';
import type { ILogger } from '../utils/logger.js';
import { NotFoundError, PersistenceWarning, ValidationError, describeError } from '../utils/errors.js';
import { parseTaskId, validateDescription } from '../utils/validation.js';
import { formatTimestamp } from '../utils/time.js';
import { readTaskFile, writeTaskFile } from './task-file.js';

/**
 * Owns the task list and keeps the task file in step with it.
 *
 * The file is loaded once on construction and rewritten in full after every
 * successful mutation. Persistence problems never throw: they are logged and
 * returned as a {@link PersistenceWarning}, and the in-memory list stays
 * authoritative for the rest of the run.
 */
export class TaskStore {
  private tasks: Task[] = [];
  private highestId = 0;
  private loadWarning: PersistenceWarning | null = null;

  constructor(
    private readonly filePath: string,
    private readonly logger: ILogger
  ) {
    this.load();
  }

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Warning raised while loading, if the file existed but could not be used.
   */
  get startupWarning(): PersistenceWarning | null {
    return this.loadWarning;
  }

  // ── Persistence ─────────────────────────────────────────────

  load(): void {
    const result = readTaskFile(this.filePath);

    if (!result.success) {
      this.tasks = [];
      this.highestId = 0;
      this.loadWarning = new PersistenceWarning(
        `Could not load tasks from ${this.filePath}. Starting with empty list.`,
        { file: this.filePath, reason: result.error }
      );
      this.logger.warn(this.loadWarning.message, { reason: result.error });
      return;
    }

    this.tasks = result.tasks;
    this.highestId = this.tasks.reduce((max, t) => Math.max(max, t.id), 0);
    this.loadWarning = null;

    if (result.normalized.length > 0) {
      this.logger.debug('Dropped completed_at from pending tasks', { ids: result.normalized });
    }
    this.logger.info(`Loaded ${this.tasks.length} tasks`, { file: this.filePath, source: result.source });
  }

  save(): PersistenceWarning | null {
    try {
      writeTaskFile(this.filePath, this.tasks);
      return null;
    } catch (err) {
      const reason = describeError(err);
      const warning = new PersistenceWarning(`Error saving tasks: ${reason}`, { file: this.filePath, reason });
      this.logger.warn(warning.message, { file: this.filePath });
      return warning;
    }
  }

  private persisted<T>(data: T): StoreResult<T> {
    const warning = this.save();
    return warning ? { success: true, data, warning } : { success: true, data };
  }

  private nextId(): number | null {
    if (this.highestId >= Number.MAX_SAFE_INTEGER) return null;
    this.highestId += 1;
    return this.highestId;
  }

  // ── Mutations ───────────────────────────────────────────────

  add(description: string): StoreResult<Task> {
    const validated = validateDescription(description);
    if (!validated.ok) {
      return { success: false, error: validated.error };
    }

    const id = this.nextId();
    if (id === null) {
      return {
        success: false,
        error: new ValidationError(`No task IDs left: the highest ID is already ${Number.MAX_SAFE_INTEGER}`),
      };
    }

    const task: Task = {
      id,
      description: validated.value,
      completed: false,
      createdAt: formatTimestamp(),
    };

    this.tasks.push(task);
    this.logger.debug(`Created task: ${task.id}`);
    return this.persisted({ ...task });
  }

  remove(id: string | number): StoreResult<Task> {
    const parsed = parseTaskId(id);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }

    const index = this.tasks.findIndex(t => t.id === parsed.value);
    if (index === -1) {
      return { success: false, error: new NotFoundError('Task', parsed.value) };
    }

    const [removed] = this.tasks.splice(index, 1);
    this.logger.debug(`Removed task: ${removed.id}`);
    return this.persisted({ ...removed });
  }

  complete(id: string | number): StoreResult<CompletedTask> {
    const parsed = parseTaskId(id);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }

    const task = this.tasks.find(t => t.id === parsed.value);
    if (!task) {
      return { success: false, error: new NotFoundError('Task', parsed.value) };
    }

    const alreadyCompleted = task.completed;
    task.completed = true;
    task.completedAt = formatTimestamp();

    this.logger.debug(`Completed task: ${task.id}`, { alreadyCompleted });
    return this.persisted({ task: { ...task }, alreadyCompleted });
  }

  clearCompleted(): StoreResult<ClearedTasks> {
    const remaining = this.tasks.filter(t => !t.completed);
    const removed = this.tasks.length - remaining.length;

    if (removed === 0) {
      return { success: true, data: { removed } };
    }

    this.tasks = remaining;
    this.logger.debug(`Cleared ${removed} completed tasks`);
    return this.persisted({ removed });
  }

  // ── Queries ─────────────────────────────────────────────────

  listAll(): TaskListing {
    if (this.tasks.length === 0) {
      return { kind: 'empty' };
    }
    return {
      kind: 'tasks',
      pending: this.tasks.filter(t => !t.completed).map(t => ({ ...t })),
      completed: this.tasks.filter(t => t.completed).map(t => ({ ...t })),
    };
  }

  listPending(): PendingListing {
    const pending = this.tasks.filter(t => !t.completed);
    if (pending.length === 0) {
      return { kind: 'caught-up' };
    }
    return { kind: 'tasks', tasks: pending.map(t => ({ ...t })) };
  }

  stats(): TaskStats {
    const total = this.tasks.length;
    const completed = this.tasks.filter(t => t.completed).length;
    return {
      total,
      completed,
      pending: total - completed,
      completionRate: total > 0 ? (completed / total) * 100 : 0,
    };
  }
}
