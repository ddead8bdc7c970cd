/**
 * Task file codec: reads and writes the JSON array of task records.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { Task, TaskRecord } from '../types/task.js';
import { validateTaskFile } from '../schemas/task-file-schema.js';
import { describeError } from '../utils/errors.js';

/**
 * Result of reading the task file.
 * `source` tells a missing or blank file apart from one that held tasks.
 */
export type TaskFileReadResult =
  | { success: true; tasks: Task[]; source: 'missing' | 'empty' | 'file'; normalized: number[] }
  | { success: false; error: string };

export function toRecord(task: Task): TaskRecord {
  const record: TaskRecord = {
    id: task.id,
    description: task.description,
    completed: task.completed,
    created_at: task.createdAt,
  };
  if (task.completedAt !== undefined) {
    record.completed_at = task.completedAt;
  }
  return record;
}

export function fromRecord(record: TaskRecord): Task {
  const task: Task = {
    id: record.id,
    description: record.description,
    completed: record.completed,
    createdAt: record.created_at,
  };
  if (record.completed && typeof record.completed_at === 'string') {
    task.completedAt = record.completed_at;
  }
  return task;
}

export function encodeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toRecord), null, 2);
}

/**
 * Parse and validate task file content.
 * `normalized` lists ids of pending records whose stray `completed_at` was dropped.
 */
export function decodeTasks(content: string): TaskFileReadResult {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    return {
      success: false,
      error: `Failed to parse task file JSON: ${describeError(err)}`,
    };
  }

  const validation = validateTaskFile(data);
  if (!validation.valid) {
    return {
      success: false,
      error: `Task file validation failed: ${validation.errors}`,
    };
  }

  const records = validation.records;
  const normalized = records
    .filter(record => !record.completed && record.completed_at != null)
    .map(record => record.id);

  return {
    success: true,
    tasks: records.map(fromRecord),
    source: 'file',
    normalized,
  };
}

export function readTaskFile(filePath: string): TaskFileReadResult {
  if (!existsSync(filePath)) {
    return { success: true, tasks: [], source: 'missing', normalized: [] };
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      success: false,
      error: `Failed to read task file: ${describeError(err)}`,
    };
  }

  if (content.trim() === '') {
    return { success: true, tasks: [], source: 'empty', normalized: [] };
  }

  return decodeTasks(content);
}

/**
 * Overwrite the task file with the full task sequence.
 * @throws when the file or its directory cannot be written
 */
export function writeTaskFile(filePath: string, tasks: readonly Task[]): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, encodeTasks(tasks), 'utf-8');
}
