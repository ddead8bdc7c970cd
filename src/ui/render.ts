/**
 * Text for the interactive menu and the one-shot commands.
 * Every function returns the text; printing is left to the caller.
 */
import chalk from 'chalk';
import { basename } from 'path';
import type { ClearedTasks, CompletedTask, PendingListing, Task, TaskListing, TaskStats } from '../types/task.js';
import type { AppError } from '../utils/errors.js';
import { getStatusIcon } from '../utils/formatter.js';

const WIDE_RULE = '-'.repeat(60);
const NARROW_RULE = '-'.repeat(40);
const BANNER_RULE = '='.repeat(50);
const MENU_RULE = '-'.repeat(50);

export const MENU_CHOICES = [
  'Add Task',
  'View All Tasks',
  'View Pending Tasks Only',
  'Mark Task as Completed',
  'Remove Task',
  'Clear Completed Tasks',
  'Show Statistics',
  'Help',
  'Exit',
] as const;

function taskLine(task: Task, withIcon: boolean): string {
  const prefix = withIcon ? `${getStatusIcon(task)} ` : '';
  return `  ${prefix}${chalk.bold(`[${task.id}]`)} ${task.description}`;
}

export function renderTaskListing(listing: TaskListing): string {
  if (listing.kind === 'empty') {
    return '\n📝 No tasks found! Your to-do list is empty.';
  }

  const { pending, completed } = listing;
  const total = pending.length + completed.length;
  const lines = [`\n📋 Your To-Do List (${total} tasks):`, WIDE_RULE];

  if (pending.length > 0) {
    lines.push(chalk.yellow('🔄 PENDING TASKS:'));
    for (const task of pending) {
      lines.push(taskLine(task, true));
      lines.push(chalk.gray(`      Created: ${task.createdAt}`));
    }
  }

  if (completed.length > 0) {
    lines.push(chalk.green('\n✅ COMPLETED TASKS:'));
    for (const task of completed) {
      lines.push(taskLine(task, true));
      lines.push(chalk.gray(`      Completed: ${task.completedAt ?? 'Unknown'}`));
    }
  }

  lines.push(WIDE_RULE);
  lines.push(`📊 Summary: ${pending.length} pending, ${completed.length} completed`);
  return lines.join('\n');
}

export function renderPendingListing(listing: PendingListing): string {
  if (listing.kind === 'caught-up') {
    return "\n🎉 Great! No pending tasks. You're all caught up!";
  }

  const lines = [`\n⏳ Pending Tasks (${listing.tasks.length}):`, NARROW_RULE];
  for (const task of listing.tasks) {
    lines.push(taskLine(task, false));
    lines.push(chalk.gray(`      Created: ${task.createdAt}`));
  }
  lines.push(NARROW_RULE);
  return lines.join('\n');
}

export function renderStats(stats: TaskStats): string {
  if (stats.total === 0) {
    return '\n📊 Statistics: No tasks available';
  }
  return [
    '\n📊 Task Statistics:',
    `  Total tasks: ${stats.total}`,
    `  Completed: ${stats.completed}`,
    `  Pending: ${stats.pending}`,
    `  Completion rate: ${stats.completionRate.toFixed(1)}%`,
  ].join('\n');
}

export function renderAdded(task: Task): string {
  return chalk.green(`✓ Task added successfully: '${task.description}'`);
}

export function renderRemoved(task: Task): string {
  return chalk.green(`✓ Task removed: '${task.description}'`);
}

export function renderCompleted(result: CompletedTask): string {
  return chalk.green(`✓ Task marked as completed: '${result.task.description}'`);
}

export function renderCleared(result: ClearedTasks): string {
  if (result.removed === 0) {
    return 'No completed tasks to clear!';
  }
  return chalk.green(`✓ Cleared ${result.removed} completed task(s)`);
}

export function renderFailure(error: AppError): string {
  return chalk.red(`❌ Error: ${error.message}`);
}

export function renderWarning(warning: AppError): string {
  return chalk.yellow(`⚠️  Warning: ${warning.message}`);
}

export function renderMenu(): string {
  return [
    `\n${BANNER_RULE}`,
    chalk.bold('📝 TO-DO LIST MANAGER'),
    BANNER_RULE,
    ...MENU_CHOICES.map((label, i) => `${i + 1}. ${label}`),
    MENU_RULE,
  ].join('\n');
}

export function renderHelp(filePath: string): string {
  return [
    '\n📖 HELP - How to use this To-Do List Manager:',
    MENU_RULE,
    '• Add Task: Enter a description for your new task',
    '• View Tasks: See all your tasks with their status',
    '• Mark Completed: Enter the task ID to mark it as done',
    '• Remove Task: Enter the task ID to delete it permanently',
    '• Task IDs: Each task has a unique number in [brackets]',
    `• Data Storage: Tasks are automatically saved to '${basename(filePath)}'`,
    MENU_RULE,
  ].join('\n');
}

export function renderWelcome(filePath: string): string {
  return ['🚀 Welcome to your Personal To-Do List Manager!', `📁 Tasks are stored in: ${filePath}`].join('\n');
}

export function renderGoodbye(interrupted: boolean): string {
  if (interrupted) {
    return '\n\n👋 Goodbye! Your tasks have been saved.';
  }
  return ['\n👋 Thank you for using To-Do List Manager!', '💾 All your tasks have been saved automatically.'].join('\n');
}
