import chalk from 'chalk';
import Table from 'cli-table3';
import type { AppError } from './errors.js';
import type { Task } from '../types/task.js';

export function outputJSON(data: unknown, warning?: AppError) {
    const payload = warning
        ? { success: true, data, warning: { code: warning.code, message: warning.message } }
        : { success: true, data };
    console.log(JSON.stringify(payload, null, 2));
}

export function outputTable(headers: string[], rows: (string | number)[][]) {
    const table = new Table({
        head: headers.map(h => chalk.cyan(h)),
        style: { head: [], border: [] }
    });
    table.push(...rows);
    console.log(table.toString());
}

export function outputKeyValue(key: string, value: string) {
    console.log(`${chalk.bold(key)}: ${value}`);
}

export function outputTaskTable(tasks: Task[]) {
    outputTable(
        ['ID', 'Status', 'Description', 'Created', 'Completed'],
        tasks.map(task => [
            task.id,
            getStatusIcon(task),
            task.description,
            task.createdAt,
            task.completedAt ?? '',
        ])
    );
}

export function getStatusIcon(task: Task): string {
    return task.completed ? '✓' : '⏳';
}
