import { Command } from 'commander';
import type { TaskStore } from '../services/task-store.js';
import type { StoreResult } from '../types/task.js';
import { handleError } from '../utils/errors.js';
import { outputJSON, outputKeyValue, outputTable, outputTaskTable } from '../utils/formatter.js';
import {
    renderAdded,
    renderCleared,
    renderCompleted,
    renderPendingListing,
    renderRemoved,
    renderStats,
    renderTaskListing,
    renderWarning,
} from '../ui/render.js';

function printResult<T>(result: StoreResult<T>, isJson: boolean, render: (data: T) => string): void {
    if (!result.success) {
        handleError(result.error, isJson);
    }
    if (isJson) {
        outputJSON(result.data, result.warning);
    } else {
        console.log(render(result.data));
        if (result.warning) {
            console.log(renderWarning(result.warning));
        }
    }
}

export function registerTaskCommands(program: Command, openStore: () => TaskStore) {
    const isJson = () => program.opts().json === true;

    program.command('add <description...>')
        .description('Add a new task')
        .action((words: string[]) => {
            printResult(openStore().add(words.join(' ')), isJson(), renderAdded);
        });

    program.command('list')
        .description('List all tasks, pending first')
        .action(() => {
            const listing = openStore().listAll();
            if (isJson()) {
                outputJSON(listing);
            } else if (listing.kind === 'empty') {
                console.log(renderTaskListing(listing));
            } else {
                outputTaskTable([...listing.pending, ...listing.completed]);
                outputKeyValue('Summary', `${listing.pending.length} pending, ${listing.completed.length} completed`);
            }
        });

    program.command('pending')
        .description('List pending tasks only')
        .action(() => {
            const listing = openStore().listPending();
            if (isJson()) {
                outputJSON(listing);
            } else if (listing.kind === 'caught-up') {
                console.log(renderPendingListing(listing));
            } else {
                outputTaskTable(listing.tasks);
            }
        });

    program.command('complete <id>')
        .description('Mark a task as completed')
        .action((id: string) => {
            printResult(openStore().complete(id), isJson(), renderCompleted);
        });

    program.command('remove <id>')
        .alias('rm')
        .description('Remove a task')
        .action((id: string) => {
            printResult(openStore().remove(id), isJson(), renderRemoved);
        });

    program.command('clear')
        .description('Remove all completed tasks')
        .action(() => {
            printResult(openStore().clearCompleted(), isJson(), renderCleared);
        });

    program.command('stats')
        .description('Show task statistics')
        .action(() => {
            const stats = openStore().stats();
            if (isJson()) {
                outputJSON(stats);
            } else if (stats.total === 0) {
                console.log(renderStats(stats));
            } else {
                outputTable(['Metric', 'Value'], [
                    ['Total tasks', stats.total],
                    ['Completed', stats.completed],
                    ['Pending', stats.pending],
                    ['Completion rate', `${stats.completionRate.toFixed(1)}%`],
                ]);
            }
        });
}
