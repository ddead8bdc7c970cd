import chalk from 'chalk';
import { createInterface } from 'readline';
import type { TaskStore } from '../services/task-store.js';
import type { StoreResult } from '../types/task.js';
import type { ILogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import {
  MENU_CHOICES,
  renderAdded,
  renderCleared,
  renderCompleted,
  renderFailure,
  renderGoodbye,
  renderHelp,
  renderMenu,
  renderPendingListing,
  renderRemoved,
  renderStats,
  renderTaskListing,
  renderWarning,
  renderWelcome,
} from './render.js';

/**
 * Thrown by {@link MenuIO.ask} when input ends (Ctrl+C or Ctrl+D).
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface MenuIO {
  ask(prompt: string): Promise<string>;
  print(text: string): void;
  close(): void;
}

type MenuOutcome = 'continue' | 'exit';

/**
 * Readline-backed menu input. Lines are queued as they arrive, so a script
 * piped into stdin is answered line by line even when it comes in one chunk.
 */
export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): MenuIO {
  const rl = createInterface({ input, output });
  const lines: string[] = [];
  let waiting: { resolve: (line: string) => void; reject: (err: Error) => void } | null = null;
  let closed = false;

  rl.on('line', (line: string) => {
    if (waiting) {
      const { resolve } = waiting;
      waiting = null;
      resolve(line);
    } else {
      lines.push(line);
    }
  });
  rl.on('close', () => {
    closed = true;
    if (waiting) {
      const { reject } = waiting;
      waiting = null;
      reject(new InputClosedError());
    }
  });
  rl.on('SIGINT', () => rl.close());

  return {
    ask(prompt: string): Promise<string> {
      if (closed) {
        output.write(prompt);
      } else {
        rl.setPrompt(prompt);
        rl.prompt();
      }

      const queued = lines.shift();
      if (queued !== undefined) return Promise.resolve(queued);
      if (closed) return Promise.reject(new InputClosedError());

      return new Promise<string>((resolve, reject) => {
        waiting = { resolve, reject };
      });
    },
    print(text: string): void {
      output.write(`${text}\n`);
    },
    close(): void {
      if (!closed) rl.close();
    },
  };
}

function report<T>(io: MenuIO, result: StoreResult<T>, render: (data: T) => string): void {
  if (!result.success) {
    io.print(renderFailure(result.error));
    return;
  }
  io.print(render(result.data));
  if (result.warning) {
    io.print(renderWarning(result.warning));
  }
}

async function runChoice(choice: string, store: TaskStore, io: MenuIO): Promise<MenuOutcome> {
  switch (choice) {
    case '1': {
      const description = await io.ask('\n📝 Enter task description: ');
      report(io, store.add(description), renderAdded);
      return 'continue';
    }
    case '2':
      io.print(renderTaskListing(store.listAll()));
      return 'continue';
    case '3':
      io.print(renderPendingListing(store.listPending()));
      return 'continue';
    case '4': {
      const pending = store.listPending();
      io.print(renderPendingListing(pending));
      if (pending.kind === 'tasks') {
        const id = await io.ask('\n✅ Enter task ID to mark as completed: ');
        report(io, store.complete(id), renderCompleted);
      }
      return 'continue';
    }
    case '5': {
      const listing = store.listAll();
      io.print(renderTaskListing(listing));
      if (listing.kind === 'tasks') {
        const id = await io.ask('\n🗑️  Enter task ID to remove: ');
        report(io, store.remove(id), renderRemoved);
      }
      return 'continue';
    }
    case '6':
      report(io, store.clearCompleted(), renderCleared);
      return 'continue';
    case '7':
      io.print(renderStats(store.stats()));
      return 'continue';
    case '8':
      io.print(renderHelp(store.path));
      return 'continue';
    case '9':
      return 'exit';
    default:
      io.print(chalk.red(`❌ Invalid choice! Please enter a number between 1-${MENU_CHOICES.length}.`));
      return 'continue';
  }
}

/**
 * Interactive menu loop. Returns when the user exits or input ends; an
 * unexpected error in one iteration is logged and the loop carries on.
 */
export async function runMenu(store: TaskStore, io: MenuIO, logger: ILogger): Promise<void> {
  io.print(renderWelcome(store.path));

  for (;;) {
    io.print(renderMenu());
    try {
      const choice = (await io.ask(`Enter your choice (1-${MENU_CHOICES.length}): `)).trim();
      if (await runChoice(choice, store, io) === 'exit') {
        io.print(renderGoodbye(false));
        return;
      }
    } catch (err) {
      if (err instanceof InputClosedError) {
        io.print(renderGoodbye(true));
        return;
      }
      logger.error('Unexpected error in menu loop', err instanceof Error ? err : undefined);
      io.print(chalk.red(`❌ An error occurred: ${describeError(err)}`));
    }
  }
}
