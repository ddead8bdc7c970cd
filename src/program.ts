import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { Config } from './config.js';
import { registerTaskCommands } from './commands/task.js';
import { TaskStore } from './services/task-store.js';
import { createReadlineIO, runMenu, type MenuIO } from './ui/menu.js';
import { ConsoleLogger, type ILogger } from './utils/logger.js';

export interface ProgramDeps {
  config?: Config;
  logger?: ILogger;
  createIO?: () => MenuIO;
}

type GlobalOptions = {
  file?: string;
  json?: boolean;
  debug?: boolean;
};

/**
 * Package version, read from package.json next to src/ or dist/src/.
 */
function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  for (const candidate of [join(here, '../package.json'), join(here, '../../package.json')]) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program
    .name('todo')
    .description('Console task tracker with a persistent task file')
    .version(readVersion())
    .option('-f, --file <path>', 'Task file (overrides TODO_FILE)')
    .option('--json', 'Output results as JSON')
    .option('--debug', 'Verbose logging');

  let config: Config | null = null;
  let logger: ILogger | null = null;
  let store: TaskStore | null = null;

  const resolveConfig = (): Config => {
    if (!config) {
      config = (deps.config ?? Config.fromEnvironment()).withOverrides(program.opts<GlobalOptions>());
    }
    return config;
  };

  const openLogger = (): ILogger => {
    if (!logger) {
      const level = resolveConfig().logLevel;
      logger = deps.logger ?? new ConsoleLogger(level);
      logger.setLevel?.(level);
    }
    return logger;
  };

  const openStore = (): TaskStore => {
    if (!store) {
      const config = resolveConfig();
      const base = openLogger();
      base.debug('Using configuration', { ...config.toJSON() });
      store = new TaskStore(config.taskFile, base.child ? base.child({ component: 'store' }) : base);
    }
    return store;
  };

  const menu = async () => {
    const io = (deps.createIO ?? createReadlineIO)();
    try {
      await runMenu(openStore(), io, openLogger());
    } finally {
      io.close();
    }
  };

  program.action(menu);
  program.command('menu')
    .description('Interactive menu (default)')
    .action(menu);

  registerTaskCommands(program, openStore);

  return program;
}
