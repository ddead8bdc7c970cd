import dotenv from 'dotenv';
import path from 'path';
import os from 'os';
import { ConfigError } from './utils/errors.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

// Load env vars from CWD .env
dotenv.config();

export const DEFAULT_TASK_FILE = 'tasks.txt';

export interface ConfigOptions {
  taskFile: string;
  logLevel: LogLevel;
}

/**
 * Expand ~ to home directory and resolve relative paths against the working directory.
 */
export function expandPath(p: string, cwd: string = process.cwd()): string {
  if (p === '~' || p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return path.resolve(cwd, p);
}

/**
 * Centralized configuration.
 * Loaded from TODO_FILE and TODO_LOG_LEVEL with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor(options: ConfigOptions) {
    this.config = { ...options };
  }

  static fromEnvironment(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
    const rawFile = env.TODO_FILE?.trim() || DEFAULT_TASK_FILE;
    const rawLevel = (env.TODO_LOG_LEVEL?.trim() || 'warn').toLowerCase();

    if (!isLogLevel(rawLevel)) {
      throw new ConfigError('TODO_LOG_LEVEL must be "error", "warn", "info", or "debug"');
    }

    return new Config({
      taskFile: expandPath(rawFile, cwd),
      logLevel: rawLevel
    });
  }

  get taskFile(): string { return this.config.taskFile; }
  get logLevel(): LogLevel { return this.config.logLevel; }

  /**
   * Copy with command-line overrides (--file, --debug) applied.
   */
  withOverrides(overrides: { file?: string; debug?: boolean }, cwd: string = process.cwd()): Config {
    return new Config({
      taskFile: overrides.file ? expandPath(overrides.file, cwd) : this.config.taskFile,
      logLevel: overrides.debug ? 'debug' : this.config.logLevel
    });
  }

  toJSON(): ConfigOptions {
    return { ...this.config };
  }
}
