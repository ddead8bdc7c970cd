export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMetadata = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Interface for structured logging.
 */
export interface ILogger {
  error(message: string, error?: Error, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  debug(message: string, meta?: LogMetadata): void;

  /**
   * Create a child logger whose lines carry the given context.
   */
  child?(context: LogMetadata): ILogger;

  /**
   * Change the minimum level written from now on.
   */
  setLevel?(level: LogLevel): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Console logger. Every level goes to stderr so log lines never mix with
 * command output on stdout.
 */
export class ConsoleLogger implements ILogger {
  private level: LogLevel;
  private readonly context: LogMetadata;

  private static readonly LEVELS: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
  };

  constructor(level: LogLevel = 'warn', context: LogMetadata = {}) {
    this.level = level;
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    return ConsoleLogger.LEVELS[level] <= ConsoleLogger.LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const contextStr = Object.keys(this.context).length > 0
      ? ` [${Object.entries(this.context).map(([k, v]) => `${k}=${String(v)}`).join(' ')}]`
      : '';
    const metaStr = meta && Object.keys(meta).length > 0
      ? ` ${JSON.stringify(meta)}`
      : '';
    return `${timestamp} [${level.toUpperCase()}]${contextStr} ${message}${metaStr}`;
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    const fullMeta = error ? { ...meta, error: error.message } : meta;
    console.error(this.formatMessage('error', message, fullMeta));
  }

  warn(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.error(this.formatMessage('warn', message, meta));
  }

  info(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.error(this.formatMessage('info', message, meta));
  }

  debug(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.error(this.formatMessage('debug', message, meta));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  child(context: LogMetadata): ILogger {
    return new ConsoleLogger(this.level, { ...this.context, ...context });
  }
}
