/**
 * Base application error.
 *
 * Exit code mapping:
 *   0 = Success
 *   1 = Validation / invalid argument / configuration error
 *   2 = Task not found
 *   3 = Task file could not be read or written
 */
export class AppError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false as const,
      error: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Blank input where text is required.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(1, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Argument that could not be parsed (e.g. a task id that is not an integer).
 */
export class InvalidArgumentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(1, 'INVALID_ARGUMENT', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: number) {
    const message = id !== undefined ? `No ${resource.toLowerCase()} found with ID ${id}` : `${resource} not found`;
    super(2, 'NOT_FOUND', message, id !== undefined ? { id } : undefined);
  }
}

/**
 * The task file could not be loaded or saved. Reported, never fatal:
 * in-memory state stays authoritative.
 */
export class PersistenceWarning extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(3, 'PERSISTENCE_WARNING', message, details);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(1, 'CONFIG_ERROR', message);
  }
}

/**
 * Failures a store operation hands back to its caller.
 */
export type TaskOperationError = ValidationError | InvalidArgumentError | NotFoundError;

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Print an error the way the one-shot commands report failures, then exit.
 */
export function handleError(err: unknown, json: boolean): never {
  const appError = err instanceof AppError
    ? err
    : new AppError(1, 'UNKNOWN_ERROR', describeError(err) || 'An unexpected error occurred');

  if (json) {
    console.log(JSON.stringify(appError.toJSON(), null, 2));
  } else {
    console.error(`\nError: ${appError.message}`);
    if (appError.details && Object.keys(appError.details).length > 0) {
      console.error(`   Details: ${JSON.stringify(appError.details)}`);
    }
    console.error('');
  }

  process.exit(appError.exitCode);
}
