import { describe, expect, it, vi } from 'vitest';
import { NotFoundError, PersistenceWarning, ValidationError, handleError } from '../../src/utils/errors.js';

class ExitCalled extends Error {
  constructor(public readonly code: string | number | null | undefined) {
    super(`exit ${code}`);
  }
}

function mockExit() {
  return vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
    throw new ExitCalled(code);
  });
}

describe('AppError subclasses', () => {
  it('should carry code and exit code', () => {
    const err = new NotFoundError('Task', 4);
    expect(err.name).toBe('NotFoundError');
    expect(err.exitCode).toBe(2);
    expect(err.toJSON()).toEqual({
      success: false,
      error: 'NOT_FOUND',
      message: 'No task found with ID 4',
      details: { id: 4 },
    });
  });

  it('should use exit code 3 for persistence warnings', () => {
    expect(new PersistenceWarning('disk').exitCode).toBe(3);
  });
});

describe('handleError', () => {
  it('should print JSON and exit with the error code', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const exit = mockExit();

    expect(() => handleError(new ValidationError('Task description cannot be empty!'), true)).toThrow(ExitCalled);

    expect(log).toHaveBeenCalledWith(JSON.stringify({
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Task description cannot be empty!',
    }, null, 2));
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should print a readable message for plain errors', () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exit = mockExit();

    expect(() => handleError(new Error('boom'), false)).toThrow(ExitCalled);

    expect(errorLog).toHaveBeenCalledWith('\nError: boom');
    expect(exit).toHaveBeenCalledWith(1);
  });
});
