import { InvalidArgumentError, ValidationError } from './errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export type Parsed<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Parse a task id typed by the user. Surrounding whitespace and a sign are accepted.
 */
export function parseTaskId(raw: string | number): Parsed<number, InvalidArgumentError> {
  if (typeof raw === 'number') {
    if (Number.isSafeInteger(raw)) return { ok: true, value: raw };
    return {
      ok: false,
      error: new InvalidArgumentError('Please enter a valid task ID (number)!', { input: String(raw) })
    };
  }

  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return {
      ok: false,
      error: new InvalidArgumentError('Please enter a valid task ID (number)!', { input: raw })
    };
  }

  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    return {
      ok: false,
      error: new InvalidArgumentError(`Task ID is out of range: ${trimmed}`, { input: raw })
    };
  }

  return { ok: true, value };
}

export function validateDescription(raw: string): Parsed<string, ValidationError> {
  const description = raw.trim();
  if (description === '') {
    return { ok: false, error: new ValidationError('Task description cannot be empty!') };
  }
  return { ok: true, value: description };
}
