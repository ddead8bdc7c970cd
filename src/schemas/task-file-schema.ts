import { Ajv, type ErrorObject, type JSONSchemaType } from 'ajv';
import type { TaskRecord } from '../types/task.js';

export type ValidationResult =
  | { valid: true; records: TaskRecord[] }
  | { valid: false; errors: string };

const TIMESTAMP_REGEX = '^\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}$';

/**
 * JSON Schema for the task file: an array of task records.
 */
const taskFileSchema: JSONSchemaType<TaskRecord[]> = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'integer', minimum: 1, maximum: Number.MAX_SAFE_INTEGER },
      description: { type: 'string', pattern: '\\S' },
      completed: { type: 'boolean' },
      created_at: { type: 'string', pattern: TIMESTAMP_REGEX },
      completed_at: { type: 'string', pattern: TIMESTAMP_REGEX, nullable: true },
    },
    required: ['id', 'description', 'completed', 'created_at'],
  },
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile(taskFileSchema);

function fieldOf(err: ErrorObject): string {
  return err.instancePath.replace(/^\//, '').replace(/\//g, '.') || 'value';
}

function describeIssue(err: ErrorObject): string {
  if (err.keyword === 'required' && 'missingProperty' in err.params) {
    const base = err.instancePath ? `${fieldOf(err)}.` : '';
    return `${base}${String(err.params.missingProperty)}: is required`;
  }
  return `${fieldOf(err)}: ${err.message ?? 'validation error'}`;
}

/**
 * Validate parsed task file content.
 *
 * @example
 * ```typescript
 * const result = validateTaskFile(JSON.parse(content));
 * if (result.valid) {
 *   console.log(`${result.records.length} task(s)`);
 * }
 * ```
 */
export function validateTaskFile(data: unknown): ValidationResult {
  if (validate(data)) {
    return { valid: true, records: data };
  }

  const errors = validate.errors?.map(describeIssue).join('; ');
  return {
    valid: false,
    errors: errors || 'Validation failed',
  };
}
