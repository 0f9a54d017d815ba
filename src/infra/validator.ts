export type FieldRule =
  | { type: 'string'; required?: boolean; min?: number; max?: number; pattern?: RegExp }
  | { type: 'number'; required?: boolean; min?: number; max?: number; integer?: boolean }
  | {
      type: 'array';
      required?: boolean;
      minItems?: number;
      maxItems?: number;
      item?: FieldRule;
    }
  | { type: 'enum'; values: readonly string[]; required?: boolean }
  | { type: 'boolean'; required?: boolean }
  | { type: 'table'; required?: boolean; fields?: Schema; values?: FieldRule }
  | { type: 'custom'; check: (v: unknown) => string | null; required?: boolean };

export type Schema = Record<string, FieldRule>;

export function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function checkField(path: string, value: unknown, rule: FieldRule, errors: string[]): void {
  switch (rule.type) {
    case 'string':
      if (typeof value !== 'string') {
        errors.push(`${path} must be a string`);
      } else {
        if (rule.min !== undefined && value.length < rule.min)
          errors.push(`${path} must be at least ${rule.min} characters`);
        if (rule.max !== undefined && value.length > rule.max)
          errors.push(`${path} must be at most ${rule.max} characters`);
        if (rule.pattern && !rule.pattern.test(value))
          errors.push(`${path} has invalid format`);
      }
      break;

    case 'number':
      if (typeof value !== 'number' && typeof value !== 'bigint') {
        errors.push(`${path} must be a number`);
      } else {
        const n = Number(value);
        if (rule.integer && !Number.isInteger(n)) errors.push(`${path} must be an integer`);
        if (rule.min !== undefined && n < rule.min) errors.push(`${path} must be >= ${rule.min}`);
        if (rule.max !== undefined && n > rule.max) errors.push(`${path} must be <= ${rule.max}`);
      }
      break;

    case 'array':
      if (!Array.isArray(value)) {
        errors.push(`${path} must be an array`);
      } else {
        if (rule.minItems !== undefined && value.length < rule.minItems)
          errors.push(`${path} must have at least ${rule.minItems} items`);
        if (rule.maxItems !== undefined && value.length > rule.maxItems)
          errors.push(`${path} must have at most ${rule.maxItems} items`);
        if (rule.item) {
          for (let i = 0; i < value.length; i++) {
            checkField(`${path}[${i}]`, value[i], rule.item, errors);
          }
        }
      }
      break;

    case 'enum':
      if (typeof value !== 'string' || !rule.values.includes(value))
        errors.push(`${path} must be one of: ${rule.values.join(', ')}`);
      break;

    case 'boolean':
      if (typeof value !== 'boolean') errors.push(`${path} must be a boolean`);
      break;

    case 'table':
      if (!isTable(value)) {
        errors.push(`${path} must be a table`);
      } else {
        if (rule.fields) errors.push(...validate(value, rule.fields, path));
        if (rule.values) {
          for (const [key, entry] of Object.entries(value)) {
            checkField(`${path}.${key}`, entry, rule.values, errors);
          }
        }
      }
      break;

    case 'custom': {
      const problem = rule.check(value);
      if (problem) errors.push(`${path}: ${problem}`);
      break;
    }
  }
}

/**
 * Checks `data` against `schema` and returns every problem found. Field
 * paths are prefixed with `prefix` so nested tables report e.g.
 * `rules.security[0].severity must be one of: ...`.
 */
export function validate(data: Record<string, unknown>, schema: Schema, prefix?: string): string[] {
  const errors: string[] = [];

  for (const [field, rule] of Object.entries(schema)) {
    const path = prefix ? `${prefix}.${field}` : field;
    const value = data[field];
    const isPresent = value !== undefined && value !== null;

    if (rule.required !== false && !isPresent) {
      errors.push(`${path} is required`);
      continue;
    }

    if (!isPresent) continue;
    checkField(path, value, rule, errors);
  }

  return errors;
}

export function assertValid(data: Record<string, unknown>, schema: Schema): void {
  const errors = validate(data, schema);
  if (errors.length > 0) {
    throw new ValidatorError('Validation failed', errors);
  }
}

export class ValidatorError extends Error {
  constructor(
    message: string,
    public readonly errors: string[],
  ) {
    super(`${message}: ${errors.join('; ')}`);
    this.name = 'ValidatorError';
  }
}
