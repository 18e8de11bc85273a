export type SchemaType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export type SchemaScalar = string | number | boolean;

/** JSON-schema-like descriptor published alongside every unit. */
export interface Schema {
  type: SchemaType;
  title?: string;
  description?: string;
  properties?: Record<string, Schema>;
  required?: string[];
  items?: Schema;
  enum?: readonly SchemaScalar[];
  min?: number;
  max?: number;
  min_length?: number;
  max_length?: number;
  pattern?: string;
  default?: unknown;
  examples?: unknown[];
}

type SchemaOptions = Omit<Schema, 'type' | 'properties' | 'required' | 'items'>;

export const s = {
  string(options: SchemaOptions = {}): Schema {
    return { type: 'string', ...options };
  },
  number(options: SchemaOptions = {}): Schema {
    return { type: 'number', ...options };
  },
  boolean(options: SchemaOptions = {}): Schema {
    return { type: 'boolean', ...options };
  },
  array(items: Schema, options: SchemaOptions = {}): Schema {
    return { type: 'array', items, ...options };
  },
  object(
    properties: Record<string, Schema> = {},
    required: string[] = [],
    options: SchemaOptions = {},
  ): Schema {
    const schema: Schema = { type: 'object', properties, ...options };
    if (required.length > 0) schema.required = required;
    return schema;
  },
};

export interface SchemaIssue {
  path: string;
  message: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function typeMatches(type: SchemaType, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return isPlainObject(value);
    case 'array':
      return Array.isArray(value);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function childPath(base: string, key: string | number): string {
  if (typeof key === 'number') return `${base}[${key}]`;
  return base ? `${base}.${key}` : key;
}

/**
 * Structural check of a value against a unit schema. Unknown properties are
 * allowed; `null` on an optional property is treated as absent.
 */
export function validateAgainstSchema(
  schema: Schema,
  value: unknown,
  path = '',
): SchemaIssue[] {
  const label = path || 'input';
  if (!typeMatches(schema.type, value)) {
    return [{ path: label, message: `expected ${schema.type}, got ${describeValue(value)}` }];
  }
  const issues: SchemaIssue[] = [];

  if (schema.enum && !schema.enum.some((allowed) => allowed === value)) {
    issues.push({ path: label, message: `must be one of: ${schema.enum.join(', ')}` });
  }

  if (typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      issues.push({ path: label, message: `must be >= ${schema.min}` });
    }
    if (schema.max !== undefined && value > schema.max) {
      issues.push({ path: label, message: `must be <= ${schema.max}` });
    }
  }

  if (typeof value === 'string') {
    if (schema.min_length !== undefined && value.length < schema.min_length) {
      issues.push({ path: label, message: `length must be >= ${schema.min_length}` });
    }
    if (schema.max_length !== undefined && value.length > schema.max_length) {
      issues.push({ path: label, message: `length must be <= ${schema.max_length}` });
    }
    if (schema.pattern !== undefined && !new RegExp(schema.pattern).test(value)) {
      issues.push({ path: label, message: `must match ${schema.pattern}` });
    }
  }

  if (Array.isArray(value) && schema.items) {
    const items = schema.items;
    value.forEach((item, index) => {
      issues.push(...validateAgainstSchema(items, item, childPath(path, index)));
    });
  }

  if (isPlainObject(value)) {
    for (const key of schema.required ?? []) {
      const present = value[key];
      if (present === undefined || present === null) {
        issues.push({ path: childPath(path, key), message: 'is required' });
      }
    }
    for (const [key, propertySchema] of Object.entries(schema.properties ?? {})) {
      const propertyValue = value[key];
      if (propertyValue === undefined || propertyValue === null) continue;
      issues.push(...validateAgainstSchema(propertySchema, propertyValue, childPath(path, key)));
    }
  }

  return issues;
}
