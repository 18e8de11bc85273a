import type { z } from 'zod';
import { UnitError } from './errors';
import type { Schema } from './schema';
import type { Command, Query, UnitContext, UnitExample } from './types';

export interface UnitDefinition<I, O> {
  name: string;
  domain: string;
  description: string;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  inputSchema: Schema;
  outputSchema: Schema;
  examples?: UnitExample[];
  execute: (ctx: UnitContext, input: I) => Promise<O>;
}

/**
 * Decodes a raw gateway payload into a typed unit input. Missing input is read
 * as an empty object so that units with only optional fields accept it.
 */
export function decodeInput<I>(
  schema: z.ZodType<I, z.ZodTypeDef, unknown>,
  input: unknown,
  domain?: string,
): I {
  const parsed = schema.safeParse(input ?? {});
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.join('.') || 'input',
    message: issue.message,
  }));
  const first = issues[0];
  const summary = first ? `${first.path}: ${first.message}` : 'invalid input';
  throw new UnitError('INVALID_INPUT', `invalid input: ${summary}`, {
    domain,
    details: { issues },
  });
}

export function defineCommand<I, O>(
  definition: UnitDefinition<I, O>,
): Command<I, O> {
  return {
    kind: 'command',
    name: definition.name,
    domain: definition.domain,
    description: definition.description,
    inputSchema: definition.inputSchema,
    outputSchema: definition.outputSchema,
    examples: definition.examples ?? [],
    decode: (input) => decodeInput(definition.input, input, definition.domain),
    execute: definition.execute,
  };
}

export function defineQuery<I, O>(
  definition: UnitDefinition<I, O>,
): Query<I, O> {
  return {
    kind: 'query',
    name: definition.name,
    domain: definition.domain,
    description: definition.description,
    inputSchema: definition.inputSchema,
    outputSchema: definition.outputSchema,
    examples: definition.examples ?? [],
    decode: (input) => decodeInput(definition.input, input, definition.domain),
    execute: definition.execute,
  };
}

/** Guard for units constructed without a collaborator they need. */
export function requireCollaborator<T>(value: T | undefined, name: string, domain: string): T {
  if (value === undefined) {
    throw new UnitError('PROVIDER_NOT_SET', `${name} not set`, { domain });
  }
  return value;
}
