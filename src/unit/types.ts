import type { Schema } from './schema';

export type UnitKind = 'command' | 'query' | 'resource';

export interface UnitContext {
  requestId: string;
  signal: AbortSignal;
  startedAt: number;
  userId?: string;
  traceId?: string;
}

export interface UnitExample {
  input: unknown;
  output: unknown;
  description?: string;
}

/** A command mutates state, a query does not; both share this shape. */
export interface ExecutableUnit<I = unknown, O = unknown> {
  readonly kind: 'command' | 'query';
  readonly name: string;
  readonly domain: string;
  readonly description: string;
  readonly inputSchema: Schema;
  readonly outputSchema: Schema;
  readonly examples: readonly UnitExample[];
  decode(input: unknown): I;
  execute(ctx: UnitContext, input: I): Promise<O>;
}

export interface Command<I = unknown, O = unknown>
  extends ExecutableUnit<I, O> {
  readonly kind: 'command';
}

export interface Query<I = unknown, O = unknown>
  extends ExecutableUnit<I, O> {
  readonly kind: 'query';
}

export type ResourceUpdateOperation = 'refresh' | 'status_changed' | 'error';

export interface ResourceUpdate {
  uri: string;
  timestamp: number;
  operation: ResourceUpdateOperation;
  data?: unknown;
  error?: string;
}

export interface WatchOptions {
  signal: AbortSignal;
  intervalMs?: number;
}

export interface Resource {
  readonly uri: string;
  readonly domain: string;
  readonly schema: Schema;
  get(ctx: UnitContext): Promise<unknown>;
  watch(options: WatchOptions): AsyncIterable<ResourceUpdate>;
}

export interface ResourceFactory {
  readonly pattern: string;
  canCreate(uri: string): boolean;
  create(uri: string): Resource;
}

export interface UnitDescriptor {
  kind: UnitKind;
  name: string;
  domain: string;
  description: string;
  input_schema: Schema;
  output_schema: Schema;
  examples: UnitExample[];
}
