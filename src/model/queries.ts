import { z } from 'zod';
import { defineQuery, requireCollaborator } from '../unit/define';
import { wrapError } from '../unit/errors';
import { s } from '../unit/schema';
import type { Query } from '../unit/types';
import type { ModelUnitDeps } from './commands';
import { MODEL_DOMAIN } from './errors';
import {
  MODEL_FORMATS,
  MODEL_STATUSES,
  MODEL_TYPES,
  type Model,
  ModelFormatSchema,
  type ModelRequirements,
  ModelStatusSchema,
  ModelTypeSchema,
} from './types';

const modelId = z.string({ required_error: 'model_id is required' }).trim().min(1, 'model_id is required');

const requirementsSchema = s.object({
  memory_min: s.number(),
  memory_recommended: s.number(),
  gpu_type: s.string(),
  gpu_memory: s.number(),
  total_params: s.number(),
  total_bytes: s.number(),
});

export const modelViewSchema = s.object(
  {
    id: s.string(),
    name: s.string(),
    type: s.string({ enum: MODEL_TYPES }),
    format: s.string({ enum: MODEL_FORMATS }),
    status: s.string({ enum: MODEL_STATUSES }),
    source: s.string(),
    path: s.string(),
    size: s.number(),
    checksum: s.string(),
    tags: s.array(s.string()),
    requirements: requirementsSchema,
    created_at: s.number(),
    updated_at: s.number(),
  },
  ['id', 'name', 'type', 'format', 'status'],
);

export function modelView(model: Model): Record<string, unknown> {
  const view: Record<string, unknown> = {
    id: model.id,
    name: model.name,
    type: model.type,
    format: model.format,
    status: model.status,
    source: model.source,
    path: model.path,
    size: model.size,
    checksum: model.checksum,
    tags: [...model.tags],
    created_at: model.created_at,
    updated_at: model.updated_at,
  };
  if (model.requirements) view.requirements = { ...model.requirements };
  return view;
}

/* model.get */

const GetInput = z.object({ model_id: modelId });

export function createModelGetQuery(deps: ModelUnitDeps): Query<z.infer<typeof GetInput>, Record<string, unknown>> {
  return defineQuery({
    name: 'model.get',
    domain: MODEL_DOMAIN,
    description: 'Fetch one model record',
    input: GetInput,
    inputSchema: s.object({ model_id: s.string({ min_length: 1 }) }, ['model_id']),
    outputSchema: modelViewSchema,
    examples: [
      {
        input: { model_id: 'model-1a2b3c4d' },
        output: { id: 'model-1a2b3c4d', name: 'llama3-8b', type: 'llm', format: 'gguf', status: 'ready' },
      },
    ],
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'model store', MODEL_DOMAIN);
      return modelView(await store.get(input.model_id));
    },
  });
}

/* model.list */

const ListInput = z.object({
  type: ModelTypeSchema.optional(),
  status: ModelStatusSchema.optional(),
  format: ModelFormatSchema.optional(),
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
});

export interface ModelListOutput {
  items: Array<{ id: string; name: string; type: string; format: string; status: string; size: number }>;
  total: number;
}

export function createModelListQuery(deps: ModelUnitDeps): Query<z.infer<typeof ListInput>, ModelListOutput> {
  return defineQuery({
    name: 'model.list',
    domain: MODEL_DOMAIN,
    description: 'List model records with optional filters',
    input: ListInput,
    inputSchema: s.object({
      type: s.string({ enum: MODEL_TYPES }),
      status: s.string({ enum: MODEL_STATUSES }),
      format: s.string({ enum: MODEL_FORMATS }),
      limit: s.number({ min: 1, max: 1000, default: 100 }),
      offset: s.number({ min: 0, default: 0 }),
    }),
    outputSchema: s.object(
      {
        items: s.array(
          s.object({
            id: s.string(),
            name: s.string(),
            type: s.string(),
            format: s.string(),
            status: s.string(),
            size: s.number(),
          }),
        ),
        total: s.number(),
      },
      ['items', 'total'],
    ),
    examples: [{ input: { type: 'llm', limit: 10 }, output: { items: [], total: 0 } }],
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'model store', MODEL_DOMAIN);
      const page = await store.list(input);
      return {
        items: page.items.map((model) => ({
          id: model.id,
          name: model.name,
          type: model.type,
          format: model.format,
          status: model.status,
          size: model.size,
        })),
        total: page.total,
      };
    },
  });
}

/* model.search */

const SearchInput = z.object({
  query: z.string({ required_error: 'query is required' }).trim().min(1, 'query is required'),
  source: z.string().trim().optional(),
  type: ModelTypeSchema.optional(),
  limit: z.number().int().min(1).max(100).default(20),
});

export interface ModelSearchOutput {
  results: Array<{
    id: string;
    name: string;
    type: string;
    source: string;
    description: string;
    downloads: number;
  }>;
}

export function createModelSearchQuery(deps: ModelUnitDeps): Query<z.infer<typeof SearchInput>, ModelSearchOutput> {
  return defineQuery({
    name: 'model.search',
    domain: MODEL_DOMAIN,
    description: 'Search a remote model source',
    input: SearchInput,
    inputSchema: s.object(
      {
        query: s.string({ min_length: 1 }),
        source: s.string(),
        type: s.string({ enum: MODEL_TYPES }),
        limit: s.number({ min: 1, max: 100, default: 20 }),
      },
      ['query'],
    ),
    outputSchema: s.object(
      {
        results: s.array(
          s.object({
            id: s.string(),
            name: s.string(),
            type: s.string(),
            source: s.string(),
            description: s.string(),
            downloads: s.number(),
          }),
        ),
      },
      ['results'],
    ),
    examples: [
      {
        input: { query: 'llama', type: 'llm', limit: 5 },
        output: {
          results: [
            {
              id: 'org/llama-mini',
              name: 'org/llama-mini',
              type: 'llm',
              source: 'huggingface',
              description: 'text-generation',
              downloads: 1200,
            },
          ],
        },
      },
    ],
    async execute(ctx, input) {
      const provider = requireCollaborator(deps.provider, 'model provider', MODEL_DOMAIN);
      try {
        const results = await provider.search(
          { query: input.query, source: input.source || deps.defaultSource, type: input.type, limit: input.limit },
          ctx.signal,
        );
        return { results: results.map((result) => ({ ...result })) };
      } catch (error) {
        throw wrapError(error, 'search models', 'EXECUTION_FAILED', MODEL_DOMAIN);
      }
    },
  });
}

/* model.estimate_resources */

const EstimateInput = z.object({ model_id: modelId });

export function createModelEstimateQuery(
  deps: ModelUnitDeps,
): Query<z.infer<typeof EstimateInput>, ModelRequirements> {
  return defineQuery({
    name: 'model.estimate_resources',
    domain: MODEL_DOMAIN,
    description: 'Estimate memory needed to serve a model',
    input: EstimateInput,
    inputSchema: s.object({ model_id: s.string({ min_length: 1 }) }, ['model_id']),
    outputSchema: requirementsSchema,
    examples: [
      {
        input: { model_id: 'model-1a2b3c4d' },
        output: { memory_min: 4294967296, memory_recommended: 8589934592, gpu_memory: 4294967296 },
      },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'model store', MODEL_DOMAIN);
      const model = await store.get(input.model_id);
      if (model.requirements && model.requirements.memory_min !== undefined) {
        return { ...model.requirements };
      }
      const provider = requireCollaborator(deps.provider, 'model provider', MODEL_DOMAIN);
      try {
        return { ...(await provider.estimateResources(model.id, ctx.signal)) };
      } catch (error) {
        throw wrapError(error, 'estimate resources', 'EXECUTION_FAILED', MODEL_DOMAIN);
      }
    },
  });
}

export function createModelQueries(deps: ModelUnitDeps): Query[] {
  return [
    createModelGetQuery(deps),
    createModelListQuery(deps),
    createModelSearchQuery(deps),
    createModelEstimateQuery(deps),
  ];
}
