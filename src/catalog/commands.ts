import { z } from 'zod';
import { defineCommand, requireCollaborator } from '../unit/define';
import { wrapError } from '../unit/errors';
import { type EventPublisher, publishSafely } from '../unit/events';
import { s, type Schema } from '../unit/schema';
import type { Command } from '../unit/types';
import { generateRecipeId } from '../utils/ids';
import { type EngineAsset, toRecipeEngine } from './engine-assets';
import { CATALOG_DOMAIN } from './errors';
import { recipeAppliedEvent, recipeCreatedEvent } from './events';
import {
  HardwareProfileSchema,
  type Recipe,
  type RecipeEngine,
  RecipeEngineSchema,
  RecipeModelSchema,
  type RecipeStore,
  ResourceLimitsSchema,
} from './types';

export interface CatalogUnitDeps {
  store?: RecipeStore;
  events?: EventPublisher;
  /** Engine assets keyed by type; used to fill an engine given only by type. */
  engineAssets?: ReadonlyMap<string, EngineAsset>;
}

function resolveEngine(engine: RecipeEngine, assets: ReadonlyMap<string, EngineAsset> | undefined): RecipeEngine {
  const asset = engine.image ? undefined : assets?.get(engine.type);
  if (!asset) return engine;
  return { ...toRecipeEngine(asset), ...(engine.config ? { config: engine.config } : {}) };
}

export const profileSchema = s.object({
  gpu_vendor: s.string({ description: 'NVIDIA, AMD, Apple, ...' }),
  gpu_model: s.string(),
  gpu_arch: s.string(),
  vram_min_gb: s.number({ min: 0 }),
  cpu_arch: s.string(),
  os: s.string(),
  unified_memory: s.boolean(),
  tags: s.array(s.string()),
});

export const engineSchema = s.object({
  type: s.string(),
  image: s.string(),
  fallback_images: s.array(s.string()),
  config: s.object(),
});

const recipeModelSchema = s.object({
  name: s.string(),
  source: s.string(),
  repo: s.string(),
  tag: s.string(),
  type: s.string(),
  format: s.string(),
  mirror: s.string(),
  memory_required: s.number({ min: 0 }),
});

export const recipeSchema: Schema = s.object(
  {
    id: s.string(),
    name: s.string(),
    description: s.string(),
    version: s.string(),
    author: s.string(),
    profile: profileSchema,
    engine: engineSchema,
    models: s.array(recipeModelSchema),
    resource_limits: s.object({
      gpu_memory_utilization: s.number(),
      max_model_len: s.number(),
      tensor_parallel: s.number(),
    }),
    verified: s.boolean(),
    tags: s.array(s.string()),
  },
  ['id', 'name'],
);

/* catalog.create_recipe */

const CreateInput = z.object({
  id: z.string().trim().optional(),
  name: z.string({ required_error: 'name is required' }).trim().min(1, 'name is required'),
  description: z.string().default(''),
  version: z.string().trim().optional(),
  author: z.string().optional(),
  verified: z.boolean().default(false),
  profile: HardwareProfileSchema.default({}),
  engine: RecipeEngineSchema.default({}),
  models: z.array(RecipeModelSchema).default([]),
  resource_limits: ResourceLimitsSchema.default({}),
  tags: z.array(z.string()).default([]),
});

export function createCreateRecipeCommand(
  deps: CatalogUnitDeps,
): Command<z.infer<typeof CreateInput>, { recipe_id: string }> {
  return defineCommand({
    name: 'catalog.create_recipe',
    domain: CATALOG_DOMAIN,
    description: 'Add a recipe to the catalog',
    input: CreateInput,
    inputSchema: s.object(
      {
        id: s.string({ description: 'Explicit id; generated when empty' }),
        name: s.string({ min_length: 1 }),
        description: s.string(),
        version: s.string({ default: '1.0.0' }),
        author: s.string(),
        verified: s.boolean({ default: false }),
        profile: profileSchema,
        engine: engineSchema,
        models: s.array(recipeModelSchema),
        tags: s.array(s.string()),
      },
      ['name', 'profile', 'engine'],
    ),
    outputSchema: s.object({ recipe_id: s.string() }, ['recipe_id']),
    examples: [
      {
        input: {
          name: 'RTX 4090 LLM',
          profile: { gpu_vendor: 'NVIDIA', gpu_model: 'RTX 4090', vram_min_gb: 24 },
          engine: { type: 'vllm', image: 'vllm/vllm-openai:latest' },
        },
        output: { recipe_id: 'recipe-1a2b3c4d' },
      },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'recipe store', CATALOG_DOMAIN);
      const recipe: Recipe = {
        id: input.id || generateRecipeId(),
        name: input.name,
        description: input.description,
        version: input.version || '1.0.0',
        author: input.author,
        profile: input.profile,
        engine: resolveEngine(input.engine, deps.engineAssets),
        models: input.models,
        resource_limits: input.resource_limits,
        verified: input.verified,
        tags: input.tags,
      };
      try {
        await store.create(recipe);
      } catch (error) {
        throw wrapError(error, 'create recipe', 'INTERNAL_ERROR', CATALOG_DOMAIN);
      }
      publishSafely(deps.events, recipeCreatedEvent(recipe, ctx.requestId));
      return { recipe_id: recipe.id };
    },
  });
}

/* catalog.validate_recipe */

const ValidateInput = z.object({
  recipe: z.record(z.string(), z.unknown(), { required_error: 'recipe is required' }),
});

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function nonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value !== '';
}

/** Lists the missing required fields of a recipe document; empty when it is valid. */
export function recipeIssues(recipe: Record<string, unknown>): string[] {
  const issues: string[] = [];
  if (!nonEmptyString(recipe.name)) issues.push('name is required');
  const engine = recipe.engine;
  if (!isObject(engine)) {
    issues.push('engine is required');
  } else {
    if (!nonEmptyString(engine.type)) issues.push('engine.type is required');
    if (!nonEmptyString(engine.image)) issues.push('engine.image is required');
  }
  if (!isObject(recipe.profile)) issues.push('profile is required');
  return issues;
}

export function createValidateRecipeCommand(): Command<z.infer<typeof ValidateInput>, { valid: boolean; issues: string[] }> {
  return defineCommand({
    name: 'catalog.validate_recipe',
    domain: CATALOG_DOMAIN,
    description: 'Check a recipe document for required fields',
    input: ValidateInput,
    inputSchema: s.object({ recipe: s.object() }, ['recipe']),
    outputSchema: s.object({ valid: s.boolean(), issues: s.array(s.string()) }, ['valid', 'issues']),
    examples: [
      {
        input: { recipe: { name: 'x', engine: { type: 'vllm', image: 'vllm:latest' }, profile: {} } },
        output: { valid: true, issues: [] },
      },
      {
        input: { recipe: { name: 'x' } },
        output: { valid: false, issues: ['engine is required', 'profile is required'] },
      },
    ],
    async execute(_ctx, input) {
      const issues = recipeIssues(input.recipe);
      return { valid: issues.length === 0, issues };
    },
  });
}

/* catalog.apply_recipe */

const ApplyInput = z.object({
  recipe_id: z.string({ required_error: 'recipe_id is required' }).trim().min(1, 'recipe_id is required'),
  skip_engine: z.boolean().default(false),
  skip_models: z.boolean().default(false),
});

export interface ApplyOutput {
  engine_ready: boolean;
  models: Array<{ name: string; status: string }>;
}

/** Produces a deployment plan; pulling images and models happens elsewhere. */
export function createApplyRecipeCommand(deps: CatalogUnitDeps): Command<z.infer<typeof ApplyInput>, ApplyOutput> {
  return defineCommand({
    name: 'catalog.apply_recipe',
    domain: CATALOG_DOMAIN,
    description: 'Plan the deployment of a recipe engine and models',
    input: ApplyInput,
    inputSchema: s.object(
      {
        recipe_id: s.string({ min_length: 1 }),
        skip_engine: s.boolean({ default: false }),
        skip_models: s.boolean({ default: false }),
      },
      ['recipe_id'],
    ),
    outputSchema: s.object(
      {
        engine_ready: s.boolean(),
        models: s.array(s.object({ name: s.string(), status: s.string() }, ['name', 'status'])),
      },
      ['engine_ready', 'models'],
    ),
    examples: [
      {
        input: { recipe_id: 'recipe-1a2b3c4d' },
        output: { engine_ready: false, models: [{ name: 'llama3', status: 'pending' }] },
      },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'recipe store', CATALOG_DOMAIN);
      let recipe: Recipe;
      try {
        recipe = await store.get(input.recipe_id);
      } catch (error) {
        throw wrapError(error, `get recipe ${input.recipe_id}`, 'RECIPE_APPLY_FAILED', CATALOG_DOMAIN);
      }
      const models = input.skip_models ? [] : recipe.models.map((model) => ({ name: model.name, status: 'pending' }));
      publishSafely(
        deps.events,
        recipeAppliedEvent(
          recipe.id,
          input.skip_engine,
          models.map((model) => ({ name: model.name, ready: false })),
          ctx.requestId,
        ),
      );
      return { engine_ready: input.skip_engine, models };
    },
  });
}

export function createCatalogCommands(deps: CatalogUnitDeps): Command[] {
  return [createCreateRecipeCommand(deps), createValidateRecipeCommand(), createApplyRecipeCommand(deps)];
}
