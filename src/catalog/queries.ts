import { z } from 'zod';
import { defineQuery, requireCollaborator } from '../unit/define';
import { wrapError } from '../unit/errors';
import { publishSafely } from '../unit/events';
import { s } from '../unit/schema';
import type { Query } from '../unit/types';
import { type CatalogUnitDeps, recipeSchema } from './commands';
import { CATALOG_DOMAIN } from './errors';
import { recipeMatchedEvent } from './events';
import { DEFAULT_MATCH_LIMIT, MAX_MATCH_LIMIT, type MatchProfile, matchRecipes } from './matcher';
import type { MatchResult, Recipe } from './types';

const recipeId = z.string({ required_error: 'recipe_id is required' }).trim().min(1, 'recipe_id is required');

/* catalog.match */

const MatchInput = z
  .object({
    gpu_vendor: z.string().default(''),
    gpu_model: z.string().default(''),
    gpu_arch: z.string().default(''),
    vram_gb: z.number().nonnegative().optional(),
    vram_min_gb: z.number().nonnegative().optional(),
    os: z.string().default(''),
    tags: z.array(z.string()).default([]),
    limit: z.number().int().optional(),
  })
  .transform((input) => ({
    profile: {
      gpu_vendor: input.gpu_vendor,
      gpu_model: input.gpu_model,
      gpu_arch: input.gpu_arch,
      vram_min_gb: Math.floor(input.vram_gb ?? input.vram_min_gb ?? 0),
      os: input.os,
    } satisfies MatchProfile,
    tags: input.tags,
    limit: input.limit,
  }));

export function createMatchQuery(
  deps: CatalogUnitDeps,
): Query<z.infer<typeof MatchInput>, { recipes: MatchResult[] }> {
  return defineQuery({
    name: 'catalog.match',
    domain: CATALOG_DOMAIN,
    description: 'Rank recipes by how well they fit a hardware profile',
    input: MatchInput,
    inputSchema: s.object({
      gpu_vendor: s.string(),
      gpu_model: s.string(),
      gpu_arch: s.string(),
      vram_gb: s.number({ min: 0, description: 'Available VRAM in GiB' }),
      vram_min_gb: s.number({ min: 0, description: 'Alias of vram_gb' }),
      os: s.string(),
      tags: s.array(s.string(), { description: 'Only recipes carrying one of these tags' }),
      limit: s.number({ default: DEFAULT_MATCH_LIMIT, max: MAX_MATCH_LIMIT }),
    }),
    outputSchema: s.object(
      {
        recipes: s.array(s.object({ recipe: recipeSchema, score: s.number() }, ['recipe', 'score']), {
          description: 'Matched recipes ordered by score (descending)',
        }),
      },
      ['recipes'],
    ),
    examples: [
      {
        description: 'Match recipes for an NVIDIA RTX 4090',
        input: { gpu_vendor: 'NVIDIA', gpu_model: 'RTX 4090', vram_gb: 24 },
        output: { recipes: [{ recipe: { id: 'recipe-1a2b3c4d', name: 'RTX 4090 LLM' }, score: 80 }] },
      },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'recipe store', CATALOG_DOMAIN);
      let recipes: Recipe[];
      try {
        recipes = (await store.list({ tags: input.tags, limit: 0 })).items;
      } catch (error) {
        throw wrapError(error, 'list recipes', 'INTERNAL_ERROR', CATALOG_DOMAIN);
      }
      const matches = matchRecipes(recipes, input.profile, input.limit);
      for (const match of matches) {
        publishSafely(
          deps.events,
          recipeMatchedEvent(match.recipe.id, input.profile, match.score, ctx.requestId),
        );
      }
      return { recipes: matches };
    },
  });
}

/* catalog.get */

const GetInput = z.object({ recipe_id: recipeId });

export function createGetRecipeQuery(deps: CatalogUnitDeps): Query<z.infer<typeof GetInput>, { recipe: Recipe }> {
  return defineQuery({
    name: 'catalog.get',
    domain: CATALOG_DOMAIN,
    description: 'Fetch one recipe',
    input: GetInput,
    inputSchema: s.object({ recipe_id: s.string({ min_length: 1 }) }, ['recipe_id']),
    outputSchema: s.object({ recipe: recipeSchema }, ['recipe']),
    examples: [
      {
        input: { recipe_id: 'recipe-1a2b3c4d' },
        output: { recipe: { id: 'recipe-1a2b3c4d', name: 'RTX 4090 LLM' } },
      },
    ],
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'recipe store', CATALOG_DOMAIN);
      try {
        return { recipe: await store.get(input.recipe_id) };
      } catch (error) {
        throw wrapError(error, `get recipe ${input.recipe_id}`, 'INTERNAL_ERROR', CATALOG_DOMAIN);
      }
    },
  });
}

/* catalog.list */

const ListInput = z.object({
  gpu_vendor: z.string().default(''),
  verified_only: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
});

export function createListRecipesQuery(
  deps: CatalogUnitDeps,
): Query<z.infer<typeof ListInput>, { recipes: Recipe[]; total: number }> {
  return defineQuery({
    name: 'catalog.list',
    domain: CATALOG_DOMAIN,
    description: 'List recipes with optional filters',
    input: ListInput,
    inputSchema: s.object({
      gpu_vendor: s.string(),
      verified_only: s.boolean({ default: false }),
      tags: s.array(s.string()),
      limit: s.number({ min: 1, max: 1000, default: 100 }),
      offset: s.number({ min: 0, default: 0 }),
    }),
    outputSchema: s.object({ recipes: s.array(recipeSchema), total: s.number() }, ['recipes', 'total']),
    examples: [
      {
        input: {},
        output: { recipes: [{ id: 'recipe-1a2b3c4d', name: 'RTX 4090 LLM' }], total: 1 },
      },
    ],
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'recipe store', CATALOG_DOMAIN);
      const page = await store.list({
        gpu_vendor: input.gpu_vendor || undefined,
        verified_only: input.verified_only,
        tags: input.tags,
        limit: input.limit,
        offset: input.offset,
      });
      return { recipes: page.items, total: page.total };
    },
  });
}

/* catalog.check_status */

const StatusInput = z.object({ recipe_id: recipeId });

export interface RecipeStatus {
  engine_ready: boolean;
  models_ready: Array<{ name: string; ready: boolean }>;
}

/** Readiness is reported as not ready until a runtime probe is wired in. */
export function createCheckStatusQuery(deps: CatalogUnitDeps): Query<z.infer<typeof StatusInput>, RecipeStatus> {
  return defineQuery({
    name: 'catalog.check_status',
    domain: CATALOG_DOMAIN,
    description: 'Report whether a recipe engine and models are available locally',
    input: StatusInput,
    inputSchema: s.object({ recipe_id: s.string({ min_length: 1 }) }, ['recipe_id']),
    outputSchema: s.object(
      {
        engine_ready: s.boolean(),
        models_ready: s.array(s.object({ name: s.string(), ready: s.boolean() }, ['name', 'ready'])),
      },
      ['engine_ready', 'models_ready'],
    ),
    examples: [
      {
        input: { recipe_id: 'recipe-1a2b3c4d' },
        output: { engine_ready: false, models_ready: [{ name: 'llama3', ready: false }] },
      },
    ],
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'recipe store', CATALOG_DOMAIN);
      const recipe = await store.get(input.recipe_id);
      return {
        engine_ready: false,
        models_ready: recipe.models.map((model) => ({ name: model.name, ready: false })),
      };
    },
  });
}

export function createCatalogQueries(deps: CatalogUnitDeps): Query[] {
  return [
    createMatchQuery(deps),
    createGetRecipeQuery(deps),
    createListRecipesQuery(deps),
    createCheckStatusQuery(deps),
  ];
}
