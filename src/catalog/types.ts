import { z } from 'zod';

export const HardwareProfileSchema = z.object({
  gpu_vendor: z.string().default(''),
  gpu_model: z.string().default(''),
  gpu_arch: z.string().default(''),
  vram_min_gb: z.number().int().nonnegative().default(0),
  cpu_arch: z.string().default(''),
  os: z.string().default(''),
  unified_memory: z.boolean().default(false),
  tags: z.array(z.string()).optional(),
});

export type HardwareProfile = z.infer<typeof HardwareProfileSchema>;

export const RecipeEngineSchema = z.object({
  type: z.string().default(''),
  image: z.string().default(''),
  fallback_images: z.array(z.string()).optional(),
  config: z.record(z.string(), z.unknown()).optional(),
});

export type RecipeEngine = z.infer<typeof RecipeEngineSchema>;

export const RecipeModelSchema = z.object({
  name: z.string().default(''),
  source: z.string().default(''),
  repo: z.string().default(''),
  tag: z.string().optional(),
  type: z.string().default(''),
  format: z.string().optional(),
  mirror: z.string().optional(),
  memory_required: z.number().int().nonnegative().optional(),
});

export type RecipeModel = z.infer<typeof RecipeModelSchema>;

export const ResourceLimitsSchema = z.object({
  gpu_memory_utilization: z.number().default(0),
  max_model_len: z.number().int().default(0),
  tensor_parallel: z.number().int().default(0),
});

export type ResourceLimits = z.infer<typeof ResourceLimitsSchema>;

/** Maps one hardware profile to a validated engine, model set and config. */
export const RecipeSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().default(''),
  version: z.string().default('1.0.0'),
  author: z.string().optional(),
  profile: HardwareProfileSchema.default({}),
  engine: RecipeEngineSchema.default({}),
  models: z.array(RecipeModelSchema).default([]),
  resource_limits: ResourceLimitsSchema.default({}),
  verified: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
});

export type Recipe = z.infer<typeof RecipeSchema>;

export interface MatchResult {
  recipe: Recipe;
  score: number;
}

export interface RecipeFilter {
  tags?: string[];
  gpu_vendor?: string;
  verified_only?: boolean;
  limit?: number;
  offset?: number;
}

export interface RecipePage {
  items: Recipe[];
  total: number;
}

export interface RecipeStore {
  create(recipe: Recipe): Promise<void>;
  get(id: string): Promise<Recipe>;
  list(filter?: RecipeFilter): Promise<RecipePage>;
  update(recipe: Recipe): Promise<void>;
  delete(id: string): Promise<void>;
}

export function cloneRecipe(recipe: Recipe): Recipe {
  return structuredClone(recipe);
}
