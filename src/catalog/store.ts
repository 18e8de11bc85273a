import { recipeAlreadyExists, recipeNotFound } from './errors';
import { cloneRecipe, type Recipe, type RecipeFilter, type RecipePage, type RecipeStore } from './types';

export function hasAnyTag(recipeTags: readonly string[], wanted: readonly string[]): boolean {
  const present = new Set(recipeTags);
  return wanted.some((tag) => present.has(tag));
}

export function recipeMatchesFilter(recipe: Recipe, filter: RecipeFilter): boolean {
  if (filter.gpu_vendor && recipe.profile.gpu_vendor !== filter.gpu_vendor) return false;
  if (filter.verified_only && !recipe.verified) return false;
  if (filter.tags && filter.tags.length > 0 && !hasAnyTag(recipe.tags, filter.tags)) return false;
  return true;
}

export function paginate<T>(items: readonly T[], filter: { limit?: number; offset?: number }): T[] {
  const offset = Math.min(Math.max(0, filter.offset ?? 0), items.length);
  const limit = filter.limit ?? 0;
  return limit > 0 ? items.slice(offset, offset + limit) : items.slice(offset);
}

export class MemoryRecipeStore implements RecipeStore {
  private readonly recipes = new Map<string, Recipe>();

  async create(recipe: Recipe): Promise<void> {
    if (this.recipes.has(recipe.id)) throw recipeAlreadyExists(recipe.id);
    this.recipes.set(recipe.id, cloneRecipe(recipe));
  }

  async get(id: string): Promise<Recipe> {
    const recipe = this.recipes.get(id);
    if (!recipe) throw recipeNotFound(id);
    return cloneRecipe(recipe);
  }

  async list(filter: RecipeFilter = {}): Promise<RecipePage> {
    const matches = [...this.recipes.values()].filter((recipe) => recipeMatchesFilter(recipe, filter));
    return { items: paginate(matches, filter).map(cloneRecipe), total: matches.length };
  }

  async update(recipe: Recipe): Promise<void> {
    if (!this.recipes.has(recipe.id)) throw recipeNotFound(recipe.id);
    this.recipes.set(recipe.id, cloneRecipe(recipe));
  }

  async delete(id: string): Promise<void> {
    if (!this.recipes.delete(id)) throw recipeNotFound(id);
  }
}
