import { requireCollaborator } from '../unit/define';
import { UnitError } from '../unit/errors';
import { PollingResource } from '../unit/resource';
import { s } from '../unit/schema';
import type { Resource, ResourceFactory, UnitContext } from '../unit/types';
import { type CatalogUnitDeps, recipeSchema } from './commands';
import { CATALOG_DOMAIN } from './errors';
import type { Recipe } from './types';

export const RECIPES_URI = 'asms://catalog/recipes';
export const RECIPE_URI_PREFIX = 'asms://catalog/recipe/';

export class RecipesResource extends PollingResource {
  readonly uri = RECIPES_URI;
  readonly domain = CATALOG_DOMAIN;
  readonly schema = s.object({ recipes: s.array(recipeSchema), total: s.number() }, ['recipes', 'total']);

  constructor(private readonly deps: CatalogUnitDeps) {
    super();
  }

  async get(_ctx: UnitContext): Promise<{ recipes: Recipe[]; total: number }> {
    const store = requireCollaborator(this.deps.store, 'recipe store', CATALOG_DOMAIN);
    const page = await store.list({ limit: 0 });
    return { recipes: page.items, total: page.total };
  }
}

export class RecipeResource extends PollingResource {
  readonly domain = CATALOG_DOMAIN;
  readonly schema = recipeSchema;
  readonly uri: string;

  constructor(
    private readonly recipeId: string,
    private readonly deps: CatalogUnitDeps,
  ) {
    super();
    this.uri = `${RECIPE_URI_PREFIX}${recipeId}`;
  }

  async get(_ctx: UnitContext): Promise<Recipe> {
    const store = requireCollaborator(this.deps.store, 'recipe store', CATALOG_DOMAIN);
    return store.get(this.recipeId);
  }
}

export class RecipeResourceFactory implements ResourceFactory {
  readonly pattern = `${RECIPE_URI_PREFIX}*`;

  constructor(private readonly deps: CatalogUnitDeps) {}

  canCreate(uri: string): boolean {
    const id = uri.startsWith(RECIPE_URI_PREFIX) ? uri.slice(RECIPE_URI_PREFIX.length) : '';
    return id !== '' && !id.includes('/');
  }

  create(uri: string): Resource {
    if (!this.canCreate(uri)) {
      throw new UnitError('RESOURCE_NOT_FOUND', `resource not found: ${uri}`, { domain: CATALOG_DOMAIN });
    }
    return new RecipeResource(uri.slice(RECIPE_URI_PREFIX.length), this.deps);
  }
}

export function createCatalogResources(deps: CatalogUnitDeps): {
  resources: Resource[];
  factories: ResourceFactory[];
} {
  return { resources: [new RecipesResource(deps)], factories: [new RecipeResourceFactory(deps)] };
}
