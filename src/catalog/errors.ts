import { UnitError } from '../unit/errors';

export const CATALOG_DOMAIN = 'catalog';

export function recipeNotFound(id: string): UnitError {
  return new UnitError('RECIPE_NOT_FOUND', `recipe not found: ${id}`, { domain: CATALOG_DOMAIN });
}

export function recipeAlreadyExists(id: string): UnitError {
  return new UnitError('RECIPE_ALREADY_EXISTS', `recipe already exists: ${id}`, { domain: CATALOG_DOMAIN });
}
