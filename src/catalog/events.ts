import { createEvent, type DomainEvent } from '../unit/events';
import { CATALOG_DOMAIN } from './errors';
import type { MatchProfile } from './matcher';
import type { Recipe } from './types';

export const CATALOG_EVENTS = {
  recipeCreated: 'catalog.recipe_created',
  recipeMatched: 'catalog.recipe_matched',
  recipeApplied: 'catalog.recipe_applied',
} as const;

export function recipeCreatedEvent(recipe: Recipe, correlationId: string): DomainEvent {
  return createEvent(
    CATALOG_DOMAIN,
    CATALOG_EVENTS.recipeCreated,
    { recipe_id: recipe.id, name: recipe.name, gpu_vendor: recipe.profile.gpu_vendor },
    correlationId,
  );
}

export function recipeMatchedEvent(
  recipeId: string,
  profile: MatchProfile,
  score: number,
  correlationId: string,
): DomainEvent {
  return createEvent(CATALOG_DOMAIN, CATALOG_EVENTS.recipeMatched, { recipe_id: recipeId, profile, score }, correlationId);
}

export function recipeAppliedEvent(
  recipeId: string,
  engineReady: boolean,
  modelsReady: Array<{ name: string; ready: boolean }>,
  correlationId: string,
): DomainEvent {
  return createEvent(
    CATALOG_DOMAIN,
    CATALOG_EVENTS.recipeApplied,
    { recipe_id: recipeId, engine_ready: engineReady, models_ready: modelsReady },
    correlationId,
  );
}
