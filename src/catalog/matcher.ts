import type { HardwareProfile, MatchResult, Recipe } from './types';

export const MATCH_WEIGHTS = {
  vendor: 40,
  model: 30,
  arch: 15,
  vram: 10,
  os: 5,
} as const;

export const DEFAULT_MATCH_LIMIT = 10;
export const MAX_MATCH_LIMIT = 50;

export type MatchProfile = Pick<HardwareProfile, 'gpu_vendor' | 'gpu_model' | 'gpu_arch' | 'vram_min_gb' | 'os'>;

/**
 * Sum of bonuses for each non-empty caller field the recipe matches exactly.
 * The VRAM bonus applies when the caller has at least the recipe's minimum.
 */
export function scoreRecipe(recipe: Recipe, hardware: MatchProfile): number {
  const wanted = recipe.profile;
  let score = 0;
  if (hardware.gpu_vendor && wanted.gpu_vendor === hardware.gpu_vendor) score += MATCH_WEIGHTS.vendor;
  if (hardware.gpu_model && wanted.gpu_model === hardware.gpu_model) score += MATCH_WEIGHTS.model;
  if (hardware.gpu_arch && wanted.gpu_arch === hardware.gpu_arch) score += MATCH_WEIGHTS.arch;
  if (hardware.vram_min_gb > 0 && hardware.vram_min_gb >= wanted.vram_min_gb) score += MATCH_WEIGHTS.vram;
  if (hardware.os && wanted.os === hardware.os) score += MATCH_WEIGHTS.os;
  return score;
}

export function clampMatchLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) return DEFAULT_MATCH_LIMIT;
  return Math.min(Math.floor(limit), MAX_MATCH_LIMIT);
}

/** Scores, drops zero scores, sorts by score (stable) and truncates. */
export function matchRecipes(recipes: readonly Recipe[], hardware: MatchProfile, limit?: number): MatchResult[] {
  const matches: MatchResult[] = [];
  for (const recipe of recipes) {
    const score = scoreRecipe(recipe, hardware);
    if (score > 0) matches.push({ recipe, score });
  }
  // Array.prototype.sort is stable, so equal scores keep store order
  matches.sort((a, b) => b.score - a.score);
  return matches.slice(0, clampMatchLimit(limit));
}
