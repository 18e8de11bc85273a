import {
  changes,
  isRecord,
  isUniqueViolation,
  namedArgs,
  parseJsonColumn,
  readString,
  type SqliteDatabase,
} from '../storage/sqlite';
import { recipeAlreadyExists, recipeNotFound } from './errors';
import { paginate, recipeMatchesFilter } from './store';
import { type Recipe, type RecipeFilter, type RecipePage, RecipeSchema, type RecipeStore } from './types';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS catalog_recipes (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  gpu_vendor TEXT NOT NULL DEFAULT '',
  verified INTEGER NOT NULL DEFAULT 0,
  data TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_catalog_recipes_gpu_vendor ON catalog_recipes(gpu_vendor);
CREATE INDEX IF NOT EXISTS idx_catalog_recipes_verified ON catalog_recipes(verified);
`;

function rowToRecipe(row: unknown): Recipe {
  if (!isRecord(row)) throw new Error('unexpected recipe row');
  const parsed = RecipeSchema.safeParse(parseJsonColumn(readString(row, 'data')));
  if (!parsed.success) throw new Error(`corrupt recipe row: ${readString(row, 'id')}`);
  return parsed.data;
}

function recipeParams(recipe: Recipe): Record<string, string | number> {
  return {
    id: recipe.id,
    name: recipe.name,
    gpu_vendor: recipe.profile.gpu_vendor,
    verified: recipe.verified ? 1 : 0,
    data: JSON.stringify(recipe),
  };
}

/** Vendor and verified filters run in SQL; tags and paging in process. */
export class SqliteRecipeStore implements RecipeStore {
  constructor(private readonly db: SqliteDatabase) {
    db.exec(SCHEMA);
  }

  async create(recipe: Recipe): Promise<void> {
    try {
      this.db
        .query(
          `INSERT INTO catalog_recipes (id, name, gpu_vendor, verified, data)
           VALUES (@id, @name, @gpu_vendor, @verified, @data)`,
        )
        .run(recipeParams(recipe));
    } catch (error) {
      if (isUniqueViolation(error)) throw recipeAlreadyExists(recipe.id);
      throw error;
    }
  }

  async get(id: string): Promise<Recipe> {
    const row = this.db.query('SELECT * FROM catalog_recipes WHERE id = ?').get(id);
    if (!row) throw recipeNotFound(id);
    return rowToRecipe(row);
  }

  async list(filter: RecipeFilter = {}): Promise<RecipePage> {
    const clauses: string[] = [];
    const params: Record<string, string | number> = {};
    if (filter.gpu_vendor) {
      clauses.push('gpu_vendor = @gpu_vendor');
      params.gpu_vendor = filter.gpu_vendor;
    }
    if (filter.verified_only) clauses.push('verified = 1');
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const matches = this.db
      .query(`SELECT * FROM catalog_recipes ${where} ORDER BY rowid ASC`)
      .all(...namedArgs(params))
      .map(rowToRecipe)
      .filter((recipe) => recipeMatchesFilter(recipe, { tags: filter.tags }));
    return { items: paginate(matches, filter), total: matches.length };
  }

  async update(recipe: Recipe): Promise<void> {
    const result = this.db
      .query('UPDATE catalog_recipes SET name = @name, gpu_vendor = @gpu_vendor, verified = @verified, data = @data WHERE id = @id')
      .run(recipeParams(recipe));
    if (changes(result) === 0) throw recipeNotFound(recipe.id);
  }

  async delete(id: string): Promise<void> {
    const result = this.db.query('DELETE FROM catalog_recipes WHERE id = ?').run(id);
    if (changes(result) === 0) throw recipeNotFound(id);
  }
}
