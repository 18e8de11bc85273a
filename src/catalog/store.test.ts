import { afterEach, describe, expect, test } from 'vitest';
import { openSqliteDatabase, type SqliteDatabase } from '../storage/sqlite';
import { SqliteRecipeStore } from './sqlite-store';
import { MemoryRecipeStore, paginate } from './store';
import { type Recipe, RecipeSchema, type RecipeStore } from './types';

function sampleRecipe(id: string, overrides: Record<string, unknown> = {}): Recipe {
  return RecipeSchema.parse({ id, name: `recipe ${id}`, profile: { gpu_vendor: 'NVIDIA' }, ...overrides });
}

const databases: SqliteDatabase[] = [];

afterEach(() => {
  for (const db of databases.splice(0)) db.close();
});

const factories: Array<[string, () => RecipeStore]> = [
  ['memory', () => new MemoryRecipeStore()],
  [
    'sqlite',
    () => {
      const db = openSqliteDatabase(':memory:');
      databases.push(db);
      return new SqliteRecipeStore(db);
    },
  ],
];

describe.each(factories)('%s recipe store', (_name, createStore) => {
  test('create, get, update and delete', async () => {
    const store = createStore();
    await store.create(sampleRecipe('recipe-a'));
    await expect(store.create(sampleRecipe('recipe-a'))).rejects.toMatchObject({ code: 'RECIPE_ALREADY_EXISTS' });
    expect((await store.get('recipe-a')).profile.gpu_vendor).toBe('NVIDIA');

    await store.update({ ...sampleRecipe('recipe-a'), description: 'tuned' });
    expect((await store.get('recipe-a')).description).toBe('tuned');
    await expect(store.update(sampleRecipe('recipe-missing'))).rejects.toMatchObject({ code: 'RECIPE_NOT_FOUND' });

    await store.delete('recipe-a');
    await expect(store.get('recipe-a')).rejects.toMatchObject({ code: 'RECIPE_NOT_FOUND' });
    await expect(store.delete('recipe-a')).rejects.toMatchObject({ code: 'RECIPE_NOT_FOUND' });
  });

  test('list filters and pages in insertion order', async () => {
    const store = createStore();
    await store.create(sampleRecipe('recipe-1', { verified: true, tags: ['chat'] }));
    await store.create(sampleRecipe('recipe-2', { profile: { gpu_vendor: 'AMD' } }));
    await store.create(sampleRecipe('recipe-3', { tags: ['vision', 'chat'] }));

    const all = await store.list();
    expect(all.items.map((recipe) => recipe.id)).toEqual(['recipe-1', 'recipe-2', 'recipe-3']);
    expect((await store.list({ gpu_vendor: 'AMD' })).items.map((recipe) => recipe.id)).toEqual(['recipe-2']);
    expect((await store.list({ verified_only: true })).total).toBe(1);
    expect((await store.list({ tags: ['chat'] })).items.map((recipe) => recipe.id)).toEqual(['recipe-1', 'recipe-3']);

    const page = await store.list({ limit: 1, offset: 1 });
    expect(page.items.map((recipe) => recipe.id)).toEqual(['recipe-2']);
    expect(page.total).toBe(3);
  });

  test('returned recipes are copies', async () => {
    const store = createStore();
    await store.create(sampleRecipe('recipe-c'));
    const first = await store.get('recipe-c');
    first.tags.push('mutated');
    expect((await store.get('recipe-c')).tags).toEqual([]);
  });
});

test('paginate clamps offsets', () => {
  expect(paginate([1, 2, 3], { offset: 5 })).toEqual([]);
  expect(paginate([1, 2, 3], { offset: -1, limit: 2 })).toEqual([1, 2]);
  expect(paginate([1, 2, 3], { limit: 0 })).toEqual([1, 2, 3]);
});
