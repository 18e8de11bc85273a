import { describe, expect, test } from 'vitest';
import { createUnitContext } from '../unit/context';
import { CompatibilityResource, loadCompatibilityTable, ModelResourceFactory, ModelsResource } from './resources';
import { MemoryModelStore } from './store';
import { MODEL_FORMATS, MODEL_TYPES, type Model } from './types';

const model: Model = {
  id: 'model-0000beef',
  name: 'org/tiny',
  type: 'llm',
  format: 'gguf',
  status: 'pulling',
  source: 'huggingface',
  path: '',
  size: 0,
  checksum: '',
  tags: ['chat'],
  created_at: 10,
  updated_at: 11,
};

describe('compatibility table', () => {
  test('covers every format and model type', () => {
    const table = loadCompatibilityTable();
    expect(Object.keys(table.formats).sort()).toEqual([...MODEL_FORMATS].sort());
    expect(Object.keys(table.types).sort()).toEqual([...MODEL_TYPES].sort());
    expect(table.formats.gguf).toEqual(['llamacpp', 'ollama']);
  });

  test('the resource returns copies', async () => {
    const resource = new CompatibilityResource();
    const first = await resource.get(createUnitContext());
    first.formats.gguf?.push('mutated');
    expect((await resource.get(createUnitContext())).formats.gguf).toEqual(['llamacpp', 'ollama']);
  });
});

describe('model resources', () => {
  test('the factory accepts single ids only', () => {
    const factory = new ModelResourceFactory({});
    expect(factory.pattern).toBe('asms://model/*');
    expect(factory.canCreate('asms://model/model-0000beef')).toBe(true);
    expect(factory.canCreate('asms://model/')).toBe(false);
    expect(factory.canCreate('asms://model/a/b')).toBe(false);
    expect(factory.canCreate('asms://models')).toBe(false);
    expect(() => factory.create('asms://model/')).toThrow('resource not found: asms://model/');
  });

  test('a model resource reads the current record', async () => {
    const store = new MemoryModelStore();
    await store.create(model);
    const resource = new ModelResourceFactory({ store }).create('asms://model/model-0000beef');
    expect(resource.uri).toBe('asms://model/model-0000beef');
    expect(await resource.get(createUnitContext())).toMatchObject({ id: 'model-0000beef', status: 'pulling', tags: ['chat'] });
    await store.update({ ...model, status: 'ready' });
    expect(await resource.get(createUnitContext())).toMatchObject({ status: 'ready' });
  });

  test('the models resource lists everything', async () => {
    const store = new MemoryModelStore();
    await store.create(model);
    await store.create({ ...model, id: 'model-0000cafe' });
    const output = await new ModelsResource({ store }).get(createUnitContext());
    expect(output.total).toBe(2);
    expect(output.models.map((entry) => entry.id)).toEqual(['model-0000beef', 'model-0000cafe']);
  });

  test('a missing store is PROVIDER_NOT_SET', async () => {
    await expect(new ModelsResource({}).get(createUnitContext())).rejects.toMatchObject({
      code: 'PROVIDER_NOT_SET',
      message: 'model store not set',
    });
  });
});
