import { afterEach, describe, expect, test } from 'vitest';
import { openSqliteDatabase, type SqliteDatabase } from '../storage/sqlite';
import { SqliteServiceStore } from './sqlite-store';
import { MemoryServiceStore } from './store';
import type { ModelService, ServiceStore } from './types';

function sampleService(id: string, overrides: Partial<ModelService> = {}): ModelService {
  return {
    id,
    name: `service-${id}`,
    model_id: 'model-00000001',
    status: 'creating',
    replicas: 1,
    resource_class: 'medium',
    endpoints: [],
    active_replicas: 0,
    config: { gpu_layers: 32 },
    created_at: 1_700_000_000,
    updated_at: 1_700_000_000,
    ...overrides,
  };
}

const databases: SqliteDatabase[] = [];

afterEach(() => {
  for (const db of databases.splice(0)) db.close();
});

const factories: Array<[string, () => ServiceStore]> = [
  ['memory', () => new MemoryServiceStore()],
  [
    'sqlite',
    () => {
      const db = openSqliteDatabase(':memory:');
      databases.push(db);
      return new SqliteServiceStore(db);
    },
  ],
];

describe.each(factories)('%s service store', (_name, createStore) => {
  test('round-trips every field', async () => {
    const store = createStore();
    const service = sampleService('svc-vllm-model-00000001', {
      status: 'running',
      endpoints: ['http://127.0.0.1:18000'],
      active_replicas: 1,
    });
    await store.create(service);
    expect(await store.get(service.id)).toEqual(service);
    await expect(store.create(service)).rejects.toMatchObject({ code: 'SERVICE_ALREADY_EXISTS' });
  });

  test('update and delete report missing services', async () => {
    const store = createStore();
    await expect(store.get('svc-vllm-nope')).rejects.toMatchObject({
      code: 'SERVICE_NOT_FOUND',
      message: 'service not found: svc-vllm-nope',
    });
    await expect(store.update(sampleService('svc-vllm-nope'))).rejects.toMatchObject({ code: 'SERVICE_NOT_FOUND' });
    await expect(store.delete('svc-vllm-nope')).rejects.toMatchObject({ code: 'SERVICE_NOT_FOUND' });

    await store.create(sampleService('svc-vllm-a'));
    await store.update(sampleService('svc-vllm-a', { status: 'stopped', replicas: 3 }));
    expect(await store.get('svc-vllm-a')).toMatchObject({ status: 'stopped', replicas: 3 });
    await store.delete('svc-vllm-a');
    expect((await store.list()).total).toBe(0);
  });

  test('list filters by status and model and pages', async () => {
    const store = createStore();
    await store.create(sampleService('svc-vllm-1', { status: 'running' }));
    await store.create(sampleService('svc-vllm-2', { model_id: 'model-00000002' }));
    await store.create(sampleService('svc-vllm-3', { status: 'running', model_id: 'model-00000002' }));

    expect((await store.list({ status: 'running' })).items.map((service) => service.id)).toEqual([
      'svc-vllm-1',
      'svc-vllm-3',
    ]);
    expect((await store.list({ model_id: 'model-00000002', status: 'running' })).total).toBe(1);
    const page = await store.list({ limit: 2, offset: 1 });
    expect(page.items.map((service) => service.id)).toEqual(['svc-vllm-2', 'svc-vllm-3']);
    expect(page.total).toBe(3);
  });
});
