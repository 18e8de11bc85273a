import { describe, expect, test } from 'vitest';
import { MemoryModelStore } from '../model/store';
import type { Model } from '../model/types';
import { createUnitContext } from '../unit/context';
import { InMemoryEventBus } from '../unit/events';
import {
  createServiceCreateCommand,
  createServiceDeleteCommand,
  createServiceScaleCommand,
  createServiceStartCommand,
  createServiceStopCommand,
} from './commands';
import { LocalServiceProvider } from './local-provider';
import { createServiceListQuery, createServiceStatusQuery } from './queries';
import { ServiceResourceFactory } from './resources';
import { MemoryServiceStore } from './store';

const ggufModel: Model = {
  id: 'model-0000abcd',
  name: 'tiny-llama',
  type: 'llm',
  format: 'gguf',
  status: 'ready',
  source: 'huggingface',
  path: '/models/tiny-llama',
  size: 18,
  checksum: '',
  tags: [],
  created_at: 1,
  updated_at: 1,
};

class FlakyProvider extends LocalServiceProvider {
  failStart = false;

  override async start(serviceId: string, signal: AbortSignal): Promise<string[]> {
    if (this.failStart) throw new Error('port in use');
    return super.start(serviceId, signal);
  }
}

async function setup() {
  const store = new MemoryServiceStore();
  const models = new MemoryModelStore();
  await models.create(ggufModel);
  const provider = new FlakyProvider();
  const events = new InMemoryEventBus();
  const deps = { store, models, provider, events };
  const ctx = createUnitContext();
  const create = createServiceCreateCommand(deps);
  const start = createServiceStartCommand(deps);
  const stop = createServiceStopCommand(deps);
  const scale = createServiceScaleCommand(deps);
  const remove = createServiceDeleteCommand(deps);
  return {
    store,
    provider,
    events,
    deps,
    createService: async (input: Record<string, unknown> = {}) =>
      (await create.execute(ctx, create.decode({ model_id: ggufModel.id, ...input }))).service_id,
    start: (id: string) => start.execute(ctx, start.decode({ service_id: id })),
    stop: (id: string) => stop.execute(ctx, stop.decode({ service_id: id })),
    scale: (id: string, replicas: number) => scale.execute(ctx, scale.decode({ service_id: id, replicas })),
    remove: (id: string) => remove.execute(ctx, remove.decode({ service_id: id })),
  };
}

describe('service.create', () => {
  test('creates a record for an existing model', async () => {
    const { store, events, createService } = await setup();
    const id = await createService({ resource_class: 'large', replicas: 2, config: { ctx_size: 4096 } });
    expect(id).toBe('svc-llamacpp-model-0000abcd');
    expect(await store.get(id)).toMatchObject({
      name: 'service-svc-llamacpp-model-0000abcd',
      model_id: 'model-0000abcd',
      status: 'creating',
      replicas: 2,
      resource_class: 'large',
      endpoints: [],
      active_replicas: 0,
      config: { ctx_size: 4096 },
    });
    expect(events.recent('service.created')[0]?.payload).toEqual({
      service_id: id,
      model_id: 'model-0000abcd',
      status: 'creating',
    });
  });

  test('an unknown model is MODEL_NOT_FOUND', async () => {
    const { createService } = await setup();
    await expect(createService({ model_id: 'model-ffffffff' })).rejects.toMatchObject({ code: 'MODEL_NOT_FOUND' });
  });

  test('a second service for the same model is SERVICE_ALREADY_EXISTS', async () => {
    const { createService } = await setup();
    await createService();
    await expect(createService()).rejects.toMatchObject({ code: 'SERVICE_ALREADY_EXISTS' });
  });

  test('decoding rejects zero replicas and unknown classes', async () => {
    const create = createServiceCreateCommand({});
    expect(() => create.decode({ model_id: 'm', replicas: 0 })).toThrow(
      'invalid input: replicas: replicas must be at least 1',
    );
    expect(() => create.decode({ model_id: 'm', resource_class: 'huge' })).toThrow(/^invalid input: resource_class: /);
  });
});

describe('service lifecycle', () => {
  test('start records endpoints and a second start is SERVICE_ALREADY_RUNNING', async () => {
    const { store, createService, start } = await setup();
    const id = await createService();
    expect(await start(id)).toEqual({ success: true, endpoints: ['http://127.0.0.1:18000'] });
    expect(await store.get(id)).toMatchObject({
      status: 'running',
      endpoints: ['http://127.0.0.1:18000'],
      active_replicas: 1,
    });
    await expect(start(id)).rejects.toMatchObject({ code: 'SERVICE_ALREADY_RUNNING' });
  });

  test('a record marked running without a live process starts again', async () => {
    const { store, provider, createService, start } = await setup();
    const id = await createService();
    await start(id);
    await provider.stop(id, true, new AbortController().signal);
    await expect(start(id)).resolves.toMatchObject({ success: true });
    expect((await store.get(id)).status).toBe('running');
  });

  test('a failed start marks the service failed', async () => {
    const { store, provider, events, createService, start } = await setup();
    const id = await createService();
    provider.failStart = true;
    await expect(start(id)).rejects.toMatchObject({
      code: 'SERVICE_START_FAILED',
      message: `start service ${id}: port in use`,
    });
    expect((await store.get(id)).status).toBe('failed');
    expect(events.recent('service.failed')[0]?.payload).toMatchObject({ status: 'failed', error: 'port in use' });
  });

  test('stop clears endpoints and is idempotent', async () => {
    const { store, events, createService, start, stop } = await setup();
    const id = await createService();
    await start(id);
    expect(await stop(id)).toEqual({ success: true });
    expect(await store.get(id)).toMatchObject({ status: 'stopped', endpoints: [], active_replicas: 0 });
    expect(await stop(id)).toEqual({ success: true });
    expect(events.recent('service.stopped')).toHaveLength(1);
  });

  test('scale validates replicas and tracks active replicas while running', async () => {
    const { store, events, createService, start, scale } = await setup();
    const id = await createService();
    await scale(id, 3);
    expect(await store.get(id)).toMatchObject({ replicas: 3, active_replicas: 0 });
    await start(id);
    await scale(id, 2);
    expect(await store.get(id)).toMatchObject({ replicas: 2, active_replicas: 2 });
    expect(events.recent('service.scaled').map((event) => event.payload)).toMatchObject([
      { from: 1, to: 3 },
      { from: 3, to: 2 },
    ]);
    await expect(scale(id, -1)).rejects.toMatchObject({ code: 'SERVICE_INVALID_REPLICAS' });
    await expect(scale(id, 1.5)).rejects.toMatchObject({ code: 'SERVICE_INVALID_REPLICAS' });
  });

  test('delete stops a running service first', async () => {
    const { store, provider, events, createService, start, remove } = await setup();
    const id = await createService();
    await start(id);
    expect(await remove(id)).toEqual({ success: true });
    expect(provider.isRunning(id)).toBe(false);
    expect(events.recent('service.stopped')).toHaveLength(1);
    await expect(store.get(id)).rejects.toMatchObject({ code: 'SERVICE_NOT_FOUND' });
    await expect(remove(id)).rejects.toMatchObject({ code: 'SERVICE_NOT_FOUND' });
  });
});

describe('service queries and resources', () => {
  test('status and list', async () => {
    const { deps, createService, start } = await setup();
    const id = await createService();
    await start(id);
    const status = createServiceStatusQuery(deps);
    expect(await status.execute(createUnitContext(), status.decode({ service_id: id }))).toEqual({
      id,
      name: `service-${id}`,
      model_id: 'model-0000abcd',
      status: 'running',
      endpoints: ['http://127.0.0.1:18000'],
    });
    const list = createServiceListQuery(deps);
    const running = await list.execute(createUnitContext(), list.decode({ status: 'running' }));
    expect(running.total).toBe(1);
    const stopped = await list.execute(createUnitContext(), list.decode({ status: 'stopped' }));
    expect(stopped).toEqual({ services: [], total: 0 });
  });

  test('the service resource factory accepts single ids', async () => {
    const { deps, createService } = await setup();
    const id = await createService();
    const factory = new ServiceResourceFactory(deps);
    expect(factory.canCreate(`asms://service/${id}`)).toBe(true);
    expect(factory.canCreate('asms://service/')).toBe(false);
    expect(factory.canCreate('asms://service/a/b')).toBe(false);
    const resource = factory.create(`asms://service/${id}`);
    expect(await resource.get(createUnitContext())).toMatchObject({ id, status: 'creating' });
    expect(() => factory.create('asms://service/')).toThrow('resource not found: asms://service/');
  });
});
