import { describe, expect, test } from 'vitest';
import type { Model } from '../model/types';
import { engineForModel, LocalServiceProvider } from './local-provider';
import { formatServiceId, parseServiceId } from './service-id';

const signal = new AbortController().signal;

function model(overrides: Partial<Model> = {}): Model {
  return {
    id: 'model-0000abcd',
    name: 'tiny',
    type: 'llm',
    format: 'safetensors',
    status: 'ready',
    source: 'huggingface',
    path: '/models/tiny',
    size: 1,
    checksum: '',
    tags: [],
    created_at: 1,
    updated_at: 1,
    ...overrides,
  };
}

describe('service ids', () => {
  test('format and parse', () => {
    expect(formatServiceId('vllm', 'model-0000abcd')).toBe('svc-vllm-model-0000abcd');
    expect(parseServiceId('svc-llamacpp-model-0000abcd')).toEqual({ engine: 'llamacpp', modelId: 'model-0000abcd' });
  });

  test('rejects malformed ids', () => {
    for (const id of ['vllm-model-1', 'svc-', 'svc--model', 'svc-vllm-']) {
      expect(() => parseServiceId(id)).toThrow(`invalid service id: ${id} (expected svc-<engine>-<model>)`);
    }
  });
});

test('engineForModel', () => {
  expect(engineForModel(model({ source: 'ollama', format: 'gguf' }))).toBe('ollama');
  expect(engineForModel(model({ format: 'gguf' }))).toBe('llamacpp');
  expect(engineForModel(model({ type: 'asr' }))).toBe('whisper');
  expect(engineForModel(model({ type: 'tts' }))).toBe('tts');
  expect(engineForModel(model())).toBe('vllm');
});

describe('LocalServiceProvider', () => {
  test('assigns one port per service and keeps it across restarts', async () => {
    const provider = new LocalServiceProvider({ basePort: 19000 });
    const first = await provider.create({ model: model(), resourceClass: 'small', replicas: 1, persistent: false }, signal);
    const second = await provider.create(
      { model: model({ id: 'model-0000ef01', format: 'gguf' }), resourceClass: 'small', replicas: 1, persistent: false },
      signal,
    );
    expect(first).toBe('svc-vllm-model-0000abcd');
    expect(second).toBe('svc-llamacpp-model-0000ef01');

    expect(await provider.start(first, signal)).toEqual(['http://127.0.0.1:19000']);
    expect(await provider.start(second, signal)).toEqual(['http://127.0.0.1:19001']);
    expect(provider.isRunning(first)).toBe(true);

    await provider.stop(first, false, signal);
    expect(provider.isRunning(first)).toBe(false);
    expect(await provider.start(first, signal)).toEqual(['http://127.0.0.1:19000']);
  });

  test('adopts well-formed ids it did not create', async () => {
    const provider = new LocalServiceProvider({ host: '10.0.0.5' });
    expect(await provider.start('svc-vllm-model-00000009', signal)).toEqual(['http://10.0.0.5:18000']);
    await expect(provider.start('not-a-service', signal)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
  });

  test('scale rejects negative replicas', async () => {
    const provider = new LocalServiceProvider();
    await expect(provider.scale('svc-vllm-model-00000009', -1, signal)).rejects.toMatchObject({
      code: 'SERVICE_INVALID_REPLICAS',
    });
  });
});
