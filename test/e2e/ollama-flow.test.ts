import { afterAll, beforeAll, expect, test } from 'vitest';
import { type ControlPlane, createControlPlane } from '../../src/bootstrap';
import { parseConfig } from '../../src/config/loader';
import type { GatewayResponse } from '../../src/gateway/protocol';
import { type FakeServer, sendJson, startFakeServer } from '../support/fake-server';

let ollama: FakeServer;
let plane: ControlPlane;

beforeAll(async () => {
  ollama = await startFakeServer((request, response) => {
    if (request.path === '/api/pull') {
      response.writeHead(200, { 'content-type': 'application/x-ndjson' });
      response.write('{"status":"pulling manifest"}\n');
      response.write('{"status":"downloading","digest":"sha256:feed","total":64,"completed":32}\n');
      response.end('{"status":"success","digest":"sha256:feed","total":64,"completed":64}\n');
      return;
    }
    if (request.path === '/api/chat') {
      sendJson(response, 200, {
        model: 'tinyllama:latest',
        message: { role: 'assistant', content: 'pong' },
        done: true,
        prompt_eval_count: 3,
        eval_count: 1,
      });
      return;
    }
    sendJson(response, 404, { error: 'not found' });
  });
  plane = await createControlPlane(
    parseConfig({
      model: { store: 'memory', default_source: 'ollama' },
      ollama: { base_url: ollama.url },
    }),
  );
});

afterAll(async () => {
  plane.close();
  await ollama.close();
});

function dataOf(response: GatewayResponse): unknown {
  if (!response.success) throw new Error(`${response.error?.code}: ${response.error?.message}`);
  return response.data;
}

function field(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object' || !(key in value)) return undefined;
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

test('pull a model, create and start its service, then chat with it', async () => {
  const pulled = dataOf(await plane.gateway.handle({ type: 'command', unit: 'model.pull', input: { repo: 'tinyllama' } }));
  expect(pulled).toMatchObject({ status: 'ready' });
  const modelId = field(pulled, 'model_id');
  expect(typeof modelId).toBe('string');

  const model = dataOf(await plane.gateway.handle({ type: 'query', unit: 'model.get', input: { model_id: modelId } }));
  expect(model).toMatchObject({
    name: 'tinyllama:latest',
    status: 'ready',
    source: 'ollama',
    format: 'gguf',
    size: 64,
    checksum: 'sha256:feed',
  });
  expect(plane.bus.recent('model.pull_progress').length).toBeGreaterThan(0);

  const created = dataOf(
    await plane.gateway.handle({ type: 'command', unit: 'service.create', input: { model_id: modelId } }),
  );
  expect(created).toEqual({ service_id: `svc-ollama-${String(modelId)}` });

  const started = dataOf(
    await plane.gateway.handle({ type: 'command', unit: 'service.start', input: { service_id: field(created, 'service_id') } }),
  );
  expect(started).toEqual({ success: true, endpoints: ['http://127.0.0.1:18000'] });

  const reply = dataOf(
    await plane.gateway.handle({
      type: 'command',
      unit: 'inference.chat',
      input: { model: 'tinyllama:latest', messages: [{ role: 'user', content: 'ping' }] },
    }),
  );
  expect(reply).toMatchObject({
    content: 'pong',
    finish_reason: 'stop',
    usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 },
  });
  expect(ollama.requests.map((request) => request.path)).toEqual(['/api/pull', '/api/chat']);
});
