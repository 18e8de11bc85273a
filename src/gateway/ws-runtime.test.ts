import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { defineQuery } from '../unit/define';
import { createEvent, InMemoryEventBus } from '../unit/events';
import { UnitRegistry } from '../unit/registry';
import { s } from '../unit/schema';
import { Gateway } from './gateway';
import { WsConnection } from './ws-runtime';

class FakeSocket {
  readonly OPEN = 1;
  readyState: 0 | 1 | 2 | 3 = 1;
  readonly sent: unknown[] = [];

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }
}

function createConnection() {
  const registry = new UnitRegistry();
  registry.registerQuery(
    defineQuery({
      name: 'demo.ping',
      domain: 'demo',
      description: 'Answer pong',
      input: z.object({}),
      inputSchema: s.object(),
      outputSchema: s.object({ reply: s.string() }),
      execute: async () => ({ reply: 'pong' }),
    }),
  );
  const bus = new InMemoryEventBus();
  const socket = new FakeSocket();
  const connection = new WsConnection(socket, { gateway: new Gateway(registry), bus });
  return { socket, bus, connection };
}

describe('ws connection', () => {
  test('answers request frames with response frames', async () => {
    const { socket, connection } = createConnection();
    await connection.handleMessage(
      JSON.stringify({ type: 'request', id: 'r1', request: { type: 'query', unit: 'demo.ping', request_id: 'req-ws' } }),
    );
    expect(socket.sent).toEqual([
      {
        type: 'response',
        id: 'r1',
        response: {
          success: true,
          data: { reply: 'pong' },
          error: null,
          request_id: 'req-ws',
          duration_ms: expect.any(Number),
        },
      },
    ]);
  });

  test('forwards subscribed events until unsubscribed', async () => {
    const { socket, bus, connection } = createConnection();
    await connection.handleMessage(JSON.stringify({ type: 'subscribe', id: 's1', pattern: 'model.*' }));
    bus.publish(createEvent('model', 'model.pull_progress', { progress: 50 }, 'req_1'));
    bus.publish(createEvent('catalog', 'catalog.recipe_created', {}, 'req_1'));
    await connection.handleMessage(JSON.stringify({ type: 'unsubscribe', id: 's2', pattern: 'model.*' }));
    bus.publish(createEvent('model', 'model.created', {}, 'req_2'));
    expect(socket.sent).toEqual([
      { type: 'ack', id: 's1', ok: true },
      { type: 'event', event: expect.objectContaining({ type: 'model.pull_progress', payload: { progress: 50 } }) },
      { type: 'ack', id: 's2', ok: true },
    ]);
  });

  test('answers ping and reports bad frames', async () => {
    const { socket, connection } = createConnection();
    await connection.handleMessage(JSON.stringify({ type: 'ping' }));
    await connection.handleMessage('not json');
    await connection.handleMessage(JSON.stringify({ type: 'launch' }));
    expect(socket.sent[0]).toEqual({ type: 'pong', ts: expect.any(Number) });
    expect(socket.sent[1]).toEqual({ type: 'error', error: 'invalid_json' });
    expect(socket.sent[2]).toMatchObject({ type: 'error' });
  });

  test('close drops subscriptions', async () => {
    const { bus, connection } = createConnection();
    await connection.handleMessage(JSON.stringify({ type: 'subscribe', id: 's1', pattern: '*' }));
    expect(bus.subscriberCount).toBe(1);
    connection.close();
    expect(bus.subscriberCount).toBe(0);
  });

  test('does not write to a closed socket', async () => {
    const { socket, connection } = createConnection();
    socket.readyState = 3;
    await connection.handleMessage(JSON.stringify({ type: 'ping' }));
    expect(socket.sent).toEqual([]);
  });
});
