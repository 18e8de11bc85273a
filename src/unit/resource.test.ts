import { describe, expect, test } from 'vitest';
import { pollResource, readStatusField } from './resource';
import type { ResourceUpdate } from './types';

async function collect(iterable: AsyncIterable<ResourceUpdate>, count: number, controller: AbortController) {
  const updates: ResourceUpdate[] = [];
  for await (const update of iterable) {
    updates.push(update);
    if (updates.length === count) controller.abort();
  }
  return updates;
}

describe('pollResource', () => {
  test('reports refreshes, status changes and errors', async () => {
    const responses: Array<() => unknown> = [
      () => ({ status: 'pulling' }),
      () => ({ status: 'pulling' }),
      () => {
        throw new Error('store offline');
      },
      () => ({ status: 'ready' }),
    ];
    let calls = 0;
    const resource = {
      uri: 'asms://model/m1',
      get: async () => {
        const next = responses[calls++];
        if (!next) throw new Error('unexpected poll');
        return next();
      },
    };
    const controller = new AbortController();
    const updates = await collect(
      pollResource(resource, { signal: controller.signal, intervalMs: 1 }, readStatusField),
      4,
      controller,
    );
    expect(updates.map((update) => update.operation)).toEqual(['refresh', 'refresh', 'error', 'status_changed']);
    expect(updates[2]?.error).toBe('store offline');
    expect(updates[3]?.data).toEqual({ status: 'ready' });
    expect(updates.every((update) => update.uri === 'asms://model/m1')).toBe(true);
  });

  test('ends without polling once aborted', async () => {
    let calls = 0;
    const controller = new AbortController();
    controller.abort();
    const updates = await collect(
      pollResource({ uri: 'asms://models', get: async () => ++calls }, { signal: controller.signal, intervalMs: 1 }),
      1,
      controller,
    );
    expect(updates).toEqual([]);
    expect(calls).toBe(0);
  });

  test('readStatusField reads string statuses only', () => {
    expect(readStatusField({ status: 'running' })).toBe('running');
    expect(readStatusField({ status: 3 })).toBeUndefined();
    expect(readStatusField(null)).toBeUndefined();
  });
});
