import { describe, expect, test } from 'vitest';
import { ExecutionLimiter } from './limiter';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('execution limiter', () => {
  test('queues beyond the in-flight limit and runs in order', async () => {
    const limiter = new ExecutionLimiter({ maxInFlight: 1, maxQueued: 2 });
    const gate = deferred();
    const order: string[] = [];
    const first = limiter.run(async () => {
      await gate.promise;
      order.push('first');
    });
    const second = limiter.run(async () => {
      order.push('second');
    });
    expect(limiter.stats()).toEqual({ inFlight: 1, queued: 1, maxInFlight: 1, maxQueued: 2 });
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
    expect(limiter.stats().inFlight).toBe(0);
  });

  test('fails with OVERLOADED when the queue is full', async () => {
    const limiter = new ExecutionLimiter({ maxInFlight: 1, maxQueued: 0 });
    const gate = deferred();
    const running = limiter.run(() => gate.promise);
    await expect(limiter.run(async () => 'late')).rejects.toMatchObject({ code: 'OVERLOADED' });
    gate.resolve();
    await running;
  });

  test('a queued task that waits too long fails', async () => {
    const limiter = new ExecutionLimiter({ maxInFlight: 1, maxQueued: 1, queueTimeoutMs: 100 });
    const gate = deferred();
    const running = limiter.run(() => gate.promise);
    await expect(limiter.run(async () => 'late')).rejects.toThrow('gateway queue timeout');
    gate.resolve();
    await running;
  });
});
