import { createUnitContext, sleep } from './context';
import { errorMessage } from './errors';
import type { Schema } from './schema';
import type { Resource, ResourceUpdate, UnitContext, WatchOptions } from './types';

export const DEFAULT_WATCH_INTERVAL_MS = 30_000;

/**
 * Polls `resource.get` once per interval until the signal fires. A status
 * that differs from the previous poll is reported as `status_changed`;
 * lookup failures are reported and polling continues.
 */
export async function* pollResource(
  resource: Pick<Resource, 'uri' | 'get'>,
  options: WatchOptions,
  statusOf: (data: unknown) => string | undefined = () => undefined,
): AsyncGenerator<ResourceUpdate> {
  const { signal } = options;
  const intervalMs = options.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS;
  let lastStatus: string | undefined;

  for (;;) {
    try {
      await sleep(intervalMs, signal);
    } catch {
      return;
    }
    let update: ResourceUpdate;
    try {
      const data = await resource.get(createUnitContext({ signal }));
      const status = statusOf(data);
      const changed = lastStatus !== undefined && status !== undefined && status !== lastStatus;
      lastStatus = status ?? lastStatus;
      update = {
        uri: resource.uri,
        timestamp: Date.now(),
        operation: changed ? 'status_changed' : 'refresh',
        data,
      };
    } catch (error) {
      if (signal.aborted) return;
      update = {
        uri: resource.uri,
        timestamp: Date.now(),
        operation: 'error',
        error: errorMessage(error),
      };
    }
    yield update;
  }
}

/** Base for resources whose watch stream is a poll over `get`. */
export abstract class PollingResource implements Resource {
  abstract readonly uri: string;
  abstract readonly domain: string;
  abstract readonly schema: Schema;

  abstract get(ctx: UnitContext): Promise<unknown>;

  protected statusOf(_data: unknown): string | undefined {
    return undefined;
  }

  watch(options: WatchOptions): AsyncIterable<ResourceUpdate> {
    return pollResource(this, options, (data) => this.statusOf(data));
  }
}

export function readStatusField(data: unknown): string | undefined {
  if (data === null || typeof data !== 'object' || !('status' in data)) return undefined;
  return typeof data.status === 'string' ? data.status : undefined;
}
