import { createControlPlane, type ControlPlane } from '../bootstrap';
import type { ControlPlaneConfig } from '../config/schema';
import { acceptsToken } from '../gateway/auth';
import { createHttpHandler } from '../gateway/http-router';
import { type RunningServer, serveWithNode } from '../gateway/node-host';
import { createLogger } from '../utils/logger';

const logger = createLogger('serve');

export const SERVER_VERSION = '0.1.0';

export interface ServeHandle {
  plane: ControlPlane;
  server: RunningServer;
  stop(): Promise<void>;
}

/** Bootstraps the control plane and exposes it over HTTP and `/ws`. */
export async function startServer(config: ControlPlaneConfig): Promise<ServeHandle> {
  const plane = await createControlPlane(config);
  const { gateway, registry, bus } = plane;
  const keys = config.security.api_keys;
  let server: RunningServer;
  try {
    server = await serveWithNode({
      hostname: config.api.host,
      port: config.api.port,
      fetch: createHttpHandler({ gateway, registry, version: SERVER_VERSION, enableCors: config.api.enable_cors }),
      websocket: { gateway, bus, authorize: (token) => acceptsToken(keys, token) },
    });
  } catch (error) {
    plane.close();
    throw error;
  }

  let stopping: Promise<void> | undefined;
  const stop = (): Promise<void> => {
    stopping ??= server.stop().finally(() => plane.close());
    return stopping;
  };
  return { plane, server, stop };
}

/** Runs until SIGINT or SIGTERM. */
export async function runServe(config: ControlPlaneConfig): Promise<void> {
  const handle = await startServer(config);
  console.log(`aima control plane listening on ${handle.server.url}`);
  console.log(`  units: ${handle.plane.registry.size}  domains: ${handle.plane.registry.domains().join(', ')}`);

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info('shutting down', { signal });
      handle
        .stop()
        .catch((error: unknown) => {
          logger.error('shutdown failed', { error });
        })
        .finally(resolve);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
