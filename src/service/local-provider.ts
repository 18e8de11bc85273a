import { throwIfAborted } from '../unit/context';
import type { Model } from '../model/types';
import { createLogger } from '../utils/logger';
import { invalidReplicas } from './errors';
import { formatServiceId, parseServiceId } from './service-id';
import type { ServiceProvider, ServiceSpec } from './types';

const logger = createLogger('service');

export const DEFAULT_BASE_PORT = 18000;

/** Engine a model is served with, by source, then format, then type. */
export function engineForModel(model: Pick<Model, 'source' | 'format' | 'type'>): string {
  if (model.source === 'ollama') return 'ollama';
  if (model.format === 'gguf') return 'llamacpp';
  if (model.type === 'asr') return 'whisper';
  if (model.type === 'tts') return 'tts';
  return 'vllm';
}

interface LocalService {
  replicas: number;
  port?: number;
}

/**
 * Book-keeping provider: hands out ids and loopback endpoints without
 * starting any runtime. Each start takes the next port from `basePort`.
 */
export class LocalServiceProvider implements ServiceProvider {
  private readonly services = new Map<string, LocalService>();
  private readonly running = new Set<string>();
  private nextPort: number;

  constructor(private readonly options: { host?: string; basePort?: number } = {}) {
    this.nextPort = options.basePort ?? DEFAULT_BASE_PORT;
  }

  async create(spec: ServiceSpec, signal: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const id = formatServiceId(engineForModel(spec.model), spec.model.id);
    this.services.set(id, { replicas: spec.replicas });
    return id;
  }

  async start(serviceId: string, signal: AbortSignal): Promise<string[]> {
    throwIfAborted(signal);
    const service = this.lookup(serviceId);
    if (service.port === undefined) service.port = this.nextPort++;
    this.running.add(serviceId);
    const { engine } = parseServiceId(serviceId);
    logger.info('service started', { service_id: serviceId, engine, port: service.port });
    return [`http://${this.options.host ?? '127.0.0.1'}:${service.port}`];
  }

  async stop(serviceId: string, _force: boolean, signal: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    this.lookup(serviceId);
    this.running.delete(serviceId);
    logger.info('service stopped', { service_id: serviceId });
  }

  async scale(serviceId: string, replicas: number, signal: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    if (!Number.isInteger(replicas) || replicas < 0) throw invalidReplicas(replicas);
    this.lookup(serviceId).replicas = replicas;
  }

  isRunning(serviceId: string): boolean {
    return this.running.has(serviceId);
  }

  /** Services created by another process are adopted on first use. */
  private lookup(serviceId: string): LocalService {
    const existing = this.services.get(serviceId);
    if (existing) return existing;
    parseServiceId(serviceId);
    const adopted: LocalService = { replicas: 1 };
    this.services.set(serviceId, adopted);
    return adopted;
  }
}
