import { z } from 'zod';
import type { ModelStore } from '../model/types';
import { defineCommand, requireCollaborator } from '../unit/define';
import { UnitError, errorMessage, wrapError } from '../unit/errors';
import { type EventPublisher, publishSafely } from '../unit/events';
import { s, type Schema } from '../unit/schema';
import type { Command } from '../unit/types';
import { nowSeconds } from '../utils/ids';
import { createLogger } from '../utils/logger';
import { invalidReplicas, SERVICE_DOMAIN, serviceAlreadyRunning } from './errors';
import { SERVICE_EVENTS, serviceEvent } from './events';
import {
  type ModelService,
  RESOURCE_CLASSES,
  ResourceClassSchema,
  SERVICE_STATUSES,
  type ServiceProvider,
  type ServiceStore,
} from './types';

const logger = createLogger('service');

export interface ServiceUnitDeps {
  store?: ServiceStore;
  provider?: ServiceProvider;
  /** Looked up by `service.create`; the model must exist. */
  models?: ModelStore;
  events?: EventPublisher;
}

const requiredText = (field: string) => z.string({ required_error: `${field} is required` }).trim().min(1, `${field} is required`);

export const serviceSchema: Schema = s.object(
  {
    id: s.string(),
    name: s.string(),
    model_id: s.string(),
    status: s.string({ enum: SERVICE_STATUSES }),
    replicas: s.number({ min: 0 }),
    resource_class: s.string({ enum: RESOURCE_CLASSES }),
    endpoints: s.array(s.string()),
    active_replicas: s.number({ min: 0 }),
    config: s.object(),
    created_at: s.number(),
    updated_at: s.number(),
  },
  ['id', 'model_id', 'status'],
);

const successSchema = s.object({ success: s.boolean() }, ['success']);
const serviceIdSchema = s.string({ min_length: 1, description: 'svc-<engine>-<model_id>' });

async function save(store: ServiceStore, service: ModelService, status: ModelService['status']): Promise<ModelService> {
  const next: ModelService = { ...service, status, updated_at: nowSeconds() };
  await store.update(next);
  return next;
}

/* service.create */

const CreateInput = z.object({
  model_id: requiredText('model_id'),
  resource_class: ResourceClassSchema.default('medium'),
  replicas: z.number().int().min(1, 'replicas must be at least 1').default(1),
  persistent: z.boolean().default(false),
  config: z.record(z.string(), z.unknown()).default({}),
});

export function createServiceCreateCommand(
  deps: ServiceUnitDeps,
): Command<z.infer<typeof CreateInput>, { service_id: string }> {
  return defineCommand({
    name: 'service.create',
    domain: SERVICE_DOMAIN,
    description: 'Create an inference service for a registered model',
    input: CreateInput,
    inputSchema: s.object(
      {
        model_id: s.string({ min_length: 1 }),
        resource_class: s.string({ enum: RESOURCE_CLASSES, default: 'medium' }),
        replicas: s.number({ min: 1, default: 1 }),
        persistent: s.boolean({ default: false }),
        config: s.object(),
      },
      ['model_id'],
    ),
    outputSchema: s.object({ service_id: s.string() }, ['service_id']),
    examples: [
      {
        input: { model_id: 'model-1a2b3c4d' },
        output: { service_id: 'svc-llamacpp-model-1a2b3c4d' },
      },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      const provider = requireCollaborator(deps.provider, 'service provider', SERVICE_DOMAIN);
      const models = requireCollaborator(deps.models, 'model store', SERVICE_DOMAIN);
      const model = await models.get(input.model_id);
      let id: string;
      try {
        id = await provider.create(
          { model, resourceClass: input.resource_class, replicas: input.replicas, persistent: input.persistent },
          ctx.signal,
        );
      } catch (error) {
        throw wrapError(error, 'create service', 'INTERNAL_ERROR', SERVICE_DOMAIN);
      }
      const now = nowSeconds();
      const service: ModelService = {
        id,
        name: `service-${id}`,
        model_id: model.id,
        status: 'creating',
        replicas: input.replicas,
        resource_class: input.resource_class,
        endpoints: [],
        active_replicas: 0,
        config: input.config,
        created_at: now,
        updated_at: now,
      };
      await store.create(service);
      publishSafely(deps.events, serviceEvent(SERVICE_EVENTS.created, service, ctx.requestId));
      return { service_id: id };
    },
  });
}

/* service.delete */

const DeleteInput = z.object({
  service_id: requiredText('service_id'),
  force: z.boolean().default(false),
});

export function createServiceDeleteCommand(deps: ServiceUnitDeps): Command<z.infer<typeof DeleteInput>, { success: boolean }> {
  return defineCommand({
    name: 'service.delete',
    domain: SERVICE_DOMAIN,
    description: 'Delete a service, stopping it first when it runs',
    input: DeleteInput,
    inputSchema: s.object({ service_id: serviceIdSchema, force: s.boolean({ default: false }) }, ['service_id']),
    outputSchema: successSchema,
    examples: [{ input: { service_id: 'svc-vllm-model-1a2b3c4d' }, output: { success: true } }],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      const service = await store.get(input.service_id);
      if (deps.provider?.isRunning(service.id)) {
        try {
          await deps.provider.stop(service.id, input.force, ctx.signal);
        } catch (error) {
          throw wrapError(error, `stop service ${service.id}`, 'INTERNAL_ERROR', SERVICE_DOMAIN);
        }
        publishSafely(deps.events, serviceEvent(SERVICE_EVENTS.stopped, { ...service, status: 'stopped' }, ctx.requestId));
      }
      await store.delete(service.id);
      return { success: true };
    },
  });
}

/* service.scale */

const ScaleInput = z.object({
  service_id: requiredText('service_id'),
  replicas: z.number({ required_error: 'replicas is required' }),
});

export function createServiceScaleCommand(deps: ServiceUnitDeps): Command<z.infer<typeof ScaleInput>, { success: boolean }> {
  return defineCommand({
    name: 'service.scale',
    domain: SERVICE_DOMAIN,
    description: 'Change the replica count of a service',
    input: ScaleInput,
    inputSchema: s.object({ service_id: serviceIdSchema, replicas: s.number() }, ['service_id', 'replicas']),
    outputSchema: successSchema,
    examples: [{ input: { service_id: 'svc-vllm-model-1a2b3c4d', replicas: 2 }, output: { success: true } }],
    async execute(ctx, input) {
      if (!Number.isInteger(input.replicas) || input.replicas < 0) throw invalidReplicas(input.replicas);
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      const provider = requireCollaborator(deps.provider, 'service provider', SERVICE_DOMAIN);
      const service = await store.get(input.service_id);
      try {
        await provider.scale(service.id, input.replicas, ctx.signal);
      } catch (error) {
        throw wrapError(error, `scale service ${service.id}`, 'INTERNAL_ERROR', SERVICE_DOMAIN);
      }
      const scaled: ModelService = {
        ...service,
        replicas: input.replicas,
        active_replicas: service.status === 'running' ? input.replicas : 0,
        updated_at: nowSeconds(),
      };
      await store.update(scaled);
      publishSafely(
        deps.events,
        serviceEvent(SERVICE_EVENTS.scaled, scaled, ctx.requestId, { from: service.replicas, to: input.replicas }),
      );
      return { success: true };
    },
  });
}

/* service.start */

const StartInput = z.object({ service_id: requiredText('service_id') });

export function createServiceStartCommand(
  deps: ServiceUnitDeps,
): Command<z.infer<typeof StartInput>, { success: boolean; endpoints: string[] }> {
  return defineCommand({
    name: 'service.start',
    domain: SERVICE_DOMAIN,
    description: 'Start a service and record its endpoints',
    input: StartInput,
    inputSchema: s.object({ service_id: serviceIdSchema }, ['service_id']),
    outputSchema: s.object({ success: s.boolean(), endpoints: s.array(s.string()) }, ['success', 'endpoints']),
    examples: [
      {
        input: { service_id: 'svc-vllm-model-1a2b3c4d' },
        output: { success: true, endpoints: ['http://127.0.0.1:18000'] },
      },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      const provider = requireCollaborator(deps.provider, 'service provider', SERVICE_DOMAIN);
      let service = await store.get(input.service_id);
      if (service.status === 'running') {
        if (provider.isRunning(service.id)) throw serviceAlreadyRunning(service.id);
        // Recorded as running but the process is gone.
        service = await save(store, service, 'stopped');
      }
      let endpoints: string[];
      try {
        endpoints = await provider.start(service.id, ctx.signal);
      } catch (error) {
        const failed = await save(store, service, 'failed');
        publishSafely(
          deps.events,
          serviceEvent(SERVICE_EVENTS.failed, failed, ctx.requestId, { error: errorMessage(error) }),
        );
        throw new UnitError('SERVICE_START_FAILED', `start service ${service.id}: ${errorMessage(error)}`, {
          domain: SERVICE_DOMAIN,
          cause: error,
        });
      }
      const started: ModelService = {
        ...service,
        status: 'running',
        endpoints,
        active_replicas: service.replicas,
        updated_at: nowSeconds(),
      };
      await store.update(started);
      publishSafely(deps.events, serviceEvent(SERVICE_EVENTS.started, started, ctx.requestId, { endpoints }));
      return { success: true, endpoints };
    },
  });
}

/* service.stop */

const StopInput = z.object({
  service_id: requiredText('service_id'),
  force: z.boolean().default(false),
});

export function createServiceStopCommand(deps: ServiceUnitDeps): Command<z.infer<typeof StopInput>, { success: boolean }> {
  return defineCommand({
    name: 'service.stop',
    domain: SERVICE_DOMAIN,
    description: 'Stop a service; stopping a stopped service succeeds',
    input: StopInput,
    inputSchema: s.object({ service_id: serviceIdSchema, force: s.boolean({ default: false }) }, ['service_id']),
    outputSchema: successSchema,
    examples: [{ input: { service_id: 'svc-vllm-model-1a2b3c4d' }, output: { success: true } }],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      const provider = requireCollaborator(deps.provider, 'service provider', SERVICE_DOMAIN);
      const service = await store.get(input.service_id);
      if (service.status === 'stopped') return { success: true };
      try {
        await provider.stop(service.id, input.force, ctx.signal);
      } catch (error) {
        if (service.status === 'running') {
          throw wrapError(error, `stop service ${service.id}`, 'INTERNAL_ERROR', SERVICE_DOMAIN);
        }
        logger.warn('stop of non-running service failed', { service_id: service.id, error: errorMessage(error) });
      }
      const stopped: ModelService = {
        ...service,
        status: 'stopped',
        endpoints: [],
        active_replicas: 0,
        updated_at: nowSeconds(),
      };
      await store.update(stopped);
      publishSafely(deps.events, serviceEvent(SERVICE_EVENTS.stopped, stopped, ctx.requestId));
      return { success: true };
    },
  });
}

export function createServiceCommands(deps: ServiceUnitDeps): Command[] {
  return [
    createServiceCreateCommand(deps),
    createServiceDeleteCommand(deps),
    createServiceScaleCommand(deps),
    createServiceStartCommand(deps),
    createServiceStopCommand(deps),
  ];
}
