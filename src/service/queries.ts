import { z } from 'zod';
import { defineQuery, requireCollaborator } from '../unit/define';
import { s } from '../unit/schema';
import type { Query } from '../unit/types';
import { type ServiceUnitDeps, serviceSchema } from './commands';
import { SERVICE_DOMAIN } from './errors';
import { type ModelService, SERVICE_STATUSES, ServiceStatusSchema } from './types';

const serviceId = z.string({ required_error: 'service_id is required' }).trim().min(1, 'service_id is required');

/* service.get */

const GetInput = z.object({ service_id: serviceId });

export function createServiceGetQuery(deps: ServiceUnitDeps): Query<z.infer<typeof GetInput>, ModelService> {
  return defineQuery({
    name: 'service.get',
    domain: SERVICE_DOMAIN,
    description: 'Fetch one service record',
    input: GetInput,
    inputSchema: s.object({ service_id: s.string({ min_length: 1 }) }, ['service_id']),
    outputSchema: serviceSchema,
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      return store.get(input.service_id);
    },
  });
}

/* service.list */

const ListInput = z.object({
  status: ServiceStatusSchema.optional(),
  model_id: z.string().trim().optional(),
  limit: z.number().int().nonnegative().default(100),
  offset: z.number().int().nonnegative().default(0),
});

export function createServiceListQuery(
  deps: ServiceUnitDeps,
): Query<z.infer<typeof ListInput>, { services: ModelService[]; total: number }> {
  return defineQuery({
    name: 'service.list',
    domain: SERVICE_DOMAIN,
    description: 'List services, optionally by status or model',
    input: ListInput,
    inputSchema: s.object({
      status: s.string({ enum: SERVICE_STATUSES }),
      model_id: s.string(),
      limit: s.number({ min: 0, default: 100 }),
      offset: s.number({ min: 0, default: 0 }),
    }),
    outputSchema: s.object({ services: s.array(serviceSchema), total: s.number() }, ['services', 'total']),
    examples: [{ input: { status: 'running' }, output: { services: [], total: 0 } }],
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      const page = await store.list(input);
      return { services: page.items, total: page.total };
    },
  });
}

/* service.status */

export interface ServiceStatusView {
  id: string;
  name: string;
  model_id: string;
  status: ModelService['status'];
  endpoints: string[];
}

export function createServiceStatusQuery(deps: ServiceUnitDeps): Query<z.infer<typeof GetInput>, ServiceStatusView> {
  return defineQuery({
    name: 'service.status',
    domain: SERVICE_DOMAIN,
    description: 'Report the status and endpoints of a service',
    input: GetInput,
    inputSchema: s.object({ service_id: s.string({ min_length: 1 }) }, ['service_id']),
    outputSchema: s.object(
      {
        id: s.string(),
        name: s.string(),
        model_id: s.string(),
        status: s.string({ enum: SERVICE_STATUSES }),
        endpoints: s.array(s.string()),
      },
      ['id', 'status', 'endpoints'],
    ),
    async execute(_ctx, input) {
      const store = requireCollaborator(deps.store, 'service store', SERVICE_DOMAIN);
      const service = await store.get(input.service_id);
      return {
        id: service.id,
        name: service.name,
        model_id: service.model_id,
        status: service.status,
        endpoints: service.endpoints,
      };
    },
  });
}

export function createServiceQueries(deps: ServiceUnitDeps): Query[] {
  return [createServiceGetQuery(deps), createServiceListQuery(deps), createServiceStatusQuery(deps)];
}
