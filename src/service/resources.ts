import { requireCollaborator } from '../unit/define';
import { UnitError } from '../unit/errors';
import { PollingResource, readStatusField } from '../unit/resource';
import { s } from '../unit/schema';
import type { Resource, ResourceFactory, UnitContext } from '../unit/types';
import { type ServiceUnitDeps, serviceSchema } from './commands';
import { SERVICE_DOMAIN } from './errors';
import type { ModelService } from './types';

export const SERVICES_URI = 'asms://services';
export const SERVICE_URI_PREFIX = 'asms://service/';

export class ServicesResource extends PollingResource {
  readonly uri = SERVICES_URI;
  readonly domain = SERVICE_DOMAIN;
  readonly schema = s.object({ services: s.array(serviceSchema), total: s.number() }, ['services', 'total']);

  constructor(private readonly deps: ServiceUnitDeps) {
    super();
  }

  async get(_ctx: UnitContext): Promise<{ services: ModelService[]; total: number }> {
    const store = requireCollaborator(this.deps.store, 'service store', SERVICE_DOMAIN);
    const page = await store.list({ limit: 0 });
    return { services: page.items, total: page.total };
  }
}

/** Watching a service reports `status_changed` as it starts, stops or fails. */
export class ServiceResource extends PollingResource {
  readonly domain = SERVICE_DOMAIN;
  readonly schema = serviceSchema;
  readonly uri: string;

  constructor(
    private readonly serviceId: string,
    private readonly deps: ServiceUnitDeps,
  ) {
    super();
    this.uri = `${SERVICE_URI_PREFIX}${serviceId}`;
  }

  async get(_ctx: UnitContext): Promise<ModelService> {
    const store = requireCollaborator(this.deps.store, 'service store', SERVICE_DOMAIN);
    return store.get(this.serviceId);
  }

  protected override statusOf(data: unknown): string | undefined {
    return readStatusField(data);
  }
}

export class ServiceResourceFactory implements ResourceFactory {
  readonly pattern = `${SERVICE_URI_PREFIX}*`;

  constructor(private readonly deps: ServiceUnitDeps) {}

  canCreate(uri: string): boolean {
    const id = uri.startsWith(SERVICE_URI_PREFIX) ? uri.slice(SERVICE_URI_PREFIX.length) : '';
    return id !== '' && !id.includes('/');
  }

  create(uri: string): Resource {
    if (!this.canCreate(uri)) {
      throw new UnitError('RESOURCE_NOT_FOUND', `resource not found: ${uri}`, { domain: SERVICE_DOMAIN });
    }
    return new ServiceResource(uri.slice(SERVICE_URI_PREFIX.length), this.deps);
  }
}

export function createServiceResources(deps: ServiceUnitDeps): {
  resources: Resource[];
  factories: ResourceFactory[];
} {
  return { resources: [new ServicesResource(deps)], factories: [new ServiceResourceFactory(deps)] };
}
