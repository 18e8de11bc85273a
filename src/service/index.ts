import { registerDomainUnits, type UnitRegistry } from '../unit/registry';
import { createServiceCommands, type ServiceUnitDeps } from './commands';
import { SERVICE_DOMAIN } from './errors';
import { createServiceQueries } from './queries';
import { createServiceResources } from './resources';

export type { ServiceUnitDeps } from './commands';

export function registerServiceUnits(registry: UnitRegistry, deps: ServiceUnitDeps): void {
  registerDomainUnits(registry, SERVICE_DOMAIN, {
    commands: createServiceCommands(deps),
    queries: createServiceQueries(deps),
    ...createServiceResources(deps),
  });
}
