import { registerDomainUnits, type UnitRegistry } from '../unit/registry';
import { type CatalogUnitDeps, createCatalogCommands } from './commands';
import { CATALOG_DOMAIN } from './errors';
import { createCatalogQueries } from './queries';
import { createCatalogResources } from './resources';

export type { CatalogUnitDeps } from './commands';

export function registerCatalogUnits(registry: UnitRegistry, deps: CatalogUnitDeps): void {
  registerDomainUnits(registry, CATALOG_DOMAIN, {
    commands: createCatalogCommands(deps),
    queries: createCatalogQueries(deps),
    ...createCatalogResources(deps),
  });
}
