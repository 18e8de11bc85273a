import { registerDomainUnits, type UnitRegistry } from '../unit/registry';
import { type ModelUnitDeps, createModelCommands, type PullCommand } from './commands';
import { MODEL_DOMAIN } from './errors';
import { createModelQueries } from './queries';
import { createModelResources } from './resources';

export type { ModelUnitDeps } from './commands';

export function registerModelUnits(registry: UnitRegistry, deps: ModelUnitDeps): { pull: PullCommand } {
  const { commands, pull } = createModelCommands(deps);
  registerDomainUnits(registry, MODEL_DOMAIN, {
    commands,
    queries: createModelQueries(deps),
    ...createModelResources(deps),
  });
  return { pull };
}
