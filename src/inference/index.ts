import { registerDomainUnits, type UnitRegistry } from '../unit/registry';
import { createInferenceCommands, type InferenceUnitDeps } from './commands';
import { INFERENCE_DOMAIN } from './errors';
import { createInferenceQueries } from './queries';

export type { InferenceUnitDeps } from './commands';

export function registerInferenceUnits(registry: UnitRegistry, deps: InferenceUnitDeps): void {
  registerDomainUnits(registry, INFERENCE_DOMAIN, {
    commands: createInferenceCommands(deps),
    queries: createInferenceQueries(deps),
  });
}
