import { z } from 'zod';
import { requireCollaborator } from '../unit/define';
import { UnitError } from '../unit/errors';
import { PollingResource, readStatusField } from '../unit/resource';
import { s } from '../unit/schema';
import type { Resource, ResourceFactory, UnitContext } from '../unit/types';
import compatibilityTable from './compatibility.json';
import type { ModelUnitDeps } from './commands';
import { MODEL_DOMAIN } from './errors';
import { modelView, modelViewSchema } from './queries';
import { MODEL_FORMATS, MODEL_TYPES } from './types';

export const MODEL_URI_PREFIX = 'asms://model/';
export const MODELS_URI = 'asms://models';
export const COMPATIBILITY_URI = 'asms://models/compatibility';

const CompatibilityTableSchema = z.object({
  formats: z.record(z.array(z.string())),
  types: z.record(z.array(z.string())),
});

export type CompatibilityTable = z.infer<typeof CompatibilityTableSchema>;

export function loadCompatibilityTable(): CompatibilityTable {
  return CompatibilityTableSchema.parse(compatibilityTable);
}

export class ModelResource extends PollingResource {
  readonly domain = MODEL_DOMAIN;
  readonly schema = modelViewSchema;
  readonly uri: string;

  constructor(
    private readonly modelId: string,
    private readonly deps: ModelUnitDeps,
  ) {
    super();
    this.uri = `${MODEL_URI_PREFIX}${modelId}`;
  }

  async get(_ctx: UnitContext): Promise<Record<string, unknown>> {
    const store = requireCollaborator(this.deps.store, 'model store', MODEL_DOMAIN);
    return modelView(await store.get(this.modelId));
  }

  protected override statusOf(data: unknown): string | undefined {
    return readStatusField(data);
  }
}

export class ModelResourceFactory implements ResourceFactory {
  readonly pattern = `${MODEL_URI_PREFIX}*`;

  constructor(private readonly deps: ModelUnitDeps) {}

  canCreate(uri: string): boolean {
    const id = uri.startsWith(MODEL_URI_PREFIX) ? uri.slice(MODEL_URI_PREFIX.length) : '';
    return id !== '' && !id.includes('/');
  }

  create(uri: string): Resource {
    if (!this.canCreate(uri)) {
      throw new UnitError('RESOURCE_NOT_FOUND', `resource not found: ${uri}`, { domain: MODEL_DOMAIN });
    }
    return new ModelResource(uri.slice(MODEL_URI_PREFIX.length), this.deps);
  }
}

export class ModelsResource extends PollingResource {
  readonly uri = MODELS_URI;
  readonly domain = MODEL_DOMAIN;
  readonly schema = s.object(
    { models: s.array(modelViewSchema), total: s.number() },
    ['models', 'total'],
  );

  constructor(private readonly deps: ModelUnitDeps) {
    super();
  }

  async get(_ctx: UnitContext): Promise<{ models: Record<string, unknown>[]; total: number }> {
    const store = requireCollaborator(this.deps.store, 'model store', MODEL_DOMAIN);
    const page = await store.list({ limit: 0, offset: 0 });
    return { models: page.items.map(modelView), total: page.total };
  }
}

/** Which engines can serve which formats and model types. */
export class CompatibilityResource extends PollingResource {
  readonly uri = COMPATIBILITY_URI;
  readonly domain = MODEL_DOMAIN;
  readonly schema = s.object(
    {
      formats: s.object({}, [], { description: `engines per format (${MODEL_FORMATS.join(', ')})` }),
      types: s.object({}, [], { description: `engines per model type (${MODEL_TYPES.join(', ')})` }),
    },
    ['formats', 'types'],
  );

  private readonly table = loadCompatibilityTable();

  async get(_ctx: UnitContext): Promise<CompatibilityTable> {
    return {
      formats: Object.fromEntries(Object.entries(this.table.formats).map(([key, engines]) => [key, [...engines]])),
      types: Object.fromEntries(Object.entries(this.table.types).map(([key, engines]) => [key, [...engines]])),
    };
  }
}

export function createModelResources(deps: ModelUnitDeps): {
  resources: Resource[];
  factories: ResourceFactory[];
} {
  return {
    resources: [new ModelsResource(deps), new CompatibilityResource()],
    factories: [new ModelResourceFactory(deps)],
  };
}
