import { invalidModelId, modelAlreadyExists, modelNotFound } from './errors';
import { cloneModel, type Model, type ModelFilter, type ModelPage, type ModelStore } from './types';

export function assertModelId(id: string): void {
  if (!id.trim()) throw invalidModelId(id);
}

/** Filters, then pages. `total` counts every match regardless of limit/offset. */
export function applyModelFilter(models: Iterable<Model>, filter: ModelFilter = {}): ModelPage {
  const matches: Model[] = [];
  for (const model of models) {
    if (filter.type && model.type !== filter.type) continue;
    if (filter.status && model.status !== filter.status) continue;
    if (filter.format && model.format !== filter.format) continue;
    matches.push(model);
  }
  const offset = Math.max(0, filter.offset ?? 0);
  const limit = filter.limit ?? 0;
  const page = limit > 0 ? matches.slice(offset, offset + limit) : matches.slice(offset);
  return { items: page.map(cloneModel), total: matches.length };
}

export class MemoryModelStore implements ModelStore {
  private readonly models = new Map<string, Model>();

  async create(model: Model): Promise<void> {
    assertModelId(model.id);
    if (this.models.has(model.id)) throw modelAlreadyExists(model.id);
    this.models.set(model.id, cloneModel(model));
  }

  async get(id: string): Promise<Model> {
    const model = this.models.get(id);
    if (!model) throw modelNotFound(id);
    return cloneModel(model);
  }

  async list(filter?: ModelFilter): Promise<ModelPage> {
    return applyModelFilter(this.models.values(), filter);
  }

  async update(model: Model): Promise<void> {
    if (!this.models.has(model.id)) throw modelNotFound(model.id);
    this.models.set(model.id, cloneModel(model));
  }

  async delete(id: string): Promise<void> {
    if (!this.models.delete(id)) throw modelNotFound(id);
  }
}
