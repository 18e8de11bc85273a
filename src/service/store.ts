import { paginate } from '../catalog/store';
import { serviceAlreadyExists, serviceNotFound } from './errors';
import { cloneService, type ModelService, type ServiceFilter, type ServicePage, type ServiceStore } from './types';

export function serviceMatchesFilter(service: ModelService, filter: ServiceFilter): boolean {
  if (filter.status && service.status !== filter.status) return false;
  if (filter.model_id && service.model_id !== filter.model_id) return false;
  return true;
}

export class MemoryServiceStore implements ServiceStore {
  private readonly services = new Map<string, ModelService>();

  async create(service: ModelService): Promise<void> {
    if (this.services.has(service.id)) throw serviceAlreadyExists(service.id);
    this.services.set(service.id, cloneService(service));
  }

  async get(id: string): Promise<ModelService> {
    const service = this.services.get(id);
    if (!service) throw serviceNotFound(id);
    return cloneService(service);
  }

  async list(filter: ServiceFilter = {}): Promise<ServicePage> {
    const matches = [...this.services.values()].filter((service) => serviceMatchesFilter(service, filter));
    return { items: paginate(matches, filter).map(cloneService), total: matches.length };
  }

  async update(service: ModelService): Promise<void> {
    if (!this.services.has(service.id)) throw serviceNotFound(service.id);
    this.services.set(service.id, cloneService(service));
  }

  async delete(id: string): Promise<void> {
    if (!this.services.delete(id)) throw serviceNotFound(id);
  }
}
