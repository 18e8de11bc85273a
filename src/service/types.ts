import { z } from 'zod';
import type { Model } from '../model/types';

export const SERVICE_STATUSES = ['creating', 'running', 'stopped', 'failed'] as const;
export type ServiceStatus = (typeof SERVICE_STATUSES)[number];
export const ServiceStatusSchema = z.enum(SERVICE_STATUSES);

export const RESOURCE_CLASSES = ['small', 'medium', 'large'] as const;
export type ResourceClass = (typeof RESOURCE_CLASSES)[number];
export const ResourceClassSchema = z.enum(RESOURCE_CLASSES);

export interface ModelService {
  id: string;
  name: string;
  model_id: string;
  status: ServiceStatus;
  replicas: number;
  resource_class: ResourceClass;
  endpoints: string[];
  active_replicas: number;
  config: Record<string, unknown>;
  created_at: number;
  updated_at: number;
}

export interface ServiceFilter {
  status?: ServiceStatus;
  model_id?: string;
  limit?: number;
  offset?: number;
}

export interface ServicePage {
  items: ModelService[];
  total: number;
}

export interface ServiceStore {
  create(service: ModelService): Promise<void>;
  get(id: string): Promise<ModelService>;
  list(filter?: ServiceFilter): Promise<ServicePage>;
  update(service: ModelService): Promise<void>;
  delete(id: string): Promise<void>;
}

export interface ServiceSpec {
  model: Model;
  resourceClass: ResourceClass;
  replicas: number;
  persistent: boolean;
}

/** Runs the serving processes behind service records. */
export interface ServiceProvider {
  /** Returns the id the new service is stored under. */
  create(spec: ServiceSpec, signal: AbortSignal): Promise<string>;
  /** Returns the endpoints the service answers on. */
  start(serviceId: string, signal: AbortSignal): Promise<string[]>;
  stop(serviceId: string, force: boolean, signal: AbortSignal): Promise<void>;
  scale(serviceId: string, replicas: number, signal: AbortSignal): Promise<void>;
  isRunning(serviceId: string): boolean;
}

export function cloneService(service: ModelService): ModelService {
  return { ...service, endpoints: [...service.endpoints], config: structuredClone(service.config) };
}
