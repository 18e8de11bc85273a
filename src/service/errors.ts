import { UnitError } from '../unit/errors';

export const SERVICE_DOMAIN = 'service';

export function serviceNotFound(id: string): UnitError {
  return new UnitError('SERVICE_NOT_FOUND', `service not found: ${id}`, { domain: SERVICE_DOMAIN });
}

export function serviceAlreadyExists(id: string): UnitError {
  return new UnitError('SERVICE_ALREADY_EXISTS', `service already exists: ${id}`, { domain: SERVICE_DOMAIN });
}

export function serviceAlreadyRunning(id: string): UnitError {
  return new UnitError('SERVICE_ALREADY_RUNNING', `service already running: ${id}`, { domain: SERVICE_DOMAIN });
}

export function invalidReplicas(replicas: number): UnitError {
  return new UnitError('SERVICE_INVALID_REPLICAS', `replicas must be a non-negative integer, got ${replicas}`, {
    domain: SERVICE_DOMAIN,
  });
}

export function invalidServiceId(id: string): UnitError {
  return new UnitError('INVALID_INPUT', `invalid service id: ${id} (expected svc-<engine>-<model>)`, {
    domain: SERVICE_DOMAIN,
  });
}
