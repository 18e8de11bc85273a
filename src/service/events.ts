import { createEvent, type DomainEvent } from '../unit/events';
import { SERVICE_DOMAIN } from './errors';
import type { ModelService } from './types';

export const SERVICE_EVENTS = {
  created: 'service.created',
  scaled: 'service.scaled',
  started: 'service.started',
  stopped: 'service.stopped',
  failed: 'service.failed',
} as const;

export type ServiceEventType = (typeof SERVICE_EVENTS)[keyof typeof SERVICE_EVENTS];

export function serviceEvent(
  type: ServiceEventType,
  service: ModelService,
  correlationId: string,
  extra: Record<string, unknown> = {},
): DomainEvent {
  return createEvent(
    SERVICE_DOMAIN,
    type,
    { service_id: service.id, model_id: service.model_id, status: service.status, ...extra },
    correlationId,
  );
}
