import { createEvent, type DomainEvent } from '../unit/events';
import { MODEL_DOMAIN } from './errors';
import type { Model, PullProgress, VerificationResult } from './types';

export const MODEL_EVENTS = {
  created: 'model.created',
  deleted: 'model.deleted',
  pullProgress: 'model.pull_progress',
  verified: 'model.verified',
} as const;

export function modelCreatedEvent(model: Model, correlationId: string): DomainEvent {
  return createEvent(
    MODEL_DOMAIN,
    MODEL_EVENTS.created,
    {
      model_id: model.id,
      name: model.name,
      type: model.type,
      format: model.format,
      source: model.source,
      created_at: model.created_at,
    },
    correlationId,
  );
}

export function modelDeletedEvent(model: Model, correlationId: string): DomainEvent {
  return createEvent(
    MODEL_DOMAIN,
    MODEL_EVENTS.deleted,
    { model_id: model.id, name: model.name },
    correlationId,
  );
}

export function pullProgressEvent(progress: PullProgress, correlationId: string): DomainEvent {
  return createEvent(MODEL_DOMAIN, MODEL_EVENTS.pullProgress, { ...progress }, correlationId);
}

export function modelVerifiedEvent(
  modelId: string,
  result: VerificationResult,
  correlationId: string,
): DomainEvent {
  return createEvent(
    MODEL_DOMAIN,
    MODEL_EVENTS.verified,
    { model_id: modelId, valid: result.valid, issues: [...result.issues] },
    correlationId,
  );
}
