import { createEvent, type DomainEvent } from '../unit/events';
import { INFERENCE_DOMAIN } from './errors';

export const INFERENCE_EVENTS = {
  requestStarted: 'inference.request_started',
  requestCompleted: 'inference.request_completed',
  requestFailed: 'inference.request_failed',
} as const;

export function requestStartedEvent(requestId: string, model: string, kind: string): DomainEvent {
  return createEvent(INFERENCE_DOMAIN, INFERENCE_EVENTS.requestStarted, { request_id: requestId, model, type: kind }, requestId);
}

export function requestCompletedEvent(requestId: string, durationMs: number, tokens: number): DomainEvent {
  return createEvent(
    INFERENCE_DOMAIN,
    INFERENCE_EVENTS.requestCompleted,
    { request_id: requestId, duration_ms: durationMs, tokens },
    requestId,
  );
}

export function requestFailedEvent(requestId: string, error: string): DomainEvent {
  return createEvent(INFERENCE_DOMAIN, INFERENCE_EVENTS.requestFailed, { request_id: requestId, error }, requestId);
}
