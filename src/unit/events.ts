import { createLogger } from '../utils/logger';
import { errorMessage } from './errors';

export interface DomainEvent<P = unknown> {
  type: string;
  domain: string;
  payload: P;
  timestamp: number;
  correlation_id: string;
}

export interface EventPublisher {
  publish(event: DomainEvent): void | Promise<void>;
}

export type EventListener = (event: DomainEvent) => void;

const logger = createLogger('events');

export class NoopEventPublisher implements EventPublisher {
  publish(_event: DomainEvent): void {}
}

export function createEvent<P>(
  domain: string,
  type: string,
  payload: P,
  correlationId: string,
): DomainEvent<P> {
  return {
    type,
    domain,
    payload,
    timestamp: Date.now(),
    correlation_id: correlationId,
  };
}

/**
 * Publishing is fire-and-forget: a failing publisher is logged and never
 * fails the unit that emitted the event.
 */
export function publishSafely(publisher: EventPublisher | undefined, event: DomainEvent): void {
  if (!publisher) return;
  try {
    const result = publisher.publish(event);
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        logger.warn('event publish failed', { type: event.type, error: errorMessage(error) });
      });
    }
  } catch (error) {
    logger.warn('event publish failed', { type: event.type, error: errorMessage(error) });
  }
}

/** `*` matches everything, `model.*` a whole domain, anything else exactly. */
export function eventMatches(pattern: string, type: string): boolean {
  if (pattern === '*') return true;
  if (pattern.endsWith('.*')) return type.startsWith(pattern.slice(0, -1));
  return pattern === type;
}

interface Subscription {
  pattern: string;
  listener: EventListener;
}

export class InMemoryEventBus implements EventPublisher {
  private readonly subscriptions = new Set<Subscription>();
  private readonly history: DomainEvent[] = [];

  constructor(private readonly historyLimit = 256) {}

  publish(event: DomainEvent): void {
    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
    for (const subscription of [...this.subscriptions]) {
      if (!eventMatches(subscription.pattern, event.type)) continue;
      try {
        subscription.listener(event);
      } catch (error) {
        logger.warn('event listener failed', { type: event.type, error: errorMessage(error) });
      }
    }
  }

  subscribe(pattern: string, listener: EventListener): () => void {
    const subscription: Subscription = { pattern, listener };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  recent(pattern = '*'): DomainEvent[] {
    return this.history.filter((event) => eventMatches(pattern, event.type));
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }
}
