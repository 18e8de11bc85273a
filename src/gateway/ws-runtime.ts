import type { RawData as WsRawData, WebSocket } from 'ws';
import type { InMemoryEventBus } from '../unit/events';
import { createLogger } from '../utils/logger';
import type { Gateway } from './gateway';
import { parseIncomingFrame, type WsOutgoingFrame } from './protocol';

const logger = createLogger('ws');

export function normalizeWsInput(message: WsRawData): string {
  if (typeof message === 'string') return message;
  if (Buffer.isBuffer(message)) return message.toString('utf-8');
  if (Array.isArray(message)) return Buffer.concat(message).toString('utf-8');
  return Buffer.from(message).toString('utf-8');
}

export interface WsConnectionOptions {
  gateway: Gateway;
  bus?: InMemoryEventBus;
  token?: string;
}

/** Protocol state for one socket: in-flight requests and event subscriptions. */
export class WsConnection {
  private readonly subscriptions = new Map<string, () => void>();
  private readonly controller = new AbortController();

  constructor(
    private readonly socket: Pick<WebSocket, 'send' | 'readyState' | 'OPEN'>,
    private readonly options: WsConnectionOptions,
  ) {}

  async handleMessage(input: string): Promise<void> {
    const parsed = parseIncomingFrame(input);
    if (!parsed.frame) {
      this.send({ type: 'error', error: parsed.error ?? 'invalid_frame' });
      return;
    }
    const frame = parsed.frame;
    switch (frame.type) {
      case 'ping':
        this.send({ type: 'pong', ts: Date.now() });
        return;
      case 'subscribe': {
        const bus = this.options.bus;
        if (!bus) {
          this.send({ type: 'ack', id: frame.id, ok: false, error: 'events_unavailable' });
          return;
        }
        if (!this.subscriptions.has(frame.pattern)) {
          const unsubscribe = bus.subscribe(frame.pattern, (event) => {
            this.send({ type: 'event', event });
          });
          this.subscriptions.set(frame.pattern, unsubscribe);
        }
        this.send({ type: 'ack', id: frame.id, ok: true });
        return;
      }
      case 'unsubscribe': {
        const unsubscribe = this.subscriptions.get(frame.pattern);
        unsubscribe?.();
        this.subscriptions.delete(frame.pattern);
        this.send({ type: 'ack', id: frame.id, ok: Boolean(unsubscribe) });
        return;
      }
      case 'request': {
        const response = await this.options.gateway.handle(frame.request, {
          token: this.options.token,
          signal: this.controller.signal,
        });
        this.send({ type: 'response', id: frame.id, response });
        return;
      }
    }
  }

  close(): void {
    for (const unsubscribe of this.subscriptions.values()) unsubscribe();
    this.subscriptions.clear();
    this.controller.abort();
  }

  private send(frame: WsOutgoingFrame): void {
    if (this.socket.readyState !== this.socket.OPEN) return;
    try {
      this.socket.send(JSON.stringify(frame));
    } catch (error) {
      logger.warn('ws send failed', { error });
    }
  }
}
