import { z } from 'zod';
import type { ErrorInfo } from '../unit/errors';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

export const REQUEST_TYPES = ['command', 'query', 'resource_get'] as const;
export type RequestType = (typeof REQUEST_TYPES)[number];

export function isRequestType(value: unknown): value is RequestType {
  return typeof value === 'string' && REQUEST_TYPES.some((type) => type === value);
}

export const GatewayRequestSchema = z.object({
  type: z.enum(REQUEST_TYPES),
  unit: z.string().trim().min(1),
  input: z.record(z.string(), z.unknown()).optional(),
  request_id: z.string().min(1).optional(),
  timeout_ms: z.number().int().positive().optional(),
  trace_id: z.string().optional(),
});

export type GatewayRequest = z.infer<typeof GatewayRequestSchema>;

export interface GatewayResponse {
  success: boolean;
  data: unknown;
  error: ErrorInfo | null;
  request_id: string;
  duration_ms: number;
}

/* WebSocket frames */

export const WsRequestFrameSchema = z.object({
  type: z.literal('request'),
  id: z.string().min(1),
  request: z.unknown(),
});

export const WsSubscribeFrameSchema = z.object({
  type: z.literal('subscribe'),
  id: z.string().min(1),
  pattern: z.string().min(1).default('*'),
});

export const WsUnsubscribeFrameSchema = z.object({
  type: z.literal('unsubscribe'),
  id: z.string().min(1),
  pattern: z.string().min(1),
});

export const WsPingFrameSchema = z.object({
  type: z.literal('ping'),
  ts: z.number().optional(),
});

export const WsIncomingFrameSchema = z.discriminatedUnion('type', [
  WsRequestFrameSchema,
  WsSubscribeFrameSchema,
  WsUnsubscribeFrameSchema,
  WsPingFrameSchema,
]);

export type WsIncomingFrame = z.infer<typeof WsIncomingFrameSchema>;

export type WsOutgoingFrame =
  | { type: 'response'; id: string; response: GatewayResponse }
  | { type: 'ack'; id: string; ok: boolean; error?: string }
  | { type: 'event'; event: unknown }
  | { type: 'pong'; ts: number }
  | { type: 'error'; error: string };

export function parseIncomingFrame(message: unknown): {
  frame?: WsIncomingFrame;
  error?: string;
} {
  let payload: unknown = message;
  if (typeof message === 'string') {
    const raw = message.trim();
    if (!raw) return { error: 'empty_message' };
    try {
      payload = JSON.parse(raw);
    } catch {
      return { error: 'invalid_json' };
    }
  }
  const parsed = WsIncomingFrameSchema.safeParse(payload);
  if (!parsed.success) {
    return { error: `invalid_frame:${parsed.error.issues[0]?.message ?? 'unknown'}` };
  }
  return { frame: parsed.data };
}
