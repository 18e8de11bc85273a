import type { UnitRegistry } from '../unit/registry';
import { errorToHttpStatus } from '../unit/errors';
import { extractBearerToken } from './auth';
import type { Gateway } from './gateway';
import type { GatewayResponse } from './protocol';

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface HttpRouterOptions {
  gateway: Gateway;
  registry: UnitRegistry;
  version?: string;
  enableCors?: boolean;
  maxBodyBytes?: number;
}

export type HttpHandler = (request: Request) => Promise<Response>;

const CORS_HEADERS: Record<string, string> = {
  'access-control-allow-origin': '*',
  'access-control-allow-methods': 'GET, POST, OPTIONS',
  'access-control-allow-headers': 'content-type, authorization, x-api-key, x-request-id',
};

function jsonResponse(body: unknown, status: number, cors: boolean): Response {
  const headers: Record<string, string> = {
    'content-type': 'application/json; charset=utf-8',
    'cache-control': 'no-store',
  };
  if (cors) Object.assign(headers, CORS_HEADERS);
  return new Response(JSON.stringify(body), { status, headers });
}

function envelopeStatus(envelope: GatewayResponse): number {
  if (envelope.success || !envelope.error) return 200;
  return errorToHttpStatus(envelope.error.code);
}

function requestToken(request: Request): string | undefined {
  return (
    extractBearerToken(request.headers.get('authorization')) ??
    (request.headers.get('x-api-key')?.trim() || undefined)
  );
}

function simpleError(code: string, message: string): GatewayResponse {
  return {
    success: false,
    data: null,
    error: { code, message },
    request_id: '',
    duration_ms: 0,
  };
}

/** Fetch-style router over the gateway; the node host adapts it to `http`. */
export function createHttpHandler(options: HttpRouterOptions): HttpHandler {
  const cors = options.enableCors ?? false;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const { gateway, registry } = options;

  const execute = async (request: Request): Promise<Response> => {
    const declared = Number(request.headers.get('content-length') ?? 0);
    if (declared > maxBodyBytes) {
      return jsonResponse(simpleError('INVALID_REQUEST', 'request body too large'), 413, cors);
    }
    const text = await request.text();
    if (Buffer.byteLength(text) > maxBodyBytes) {
      return jsonResponse(simpleError('INVALID_REQUEST', 'request body too large'), 413, cors);
    }
    let body: unknown;
    try {
      body = text.trim() ? JSON.parse(text) : null;
    } catch {
      return jsonResponse(simpleError('INVALID_REQUEST', 'invalid json body'), 400, cors);
    }
    const envelope = await gateway.handle(body, {
      token: requestToken(request),
      signal: request.signal,
    });
    return jsonResponse(envelope, envelopeStatus(envelope), cors);
  };

  return async (request) => {
    const url = new URL(request.url);
    const method = request.method.toUpperCase();

    if (method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: cors ? CORS_HEADERS : {} });
    }

    if (url.pathname === '/health' && method === 'GET') {
      return jsonResponse(
        {
          status: 'ok',
          version: options.version ?? '0.0.0',
          units: registry.size,
          domains: registry.domains(),
          gateway: gateway.stats(),
        },
        200,
        cors,
      );
    }

    if (url.pathname === '/api/v2/execute') {
      if (method !== 'POST') {
        return jsonResponse(simpleError('INVALID_REQUEST', 'method not allowed'), 405, cors);
      }
      return execute(request);
    }

    if (url.pathname === '/api/v2/units' && method === 'GET') {
      const kind = url.searchParams.get('kind');
      const domain = url.searchParams.get('domain');
      const units = registry
        .describe(kind === 'command' || kind === 'query' ? kind : undefined)
        .filter((unit) => !domain || unit.domain === domain);
      return jsonResponse(
        {
          units,
          resources: registry.listResources().map((resource) => ({
            uri: resource.uri,
            domain: resource.domain,
            schema: resource.schema,
          })),
          resource_patterns: registry.listResourcePatterns(),
        },
        200,
        cors,
      );
    }

    if (url.pathname === '/api/v2/resources' && method === 'GET') {
      const uri = url.searchParams.get('uri');
      if (!uri) {
        return jsonResponse(simpleError('INVALID_REQUEST', 'uri is required'), 400, cors);
      }
      const envelope = await gateway.handle(
        { type: 'resource_get', unit: uri },
        { token: requestToken(request), signal: request.signal },
      );
      return jsonResponse(envelope, envelopeStatus(envelope), cors);
    }

    return jsonResponse(simpleError('NOT_FOUND', `no route for ${method} ${url.pathname}`), 404, cors);
  };
}
