import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import { createLogger } from '../utils/logger';
import { extractBearerToken } from './auth';
import type { HttpHandler } from './http-router';
import { DEFAULT_MAX_BODY_BYTES } from './http-router';
import { normalizeWsInput, WsConnection, type WsConnectionOptions } from './ws-runtime';

const logger = createLogger('http');

export function normalizeNodeHeaders(headers: IncomingMessage['headers']): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key] = value;
      continue;
    }
    if (Array.isArray(value) && value.length > 0) {
      normalized[key] = value.join(', ');
    }
  }
  return normalized;
}

class BodyTooLargeError extends Error {}

async function readNodeBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total > limit) throw new BodyTooLargeError('request body too large');
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

export function toNodeRequest(
  req: IncomingMessage,
  hostname: string,
  port: number,
  body?: Buffer,
  signal?: AbortSignal,
): Request {
  const hostHeader =
    typeof req.headers.host === 'string' && req.headers.host.trim()
      ? req.headers.host.trim()
      : `${hostname}:${port}`;
  const requestUrl = new URL(req.url || '/', `http://${hostHeader}`);
  const method = req.method ?? 'GET';
  const hasBody = body !== undefined && body.length > 0 && method !== 'GET' && method !== 'HEAD';
  return new Request(requestUrl, {
    method,
    headers: normalizeNodeHeaders(req.headers),
    body: hasBody ? body : undefined,
    signal,
  });
}

export async function sendNodeResponse(
  req: IncomingMessage,
  res: ServerResponse,
  response: Response,
): Promise<void> {
  res.statusCode = response.status;
  for (const [key, value] of response.headers.entries()) {
    res.setHeader(key, value);
  }
  if ((req.method ?? 'GET').toUpperCase() === 'HEAD' || !response.body) {
    res.end();
    return;
  }
  const body = Buffer.from(await response.arrayBuffer());
  res.end(body);
}

function writeUpgradeRejection(socket: Duplex, status: number, message: string): void {
  socket.write(`HTTP/1.1 ${status} ${message}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export interface ServeOptions {
  hostname: string;
  port: number;
  fetch: HttpHandler;
  maxBodyBytes?: number;
  /** Enables the `/ws` endpoint. */
  websocket?: Omit<WsConnectionOptions, 'token'> & {
    authorize?: (token: string | undefined) => boolean | Promise<boolean>;
  };
}

export interface RunningServer {
  port: number;
  url: string;
  stop: () => Promise<void>;
}

export async function serveWithNode(options: ServeOptions): Promise<RunningServer> {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const wsServer = new WebSocketServer({ noServer: true });
  let boundPort = options.port;

  const httpServer = createServer((req, res) => {
    void (async () => {
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) controller.abort();
      });
      let body: Buffer;
      try {
        body = await readNodeBody(req, maxBodyBytes);
      } catch (error) {
        if (error instanceof BodyTooLargeError) {
          res.statusCode = 413;
          res.setHeader('content-type', 'application/json; charset=utf-8');
          res.end(
            JSON.stringify({
              success: false,
              data: null,
              error: { code: 'INVALID_REQUEST', message: error.message },
              request_id: '',
              duration_ms: 0,
            }),
          );
          return;
        }
        throw error;
      }
      const request = toNodeRequest(req, options.hostname, boundPort, body, controller.signal);
      const response = await options.fetch(request);
      await sendNodeResponse(req, res, response);
    })().catch((error: unknown) => {
      logger.error('http request failed', { error });
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('content-type', 'text/plain; charset=utf-8');
      }
      if (!res.writableEnded) {
        res.end('Internal Server Error');
      }
    });
  });

  const websocket = options.websocket;
  if (websocket) {
    httpServer.on('upgrade', (req, socket, head) => {
      const url = new URL(req.url || '/', `http://${req.headers.host ?? options.hostname}`);
      if (url.pathname !== '/ws') {
        writeUpgradeRejection(socket, 404, 'Not Found');
        return;
      }
      const token =
        extractBearerToken(req.headers.authorization) ?? (url.searchParams.get('token') || undefined);
      void Promise.resolve(websocket.authorize ? websocket.authorize(token) : true)
        .then((allowed) => {
          if (!allowed) {
            writeUpgradeRejection(socket, 401, 'Unauthorized');
            return;
          }
          wsServer.handleUpgrade(req, socket, head, (ws) => {
            const connection = new WsConnection(ws, { ...websocket, token });
            ws.on('close', () => connection.close());
            ws.on('message', (input) => {
              connection.handleMessage(normalizeWsInput(input)).catch((error: unknown) => {
                logger.error('ws message failed', { error });
              });
            });
          });
        })
        .catch((error: unknown) => {
          logger.error('ws upgrade failed', { error });
          writeUpgradeRejection(socket, 500, 'Internal Server Error');
        });
    });
  }

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.hostname, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });
  const address = httpServer.address();
  if (address && typeof address === 'object') boundPort = address.port;
  logger.info('listening', { hostname: options.hostname, port: boundPort });

  return {
    port: boundPort,
    url: `http://${options.hostname}:${boundPort}`,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wsServer.clients) client.terminate();
        wsServer.close();
        httpServer.closeAllConnections();
        httpServer.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
