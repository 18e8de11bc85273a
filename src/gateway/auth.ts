import { createHash, timingSafeEqual } from 'node:crypto';
import { UnitError } from '../unit/errors';
import type { GatewayRequest } from './protocol';

export interface AuthContext {
  token?: string;
  request: GatewayRequest;
}

export interface AuthResult {
  userId?: string;
}

/** Throws UNAUTHORIZED to reject a request. */
export type AuthHook = (context: AuthContext) => AuthResult | Promise<AuthResult>;

export type AuthLevel = 'optional' | 'required';

/** Chooses the level a request is held to. */
export type AuthPolicy = (request: GatewayRequest) => AuthLevel;

/** Queries and resource reads may be anonymous; commands need a key. */
export const readsOptionalPolicy: AuthPolicy = (request) =>
  request.type === 'command' ? 'required' : 'optional';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function sameKey(candidate: string, expected: string): boolean {
  return timingSafeEqual(digest(candidate), digest(expected));
}

/**
 * API-key authentication. With no keys configured every request passes.
 * An `optional` request may be anonymous but a wrong key is still rejected.
 */
export function createApiKeyAuth(keys: readonly string[], level: AuthLevel | AuthPolicy = 'required'): AuthHook {
  const configured = keys.map((key) => key.trim()).filter(Boolean);
  const levelFor: AuthPolicy = typeof level === 'function' ? level : () => level;
  return ({ token, request }) => {
    if (configured.length === 0) return {};
    const presented = token?.trim();
    if (!presented) {
      if (levelFor(request) === 'optional') return {};
      throw new UnitError('UNAUTHORIZED', 'missing api key');
    }
    const index = configured.findIndex((key) => sameKey(presented, key));
    if (index < 0) throw new UnitError('UNAUTHORIZED', 'invalid api key');
    return { userId: `api-key-${index + 1}` };
  };
}

/** Connection-level check: an absent token passes, a presented one must match. */
export function acceptsToken(keys: readonly string[], token: string | undefined): boolean {
  const configured = keys.map((key) => key.trim()).filter(Boolean);
  const presented = token?.trim();
  if (configured.length === 0 || !presented) return true;
  return configured.some((key) => sameKey(presented, key));
}

export function extractBearerToken(header: string | null | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1]?.trim() || undefined;
}
