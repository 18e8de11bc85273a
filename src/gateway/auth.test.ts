import { describe, expect, test } from 'vitest';
import { acceptsToken, createApiKeyAuth, extractBearerToken } from './auth';
import type { GatewayRequest } from './protocol';

const query: GatewayRequest = { type: 'query', unit: 'model.list' };

describe('api key auth', () => {
  test('passes everything when no keys are configured', async () => {
    const auth = createApiKeyAuth([]);
    await expect(Promise.resolve(auth({ request: query }))).resolves.toEqual({});
  });

  test('required level rejects anonymous calls', () => {
    const auth = createApiKeyAuth(['test-secret']);
    expect(() => auth({ request: query })).toThrow('missing api key');
    expect(() => auth({ request: query, token: 'nope' })).toThrow('invalid api key');
    expect(auth({ request: query, token: ' test-secret ' })).toEqual({ userId: 'api-key-1' });
  });

  test('optional level lets anonymous calls through', () => {
    const auth = createApiKeyAuth(['k1', 'k2'], 'optional');
    expect(auth({ request: query })).toEqual({});
    expect(auth({ request: query, token: 'k2' })).toEqual({ userId: 'api-key-2' });
  });

  test('connection check accepts absent or matching tokens', () => {
    expect(acceptsToken(['test-secret'], undefined)).toBe(true);
    expect(acceptsToken(['test-secret'], 'test-secret')).toBe(true);
    expect(acceptsToken(['test-secret'], 'wrong')).toBe(false);
    expect(acceptsToken([], 'anything')).toBe(true);
  });

  test('extracts bearer tokens', () => {
    expect(extractBearerToken('Bearer abc')).toBe('abc');
    expect(extractBearerToken('bearer   abc ')).toBe('abc');
    expect(extractBearerToken('Basic abc')).toBeUndefined();
    expect(extractBearerToken(undefined)).toBeUndefined();
  });
});
