import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { deepMerge, envOverlay, loadConfig, parseConfig } from './loader';

describe('deepMerge', () => {
  test('merges objects and replaces arrays', () => {
    expect(deepMerge({ a: { x: 1, y: [1] }, b: 1 }, { a: { y: [2] }, c: 3 })).toEqual({
      a: { x: 1, y: [2] },
      b: 1,
      c: 3,
    });
  });
});

describe('envOverlay', () => {
  test('maps variables into sections', () => {
    expect(
      envOverlay({
        AIMA_REQUEST_TIMEOUT_MS: '5000',
        HF_TOKEN: 'test-secret',
        AIMA_OLLAMA_BASE_URL: 'http://127.0.0.1:11500',
        AIMA_API_KEYS: 'key-one, ,key-two',
        AIMA_API_PORT: '0',
      }),
    ).toEqual({
      gateway: { request_timeout_ms: 5000 },
      huggingface: { token: 'test-secret' },
      ollama: { base_url: 'http://127.0.0.1:11500' },
      security: { api_keys: ['key-one', 'key-two'] },
      api: { port: 0 },
    });
  });

  test('AIMA_HF_TOKEN wins over HF_TOKEN', () => {
    expect(envOverlay({ AIMA_HF_TOKEN: 'test-secret-a', HF_TOKEN: 'test-secret-b' })).toEqual({
      huggingface: { token: 'test-secret-a' },
    });
  });

  test('rejects non-numeric values', () => {
    expect(() => envOverlay({ AIMA_API_PORT: 'eighty' })).toThrow(
      'invalid configuration: AIMA_API_PORT must be a number, got "eighty"',
    );
  });
});

describe('parseConfig', () => {
  test('fills defaults', () => {
    const config = parseConfig({});
    expect(config.gateway).toEqual({
      request_timeout_ms: 300_000,
      max_in_flight: 64,
      max_queued: 256,
      validate_input: true,
    });
    expect(config.api).toEqual({ host: '127.0.0.1', port: 9090, enable_cors: false });
    expect(config.model).toEqual({ download_dir: '/tmp/aima-models', default_source: 'huggingface', store: 'sqlite' });
  });

  test('reports the first issue with its path', () => {
    expect(() => parseConfig({ api: { port: 70_000 } })).toThrow(/^invalid configuration: api\.port: /);
  });

  test('rejects a blank default source', () => {
    expect(() => parseConfig({ model: { default_source: ' ' } })).toThrow(
      /^invalid configuration: model\.default_source: /,
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'aima-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('reads config.json from the data dir and applies the environment last', () => {
    fs.writeFileSync(
      path.join(dir, 'config.json'),
      JSON.stringify({ api: { port: 9191 }, model: { store: 'memory' }, gateway: { request_timeout_ms: 1000 } }),
    );
    const config = loadConfig({ env: { AIMA_DATA_DIR: dir, AIMA_REQUEST_TIMEOUT_MS: '2000' } });
    expect(config.general.data_dir).toBe(dir);
    expect(config.api.port).toBe(9191);
    expect(config.model.store).toBe('memory');
    expect(config.gateway.request_timeout_ms).toBe(2000);
  });

  test('a missing default file is fine', () => {
    expect(loadConfig({ env: { AIMA_DATA_DIR: dir } }).api.port).toBe(9090);
  });

  test('an explicit file must exist and hold an object', () => {
    const missing = path.join(dir, 'missing.json');
    expect(() => loadConfig({ env: {}, file: missing })).toThrow(`invalid configuration: cannot read ${missing}`);
    const list = path.join(dir, 'list.json');
    fs.writeFileSync(list, '[]');
    expect(() => loadConfig({ env: { AIMA_CONFIG: list } })).toThrow(
      `invalid configuration: ${list} must contain a JSON object`,
    );
  });
});
