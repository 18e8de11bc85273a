import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { type FakeServer, sendJson, startFakeServer } from '../../../test/support/fake-server';
import type { PullProgress } from '../../model/types';
import { HuggingFaceClient, type HfModelInfo } from './client';
import { estimateRequirements, HuggingFaceProvider, sanitizeRepo, selectDownloadFiles } from './provider';

const GIB = 1024 * 1024 * 1024;
const WEIGHTS = 'GGUF-test-payload!';

function info(overrides: Partial<HfModelInfo> = {}): HfModelInfo {
  return {
    id: 'test-org/test-model',
    tags: [],
    downloads: 0,
    likes: 0,
    siblings: [],
    ...overrides,
  };
}

describe('selectDownloadFiles', () => {
  test('prefers weight files', () => {
    const selection = selectDownloadFiles([
      { rfilename: 'config.json', size: 10 },
      { rfilename: 'model.safetensors', lfs: { sha256: '', size: 300 } },
    ]);
    expect(selection.files.map((file) => file.rfilename)).toEqual(['model.safetensors']);
    expect(selection.totalSize).toBe(300);
  });

  test('falls back to config and tokenizer files', () => {
    const selection = selectDownloadFiles([
      { rfilename: 'README.md', size: 5 },
      { rfilename: 'config.json', size: 10 },
      { rfilename: 'tokenizer.model', size: 7 },
    ]);
    expect(selection.files.map((file) => file.rfilename)).toEqual(['config.json', 'tokenizer.model']);
    expect(selection.totalSize).toBe(17);
  });
});

describe('estimateRequirements', () => {
  test('uses lfs bytes when present', () => {
    const requirements = estimateRequirements(
      info({ siblings: [{ rfilename: 'a.safetensors', lfs: { sha256: '', size: 1000 } }] }),
    );
    expect(requirements).toEqual({ memory_min: 1200, memory_recommended: 1500, gpu_memory: 1200, total_bytes: 1000 });
  });

  test('uses parameter count with quantized width', () => {
    const requirements = estimateRequirements(info({ tags: ['gptq'], safetensors: { total: 1000 } }));
    expect(requirements).toEqual({
      memory_min: 1000,
      memory_recommended: 1300,
      gpu_memory: 1000,
      total_params: 1000,
    });
  });

  test('defaults without size hints', () => {
    expect(estimateRequirements(info())).toEqual({
      memory_min: 4 * GIB,
      memory_recommended: 8 * GIB,
      gpu_memory: 4 * GIB,
    });
  });
});

test('sanitizeRepo flattens separators', () => {
  expect(sanitizeRepo('org/name')).toBe('org_name');
});

describe('HuggingFaceProvider', () => {
  let server: FakeServer;
  let downloadDir: string;
  let provider: HuggingFaceProvider;
  const signal = new AbortController().signal;

  beforeEach(async () => {
    downloadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'aima-hf-'));
    server = await startFakeServer((request, response) => {
      if (request.path === '/api/models/test-org/test-model') {
        sendJson(response, 200, {
          id: 'test-org/test-model',
          pipeline_tag: 'text-generation',
          tags: ['gguf'],
          siblings: [{ rfilename: 'config.json' }, { rfilename: 'model.gguf', lfs: { sha256: 'x', size: 100 } }],
        });
        return;
      }
      if (request.path === '/api/models/test-org/broken') {
        sendJson(response, 200, { id: 'test-org/broken', siblings: [{ rfilename: 'model.gguf', lfs: { sha256: '', size: 8 } }] });
        return;
      }
      if (request.path === '/test-org/broken/resolve/main/model.gguf') {
        response.writeHead(500, { 'content-type': 'text/plain' });
        response.end('upstream failure');
        return;
      }
      if (request.path === '/api/models/test-org/sharded') {
        sendJson(response, 200, {
          id: 'test-org/sharded',
          siblings: [
            { rfilename: 'model-00001-of-00002.safetensors', lfs: { sha256: '', size: 6 } },
            { rfilename: 'model-00002-of-00002.safetensors', lfs: { sha256: '', size: 6 } },
          ],
        });
        return;
      }
      if (request.path.startsWith('/test-org/sharded/resolve/main/')) {
        response.writeHead(200, { 'content-type': 'application/octet-stream', 'content-length': '6' });
        response.write('abc');
        setTimeout(() => response.end('def'), 10);
        return;
      }
      if (request.path === '/api/models/test-org/empty') {
        sendJson(response, 200, { id: 'test-org/empty', siblings: [{ rfilename: 'README.md' }] });
        return;
      }
      if (request.path === '/test-org/test-model/resolve/main/model.gguf') {
        response.writeHead(200, { 'content-type': 'application/octet-stream' });
        response.end(WEIGHTS);
        return;
      }
      if (request.path.startsWith('/api/models?')) {
        sendJson(response, 200, [
          { id: 'test-org/whisper-tiny', pipeline_tag: 'automatic-speech-recognition', downloads: 9 },
          { id: 'test-org/chat', pipeline_tag: 'text-generation', downloads: 3 },
        ]);
        return;
      }
      sendJson(response, 404, { error: 'Repository not found' });
    });
    provider = new HuggingFaceProvider({
      downloadDir,
      client: new HuggingFaceClient({ baseUrl: server.url, token: 'test-secret' }),
    });
  });

  afterEach(async () => {
    await server.close();
    await fs.rm(downloadDir, { recursive: true, force: true });
  });

  test('pulls weight files into the download directory', async () => {
    const updates: PullProgress[] = [];
    const model = await provider.pull(
      { source: 'huggingface', repo: 'test-org/test-model', tag: '' },
      { signal, progress: { push: (update) => updates.push(update) } },
    );

    expect(model.status).toBe('ready');
    expect(model.format).toBe('gguf');
    expect(model.type).toBe('llm');
    expect(model.size).toBe(WEIGHTS.length);
    expect(model.path).toBe(path.join(downloadDir, 'test-org_test-model'));
    expect(await fs.readFile(path.join(model.path, 'model.gguf'), 'utf-8')).toBe(WEIGHTS);
    expect(updates.at(-1)?.status).toBe('completed');
    expect(server.requests.some((request) => request.path.endsWith('/model.gguf'))).toBe(true);
    expect(server.requests[0]?.headers.authorization).toBe('Bearer test-secret');
  });

  test('reuses a completed pull of the same revision', async () => {
    const first = await provider.pull({ source: 'hf', repo: 'test-org/test-model', tag: 'main' }, { signal });
    const downloads = server.requests.length;
    const updates: PullProgress[] = [];
    const second = await provider.pull(
      { source: 'hf', repo: 'test-org/test-model', tag: 'main' },
      { signal, progress: { push: (update) => updates.push(update) } },
    );
    expect(second.id).toBe(first.id);
    expect(second.path).toBe(first.path);
    expect(server.requests.length).toBe(downloads);
    expect(updates.map((update) => update.status)).toEqual(['completed']);
  });

  test('a failed file download ends the pull with an error record', async () => {
    const updates: PullProgress[] = [];
    await expect(
      provider.pull(
        { source: 'huggingface', repo: 'test-org/broken', tag: '' },
        { signal, progress: { push: (update) => updates.push(update) } },
      ),
    ).rejects.toMatchObject({
      code: 'MODEL_PULL_FAILED',
      message: 'download file model.gguf: huggingface error: download failed with status 500',
    });
    expect(updates.at(-1)).toMatchObject({
      status: 'error',
      bytes_done: 0,
      bytes_total: 8,
      error: 'huggingface error: download failed with status 500',
    });
  });

  test('an unwritable destination fails the pull instead of crashing', async () => {
    const blocked = path.join(downloadDir, 'test-org_test-model', 'model.gguf');
    await fs.mkdir(blocked, { recursive: true });
    const updates: PullProgress[] = [];
    const failure = provider.pull(
      { source: 'huggingface', repo: 'test-org/test-model', tag: '' },
      { signal, progress: { push: (update) => updates.push(update) } },
    );
    await expect(failure).rejects.toMatchObject({ code: 'MODEL_PULL_FAILED' });
    await expect(failure).rejects.toThrow(/^download file model\.gguf: EISDIR/);
    expect(updates.at(-1)?.status).toBe('error');

    await fs.rm(blocked, { recursive: true });
    const model = await provider.pull({ source: 'huggingface', repo: 'test-org/test-model', tag: '' }, { signal });
    expect(model.status).toBe('ready');
  });

  test('bytes_done never goes backwards across files', async () => {
    const updates: PullProgress[] = [];
    const model = await provider.pull(
      { source: 'huggingface', repo: 'test-org/sharded', tag: '' },
      { signal, progress: { push: (update) => updates.push(update) } },
    );
    expect(model.size).toBe(12);
    const done = updates.map((update) => update.bytes_done);
    expect(done).toEqual([...done].sort((a, b) => a - b));
    expect(done.at(-1)).toBe(12);
    expect(updates.every((update) => update.bytes_total === 12)).toBe(true);
    expect(updates.filter((update) => update.status === 'completed')).toHaveLength(1);
  });

  test('fails when a repository has nothing to download', async () => {
    await expect(
      provider.pull({ source: 'huggingface', repo: 'test-org/empty', tag: '' }, { signal }),
    ).rejects.toMatchObject({
      code: 'MODEL_PULL_FAILED',
      message: 'no downloadable model files found in repository',
    });
  });

  test('reports missing repositories as pull failures', async () => {
    await expect(
      provider.pull({ source: 'huggingface', repo: 'test-org/missing', tag: '' }, { signal }),
    ).rejects.toMatchObject({
      code: 'MODEL_PULL_FAILED',
      message: 'get model info: huggingface error: Repository not found',
    });
  });

  test('rejects other sources', async () => {
    await expect(
      provider.pull({ source: 'modelscope', repo: 'test-org/test-model', tag: '' }, { signal }),
    ).rejects.toMatchObject({ code: 'INVALID_INPUT', message: 'unsupported source: modelscope' });
  });

  test('search forwards the task filter and narrows by type', async () => {
    const results = await provider.search({ query: 'whisper', type: 'asr', limit: 5 }, signal);
    expect(results).toEqual([
      {
        id: 'test-org/whisper-tiny',
        name: 'test-org/whisper-tiny',
        type: 'asr',
        source: 'huggingface',
        description: 'automatic-speech-recognition',
        downloads: 9,
      },
    ]);
    const url = new URL(server.requests[0]?.path ?? '', server.url);
    expect(url.searchParams.get('search')).toBe('whisper');
    expect(url.searchParams.get('limit')).toBe('5');
    expect(url.searchParams.getAll('filter')).toEqual(['task:automatic-speech-recognition']);
  });

  test('verify compares size checksums with the bytes under the model directory', async () => {
    const model = await provider.pull({ source: 'huggingface', repo: 'test-org/test-model', tag: '' }, { signal });
    expect(await provider.verify(model.id, `size:${WEIGHTS.length}`, signal)).toEqual({ valid: true, issues: [] });
    expect(await provider.verify(model.id, 'size:1', signal)).toEqual({ valid: false, issues: ['checksum mismatch'] });
    expect(await provider.verify(model.id, 'safetensors:7', signal)).toEqual({ valid: true, issues: [] });
    expect(await provider.verify('model-unknown', '', signal)).toEqual({
      valid: false,
      issues: ['model not found: model-unknown'],
    });
  });

  test('verify rejects sha256 against a directory', async () => {
    const model = await provider.pull({ source: 'huggingface', repo: 'test-org/test-model', tag: '' }, { signal });
    await expect(provider.verify(model.id, 'sha256:abc', signal)).rejects.toMatchObject({
      code: 'MODEL_VERIFY_FAILED',
    });
  });

  test('estimateResources reads the repository again', async () => {
    const model = await provider.pull({ source: 'huggingface', repo: 'test-org/test-model', tag: '' }, { signal });
    expect(await provider.estimateResources(model.id, signal)).toEqual({
      memory_min: 120,
      memory_recommended: 150,
      gpu_memory: 120,
      total_bytes: 100,
    });
    await expect(provider.estimateResources('model-unknown', signal)).rejects.toMatchObject({
      code: 'MODEL_NOT_FOUND',
    });
  });
});
