import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { importLocalModel } from './local-import';

describe('importLocalModel', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'aima-import-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('imports a single weight file', async () => {
    const file = path.join(dir, 'tiny-llama.Q4.gguf');
    await fs.writeFile(file, '12345');
    const model = await importLocalModel(file, true);
    expect(model).toMatchObject({
      name: 'tiny-llama.Q4',
      format: 'gguf',
      status: 'ready',
      source: 'local',
      path: file,
      size: 5,
      checksum: 'size:5',
    });
    expect(model.id).toMatch(/^model-[0-9a-f]{8}$/);
  });

  test('the last weight file in a directory names the model', async () => {
    await fs.writeFile(path.join(dir, 'a-weights.onnx'), 'aa');
    await fs.writeFile(path.join(dir, 'b-weights.safetensors'), 'bbb');
    await fs.writeFile(path.join(dir, 'config.json'), '{}');
    const model = await importLocalModel(dir, true);
    expect(model.name).toBe('b-weights');
    expect(model.format).toBe('safetensors');
    expect(model.size).toBe(7);
  });

  test('keeps safetensors without auto-detection', async () => {
    const file = path.join(dir, 'model.onnx');
    await fs.writeFile(file, 'x');
    expect((await importLocalModel(file, false)).format).toBe('safetensors');
  });

  test('fails on a missing path', async () => {
    const missing = path.join(dir, 'missing.gguf');
    await expect(importLocalModel(missing, true)).rejects.toMatchObject({
      code: 'MODEL_IMPORT_FAILED',
      message: `path does not exist: ${missing}`,
    });
  });
});
