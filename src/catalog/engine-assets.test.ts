import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { loadEngineAssets, parseDefaultPort, parseEngineAsset, toRecipeEngine } from './engine-assets';

const VLLM_ASSET = `# vLLM engine
name: vllm-openai
type: vllm
image:
  full_name: vllm/vllm-openai:v0.6.3
  alternative_names:
    - registry.local/vllm:v0.6.3
requirements:
  gpu:
    required: true
  cpu:
    cores_min: 4
    memory_min: 16Gi
startup:
  command: [python3, -m, vllm.entrypoints.openai.api_server]
  default_args: [--host, 0.0.0.0, --port, 8000]
  health_check:
    path: /health
    timeout: 120s
`;

describe('parseEngineAsset', () => {
  test('reads image, startup and requirements', () => {
    expect(parseEngineAsset(VLLM_ASSET)).toEqual({
      name: 'vllm-openai',
      type: 'vllm',
      image: 'vllm/vllm-openai:v0.6.3',
      alternative_images: ['registry.local/vllm:v0.6.3'],
      command: ['python3', '-m', 'vllm.entrypoints.openai.api_server'],
      default_args: ['--host', '0.0.0.0', '--port', '8000'],
      health_check_path: '/health',
      health_check_timeout: '120s',
      default_port: 8000,
      gpu_required: true,
      memory_min: '16Gi',
      cpu_cores_min: 4,
    });
  });

  test('toRecipeEngine keeps the images', () => {
    expect(toRecipeEngine(parseEngineAsset(VLLM_ASSET))).toEqual({
      type: 'vllm',
      image: 'vllm/vllm-openai:v0.6.3',
      fallback_images: ['registry.local/vllm:v0.6.3'],
    });
  });

  test('parseDefaultPort', () => {
    expect(parseDefaultPort(['--port', '9000'])).toBe(9000);
    expect(parseDefaultPort(['--port'])).toBe(0);
    expect(parseDefaultPort(['--port', 'auto'])).toBe(0);
  });
});

describe('loadEngineAssets', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'aima-assets-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('walks subdirectories and skips unreadable files', async () => {
    await fs.mkdir(path.join(dir, 'gpu'));
    await fs.writeFile(path.join(dir, 'gpu', 'vllm.yaml'), VLLM_ASSET);
    await fs.writeFile(path.join(dir, 'ollama.yaml'), 'name: ollama\ntype: ollama\nimage:\n  full_name: ollama/ollama:latest\n');
    await fs.writeFile(path.join(dir, 'broken.yaml'), 'type: [unclosed');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'type: ignored');

    const assets = await loadEngineAssets(dir);
    expect([...assets.keys()].sort()).toEqual(['ollama', 'vllm']);
    expect(assets.get('ollama')?.image).toBe('ollama/ollama:latest');
    expect(assets.get('vllm')?.default_port).toBe(8000);
  });
});
