import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { generateModelId, nowSeconds } from '../utils/ids';
import { modelError } from './errors';
import type { Model, ModelFormat } from './types';

const IMPORT_FORMATS: ReadonlyArray<readonly [string, ModelFormat]> = [
  ['.safetensors', 'safetensors'],
  ['.gguf', 'gguf'],
  ['.onnx', 'onnx'],
  ['.engine', 'tensorrt'],
  ['.plan', 'tensorrt'],
  ['.bin', 'pytorch'],
  ['.pt', 'pytorch'],
  ['.pth', 'pytorch'],
];

function formatFor(filename: string): readonly [string, ModelFormat] | undefined {
  const lower = filename.toLowerCase();
  return IMPORT_FORMATS.find(([extension]) => lower.endsWith(extension));
}

/**
 * Builds a ready model record for weights already on disk. In a directory the
 * entries are scanned in name order and the last weight file decides both
 * name and format. Without auto-detection the format stays `safetensors`.
 */
export async function importLocalModel(target: string, autoDetect: boolean): Promise<Model> {
  let stat: Stats;
  try {
    stat = await fs.stat(target);
  } catch (error) {
    throw modelError('MODEL_IMPORT_FAILED', `path does not exist: ${target}`, error);
  }

  let name = '';
  let format: ModelFormat | undefined;
  let size = 0;

  if (stat.isDirectory()) {
    const entries = (await fs.readdir(target, { withFileTypes: true }))
      .filter((entry) => entry.isFile())
      .sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      size += (await fs.stat(path.join(target, entry.name))).size;
      const match = formatFor(entry.name);
      if (!match) continue;
      name = entry.name.slice(0, entry.name.length - match[0].length);
      format = match[1];
    }
    if (!name) name = path.basename(target);
  } else {
    const base = path.basename(target);
    name = base.slice(0, base.length - path.extname(base).length) || base;
    format = formatFor(base)?.[1];
    size = stat.size;
  }

  const now = nowSeconds();
  return {
    id: generateModelId(),
    name,
    type: 'llm',
    format: autoDetect ? (format ?? 'safetensors') : 'safetensors',
    status: 'ready',
    source: 'local',
    path: target,
    size,
    checksum: `size:${size}`,
    tags: [],
    created_at: now,
    updated_at: now,
  };
}
