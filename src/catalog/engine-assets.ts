import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { errorMessage } from '../unit/errors';
import { createLogger } from '../utils/logger';
import type { RecipeEngine } from './types';

const logger = createLogger('catalog.assets');

const EngineAssetDocumentSchema = z.object({
  name: z.string().default(''),
  type: z.string().default(''),
  image: z
    .object({
      full_name: z.string().default(''),
      alternative_names: z.array(z.string()).default([]),
    })
    .default({}),
  requirements: z
    .object({
      gpu: z.object({ required: z.boolean().default(false) }).default({}),
      cpu: z
        .object({
          cores_min: z.number().int().default(0),
          memory_min: z.string().default(''),
        })
        .default({}),
    })
    .default({}),
  startup: z
    .object({
      command: z.array(z.string()).default([]),
      default_args: z.array(z.coerce.string()).default([]),
      health_check: z
        .object({
          path: z.string().default(''),
          timeout: z.string().default(''),
        })
        .default({}),
    })
    .default({}),
});

/** Container image, startup command and requirements of one inference engine. */
export interface EngineAsset {
  name: string;
  type: string;
  image: string;
  alternative_images: string[];
  command: string[];
  default_args: string[];
  health_check_path: string;
  health_check_timeout: string;
  /** From `--port N` in the default args; 0 when absent. */
  default_port: number;
  gpu_required: boolean;
  memory_min: string;
  cpu_cores_min: number;
}

/** Asset files may carry markdown-style `#` heading lines; they are dropped before parsing. */
export function stripHeadingLines(content: string): string {
  return content
    .split(/\r?\n/)
    .filter((line) => !line.trim().startsWith('#'))
    .join('\n');
}

export function parseDefaultPort(args: readonly string[]): number {
  const index = args.indexOf('--port');
  if (index < 0 || index + 1 >= args.length) return 0;
  const port = Number.parseInt(args[index + 1] ?? '', 10);
  return Number.isInteger(port) ? port : 0;
}

export function parseEngineAsset(content: string): EngineAsset {
  const document = EngineAssetDocumentSchema.parse(parseYaml(stripHeadingLines(content)) ?? {});
  return {
    name: document.name,
    type: document.type,
    image: document.image.full_name,
    alternative_images: document.image.alternative_names,
    command: document.startup.command,
    default_args: document.startup.default_args,
    health_check_path: document.startup.health_check.path,
    health_check_timeout: document.startup.health_check.timeout,
    default_port: parseDefaultPort(document.startup.default_args),
    gpu_required: document.requirements.gpu.required,
    memory_min: document.requirements.cpu.memory_min,
    cpu_cores_min: document.requirements.cpu.cores_min,
  };
}

export async function loadEngineAsset(file: string): Promise<EngineAsset> {
  return parseEngineAsset(await fs.readFile(file, 'utf8'));
}

async function listYamlFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) files.push(...(await listYamlFiles(full)));
    else if (entry.isFile() && entry.name.endsWith('.yaml')) files.push(full);
  }
  return files;
}

/**
 * Loads every `*.yaml` under `dir`, keyed by engine type. Later files win on
 * duplicate types; files that fail to parse are skipped.
 */
export async function loadEngineAssets(dir: string): Promise<Map<string, EngineAsset>> {
  const assets = new Map<string, EngineAsset>();
  for (const file of await listYamlFiles(dir)) {
    let asset: EngineAsset;
    try {
      asset = await loadEngineAsset(file);
    } catch (error) {
      logger.warn('skipping engine asset', { file, error: errorMessage(error) });
      continue;
    }
    if (asset.type) assets.set(asset.type, asset);
  }
  return assets;
}

export function toRecipeEngine(asset: EngineAsset): RecipeEngine {
  return {
    type: asset.type,
    image: asset.image,
    fallback_images: [...asset.alternative_images],
  };
}
