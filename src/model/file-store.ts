import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { UnitError, errorMessage } from '../unit/errors';
import { createLogger } from '../utils/logger';
import { randomHex } from '../utils/ids';
import { MODEL_DOMAIN, modelAlreadyExists, modelNotFound } from './errors';
import { applyModelFilter, assertModelId } from './store';
import {
  cloneModel,
  type Model,
  type ModelFilter,
  type ModelPage,
  ModelSchema,
  type ModelStore,
} from './types';

const logger = createLogger('model-file-store');

/** `models.json` maps each model id to its record. */
const ModelFileSchema = z.record(z.string(), ModelSchema);

/**
 * JSON-file backed store. Every mutation rewrites the whole file through a
 * temp file and rename; mutations are serialised on a promise chain.
 */
export class FileModelStore implements ModelStore {
  private cache: Map<string, Model> | undefined;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly file: string) {}

  async create(model: Model): Promise<void> {
    assertModelId(model.id);
    await this.mutate((models) => {
      if (models.has(model.id)) throw modelAlreadyExists(model.id);
      models.set(model.id, cloneModel(model));
    });
  }

  async get(id: string): Promise<Model> {
    await this.queue;
    const models = await this.load();
    const model = models.get(id);
    if (!model) throw modelNotFound(id);
    return cloneModel(model);
  }

  async list(filter?: ModelFilter): Promise<ModelPage> {
    await this.queue;
    return applyModelFilter((await this.load()).values(), filter);
  }

  async update(model: Model): Promise<void> {
    await this.mutate((models) => {
      if (!models.has(model.id)) throw modelNotFound(model.id);
      models.set(model.id, cloneModel(model));
    });
  }

  async delete(id: string): Promise<void> {
    await this.mutate((models) => {
      if (!models.delete(id)) throw modelNotFound(id);
    });
  }

  private mutate(change: (models: Map<string, Model>) => void): Promise<void> {
    const run = this.queue.then(async () => {
      const models = await this.load();
      const next = new Map(models);
      change(next);
      await this.persist(next);
      this.cache = next;
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<Map<string, Model>> {
    if (this.cache) return this.cache;
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.cache = new Map();
        return this.cache;
      }
      throw error;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new UnitError('INTERNAL_ERROR', `model store is not valid json: ${this.file}`, {
        domain: MODEL_DOMAIN,
        cause: error,
      });
    }
    const result = ModelFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new UnitError('INTERNAL_ERROR', `model store is corrupt: ${this.file}`, {
        domain: MODEL_DOMAIN,
        details: { issues: result.error.issues.map((issue) => issue.message) },
      });
    }
    this.cache = new Map(Object.values(result.data).map((model) => [model.id, model]));
    return this.cache;
  }

  private async persist(models: Map<string, Model>): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const temp = `${this.file}.${process.pid}.${randomHex(4)}.tmp`;
    const body = `${JSON.stringify(Object.fromEntries(models), null, 2)}\n`;
    try {
      await fs.writeFile(temp, body, 'utf-8');
      await fs.rename(temp, this.file);
    } catch (error) {
      logger.error('model store write failed', { file: this.file, error: errorMessage(error) });
      await fs.rm(temp, { force: true });
      throw error;
    }
  }
}
