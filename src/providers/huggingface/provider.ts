import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { abortError, throwIfAborted } from '../../unit/context';
import { errorMessage, UnitError } from '../../unit/errors';
import { MODEL_DOMAIN, modelError, modelNotFound, unsupportedSource } from '../../model/errors';
import { importLocalModel } from '../../model/local-import';
import {
  cloneModel,
  type Model,
  type ModelProvider,
  type ModelRequirements,
  type ModelSearchResult,
  type PullOptions,
  type PullProgress,
  type PullRequest,
  type SearchRequest,
  type VerificationResult,
} from '../../model/types';
import { generateModelId, nowSeconds } from '../../utils/ids';
import { createLogger } from '../../utils/logger';
import { type HfModelInfo, type HfSibling, HuggingFaceClient } from './client';
import { detectFormat, detectModelType, isQuantized, isWeightFile, modelTypeToPipelineTag } from './detect';

const logger = createLogger('huggingface');

const GIB = 1024 * 1024 * 1024;
const HF_SOURCES = new Set(['', 'huggingface', 'hf']);

export interface HuggingFaceProviderOptions {
  downloadDir: string;
  client?: HuggingFaceClient;
  baseUrl?: string;
  token?: string;
}

export interface FileSelection {
  files: HfSibling[];
  totalSize: number;
}

function siblingSize(sibling: HfSibling): number {
  return sibling.lfs?.size ?? sibling.size ?? 0;
}

/**
 * Weight files first; config and tokenizer files only when a repository has
 * no weights at all.
 */
export function selectDownloadFiles(siblings: readonly HfSibling[]): FileSelection {
  let files = siblings.filter((sibling) => isWeightFile(sibling.rfilename));
  if (files.length === 0) {
    files = siblings.filter((sibling) => {
      const name = sibling.rfilename.toLowerCase();
      return name.includes('config') || name.includes('.json') || name.includes('tokenizer');
    });
  }
  return {
    files,
    totalSize: files.reduce((sum, sibling) => sum + siblingSize(sibling), 0),
  };
}

export function estimateRequirements(info: HfModelInfo): ModelRequirements {
  const totalParams = info.safetensors && info.safetensors.total > 0 ? info.safetensors.total : 0;
  const totalBytes = info.siblings.reduce((sum, sibling) => sum + (sibling.lfs?.size ?? 0), 0);

  let memoryMin: number;
  let memoryRecommended: number;
  if (totalBytes > 0) {
    memoryMin = Math.floor(totalBytes * 1.2);
    memoryRecommended = Math.floor(totalBytes * 1.5);
  } else if (totalParams > 0) {
    const bytesPerParam = isQuantized(info.tags) ? 1 : 2;
    memoryMin = totalParams * bytesPerParam;
    memoryRecommended = Math.floor(memoryMin * 1.3);
  } else {
    memoryMin = 4 * GIB;
    memoryRecommended = 8 * GIB;
  }

  const requirements: ModelRequirements = {
    memory_min: memoryMin,
    memory_recommended: memoryRecommended,
    gpu_memory: memoryMin,
  };
  if (totalParams > 0) requirements.total_params = totalParams;
  if (totalBytes > 0) requirements.total_bytes = totalBytes;
  return requirements;
}

export function sanitizeRepo(repo: string): string {
  return repo.replace(/[\\/]/g, '_');
}

async function pathSize(target: string): Promise<number> {
  const stat = await fs.stat(target);
  if (!stat.isDirectory()) return stat.size;
  let total = 0;
  for (const entry of await fs.readdir(target, { withFileTypes: true })) {
    if (entry.isFile()) total += (await fs.stat(path.join(target, entry.name))).size;
  }
  return total;
}

async function sha256File(target: string, signal: AbortSignal): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(target, { signal })) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

interface CachedPull {
  model: Model;
  revision: string;
}

export class HuggingFaceProvider implements ModelProvider {
  readonly client: HuggingFaceClient;
  private readonly downloadDir: string;
  private readonly cache = new Map<string, CachedPull>();

  constructor(options: HuggingFaceProviderOptions) {
    this.downloadDir = options.downloadDir;
    this.client =
      options.client ?? new HuggingFaceClient({ baseUrl: options.baseUrl, token: options.token });
  }

  async pull(request: PullRequest, options: PullOptions): Promise<Model> {
    if (!HF_SOURCES.has(request.source.toLowerCase())) throw unsupportedSource(request.source);
    const { repo } = request;
    const revision = request.tag || 'main';
    const { signal, progress } = options;
    const emit = (update: PullProgress): void => {
      progress?.push(update);
    };

    const cached = await this.reusablePull(repo, revision);
    if (cached) {
      emit({
        model_id: cached.id,
        status: 'completed',
        progress: 100,
        bytes_total: cached.size,
        bytes_done: cached.size,
        speed: 0,
      });
      return cached;
    }

    let info: HfModelInfo;
    try {
      info = await this.client.getModelInfo(repo, signal);
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      throw modelError('MODEL_PULL_FAILED', `get model info: ${errorMessage(error)}`, error);
    }

    const now = nowSeconds();
    const model: Model = {
      id: generateModelId(),
      name: info.id || repo,
      type: detectModelType(info.pipeline_tag ?? undefined, info.tags),
      format: 'safetensors',
      status: 'pulling',
      source: 'huggingface',
      path: '',
      size: 0,
      checksum: '',
      tags: [...info.tags],
      created_at: now,
      updated_at: now,
    };

    const { files, totalSize } = selectDownloadFiles(info.siblings);
    if (files.length === 0) {
      throw modelError('MODEL_PULL_FAILED', 'no downloadable model files found in repository');
    }

    const targetDir = path.join(this.downloadDir, sanitizeRepo(repo));
    const started = Date.now();
    let downloaded = 0;

    for (const file of files) {
      const destination = path.join(targetDir, path.basename(file.rfilename));
      const fileStart = downloaded;
      try {
        throwIfAborted(signal);
        await fs.mkdir(path.dirname(destination), { recursive: true, mode: 0o755 });
        emit(this.progressRecord(model.id, `downloading ${file.rfilename}`, downloaded, totalSize, started));
        const written = await this.client.downloadFile(repo, file.rfilename, revision, destination, {
          signal,
          mirror: request.mirror,
          onProgress: (fileBytes) => {
            emit(
              this.progressRecord(
                model.id,
                `downloading ${file.rfilename}`,
                fileStart + fileBytes,
                totalSize,
                started,
              ),
            );
          },
        });
        downloaded = fileStart + written;
      } catch (error) {
        model.status = 'error';
        const failure = signal.aborted ? abortError(signal) : error;
        emit({
          model_id: model.id,
          status: 'error',
          progress: totalSize > 0 ? Math.min(100, (downloaded / totalSize) * 100) : 0,
          bytes_total: totalSize,
          bytes_done: downloaded,
          speed: 0,
          error: errorMessage(failure),
        });
        logger.warn('download failed', { repo, file: file.rfilename, error: errorMessage(failure) });
        if (failure instanceof UnitError && (failure.code === 'CANCELLED' || failure.code === 'TIMEOUT')) {
          throw failure;
        }
        throw modelError(
          'MODEL_PULL_FAILED',
          `download file ${file.rfilename}: ${errorMessage(error)}`,
          error,
        );
      }
    }

    const first = files[0];
    model.format = (first && detectFormat(first.rfilename)) || 'safetensors';
    model.path = targetDir;
    model.size = downloaded;
    model.status = 'ready';
    model.updated_at = nowSeconds();
    if (info.safetensors && info.safetensors.total > 0) {
      model.checksum = `safetensors:${info.safetensors.total}`;
    }

    this.cache.set(repo, { model: cloneModel(model), revision });
    emit({
      model_id: model.id,
      status: 'completed',
      progress: 100,
      bytes_total: totalSize,
      bytes_done: downloaded,
      speed: 0,
    });
    logger.info('pull completed', { repo, revision, model_id: model.id, bytes: downloaded });
    return model;
  }

  async search(request: SearchRequest, signal: AbortSignal): Promise<ModelSearchResult[]> {
    const filters: Record<string, string> = {};
    if (request.type) filters.task = modelTypeToPipelineTag(request.type);
    let items: HfModelInfo[];
    try {
      items = await this.client.searchModels(
        { search: request.query, limit: request.limit, filters },
        signal,
      );
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      throw new UnitError('EXECUTION_FAILED', `search models: ${errorMessage(error)}`, {
        domain: MODEL_DOMAIN,
        cause: error,
      });
    }
    const results = items.map((item): ModelSearchResult => {
      const id = item.modelId || item.id;
      const summary = item.cardData?.description;
      return {
        id,
        name: id,
        type: detectModelType(item.pipeline_tag ?? undefined, item.tags),
        source: 'huggingface',
        description: typeof summary === 'string' ? summary : item.pipeline_tag ?? '',
        downloads: item.downloads,
      };
    });
    const typed = request.type ? results.filter((result) => result.type === request.type) : results;
    return request.limit > 0 ? typed.slice(0, request.limit) : typed;
  }

  async importLocal(target: string, autoDetect: boolean, signal: AbortSignal): Promise<Model> {
    throwIfAborted(signal);
    const model = await importLocalModel(target, autoDetect);
    this.cache.set(`local:${model.id}`, { model: cloneModel(model), revision: '' });
    return model;
  }

  async verify(modelId: string, checksum: string, signal: AbortSignal): Promise<VerificationResult> {
    const entry = this.findCached(modelId);
    if (!entry) return { valid: false, issues: [`model not found: ${modelId}`] };
    const { model } = entry;
    const issues: string[] = [];

    if (!model.path) {
      issues.push('model has no local path');
    } else {
      let exists = true;
      try {
        await fs.access(model.path);
      } catch {
        exists = false;
        issues.push(`model path does not exist: ${model.path}`);
      }
      const expected = checksum || model.checksum;
      if (exists && expected) {
        try {
          if (!(await this.checksumMatches(model.path, expected, signal))) {
            issues.push('checksum mismatch');
          }
        } catch (error) {
          if (error instanceof UnitError) throw error;
          if (signal.aborted) throw abortError(signal);
          issues.push(`checksum verification failed: ${errorMessage(error)}`);
        }
      }
    }

    if (model.source === 'huggingface') {
      try {
        await this.client.getModelInfo(model.name, signal);
      } catch {
        if (signal.aborted) throw abortError(signal);
        issues.push('repository not accessible on HuggingFace Hub');
      }
    }
    return { valid: issues.length === 0, issues };
  }

  async estimateResources(modelId: string, signal: AbortSignal): Promise<ModelRequirements> {
    const entry = this.findCached(modelId);
    if (!entry || entry.model.source !== 'huggingface') throw modelNotFound(modelId);
    try {
      return estimateRequirements(await this.client.getModelInfo(entry.model.name, signal));
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      throw new UnitError('EXECUTION_FAILED', `get model info: ${errorMessage(error)}`, {
        domain: MODEL_DOMAIN,
        cause: error,
      });
    }
  }

  private async checksumMatches(target: string, checksum: string, signal: AbortSignal): Promise<boolean> {
    const separator = checksum.indexOf(':');
    const kind = separator >= 0 ? checksum.slice(0, separator) : '';
    const value = separator >= 0 ? checksum.slice(separator + 1) : checksum;
    switch (kind) {
      case 'size':
        return (await pathSize(target)) === Number(value);
      case 'safetensors':
        return true;
      case 'sha256': {
        const stat = await fs.stat(target);
        if (stat.isDirectory()) {
          throw modelError('MODEL_VERIFY_FAILED', `sha256 checksum needs a file path, got directory: ${target}`);
        }
        return (await sha256File(target, signal)) === value.toLowerCase();
      }
      default:
        return true;
    }
  }

  private findCached(modelId: string): CachedPull | undefined {
    for (const entry of this.cache.values()) {
      if (entry.model.id === modelId) return entry;
    }
    return undefined;
  }

  /** A completed pull of the same revision whose files are still on disk. */
  private async reusablePull(repo: string, revision: string): Promise<Model | undefined> {
    const entry = this.cache.get(repo);
    if (!entry || entry.revision !== revision || entry.model.status !== 'ready') return undefined;
    try {
      await fs.access(entry.model.path);
    } catch {
      this.cache.delete(repo);
      return undefined;
    }
    return cloneModel(entry.model);
  }

  private progressRecord(
    modelId: string,
    status: string,
    done: number,
    total: number,
    started: number,
  ): PullProgress {
    const elapsed = (Date.now() - started) / 1000;
    return {
      model_id: modelId,
      status,
      progress: total > 0 ? Math.min(100, (done / total) * 100) : 0,
      bytes_total: total,
      bytes_done: done,
      speed: elapsed > 0 ? Math.round(done / elapsed) : 0,
    };
  }
}
