import { z } from 'zod';
import type {
  ChatResponse,
  CompletionResponse,
  EmbeddingResponse,
  InferenceModel,
  InferenceProvider,
  Message,
  SamplingOptions,
} from '../../inference/types';
import { modelError, modelNotFound, unsupportedSource } from '../../model/errors';
import { importLocalModel } from '../../model/local-import';
import {
  cloneModel,
  type Model,
  type ModelProvider,
  type ModelRequirements,
  type ModelSearchResult,
  ModelTypeSchema,
  type PullOptions,
  type PullProgress,
  type PullRequest,
  type SearchRequest,
  type VerificationResult,
} from '../../model/types';
import { abortError, throwIfAborted } from '../../unit/context';
import { errorMessage, isUnitError, wrapError } from '../../unit/errors';
import { generateModelId, nowSeconds, randomHex } from '../../utils/ids';
import { createLogger } from '../../utils/logger';
import library from './library.json';
import { OllamaClient, type OllamaClientOptions, type PullUpdate } from './client';

const logger = createLogger('ollama');

const GIB = 1024 * 1024 * 1024;
const OLLAMA_SOURCES = new Set(['', 'ollama']);
const FULL_PRECISION = new Set(['F16', 'F32']);

const LibraryEntrySchema = z.object({
  name: z.string(),
  description: z.string(),
  type: ModelTypeSchema,
  downloads: z.number(),
});

export type LibraryEntry = z.infer<typeof LibraryEntrySchema>;

export const OLLAMA_LIBRARY: readonly LibraryEntry[] = z.array(LibraryEntrySchema).parse(library);

export interface OllamaProviderOptions extends OllamaClientOptions {
  client?: OllamaClient;
}

/** `repo` or `repo:tag`; an empty or `latest` tag resolves to `:latest`. */
export function ollamaModelName(repo: string, tag: string): string {
  if (tag && tag !== 'latest') return `${repo}:${tag}`;
  return repo.includes(':') ? repo : `${repo}:latest`;
}

/** Parses sizes such as `8B`, `70.6B` or `350M` into billions of parameters. */
export function parseParameterSize(size: string): number {
  const text = size.trim().toLowerCase();
  if (!text) return 0;
  const millions = text.endsWith('m');
  const value = Number.parseFloat(text.replace(/[bm]$/, ''));
  if (!Number.isFinite(value)) return 0;
  return millions ? value / 1000 : value;
}

export function estimateFromDetails(parameterSize: string, quantization: string): ModelRequirements {
  const billions = parseParameterSize(parameterSize);
  let memoryMin: number;
  let memoryRecommended: number;
  if (billions >= 70) {
    memoryMin = 40 * GIB;
    memoryRecommended = 80 * GIB;
  } else if (billions >= 30) {
    memoryMin = 20 * GIB;
    memoryRecommended = 48 * GIB;
  } else if (billions >= 13) {
    memoryMin = 8 * GIB;
    memoryRecommended = 16 * GIB;
  } else if (billions >= 7) {
    memoryMin = 4 * GIB;
    memoryRecommended = 8 * GIB;
  } else {
    memoryMin = 2 * GIB;
    memoryRecommended = 4 * GIB;
  }
  if (quantization && !FULL_PRECISION.has(quantization.toUpperCase())) {
    memoryMin = Math.floor(memoryMin / 3);
    memoryRecommended = Math.floor(memoryRecommended / 3);
  }
  const requirements: ModelRequirements = {
    memory_min: memoryMin,
    memory_recommended: memoryRecommended,
    gpu_memory: memoryMin,
  };
  if (billions > 0) requirements.total_params = Math.round(billions * 1e9);
  return requirements;
}

function inferenceType(name: string): string {
  if (name.includes('embed')) return 'embedding';
  if (name.includes('whisper')) return 'asr';
  if (name.includes('llava')) return 'vlm';
  return 'llm';
}

function ollamaOptions(options: SamplingOptions): Record<string, unknown> {
  const mapped: Record<string, unknown> = {};
  if (options.temperature !== undefined) mapped.temperature = options.temperature;
  if (options.max_tokens !== undefined) mapped.num_predict = options.max_tokens;
  if (options.top_p !== undefined) mapped.top_p = options.top_p;
  if (options.top_k !== undefined) mapped.top_k = options.top_k;
  if (options.frequency_penalty !== undefined) mapped.frequency_penalty = options.frequency_penalty;
  if (options.presence_penalty !== undefined) mapped.presence_penalty = options.presence_penalty;
  if (options.stop && options.stop.length > 0) mapped.stop = options.stop;
  return mapped;
}

/**
 * Model source and inference backend for a local Ollama daemon. Pulled
 * models are remembered by Ollama name so later pulls reuse the same id.
 */
export class OllamaProvider implements ModelProvider, InferenceProvider {
  readonly client: OllamaClient;
  private readonly cache = new Map<string, Model>();

  constructor(options: OllamaProviderOptions = {}) {
    this.client = options.client ?? new OllamaClient(options);
  }

  async pull(request: PullRequest, options: PullOptions): Promise<Model> {
    if (!OLLAMA_SOURCES.has(request.source)) throw unsupportedSource(request.source);
    const { signal } = options;
    throwIfAborted(signal);

    const name = ollamaModelName(request.repo, request.tag);
    const now = nowSeconds();
    const previous = this.cache.get(name);
    const model: Model = {
      id: previous?.id ?? generateModelId(),
      name,
      type: 'llm',
      format: 'gguf',
      status: 'pulling',
      source: 'ollama',
      path: `ollama://${name}`,
      size: 0,
      checksum: '',
      tags: [],
      created_at: previous?.created_at ?? now,
      updated_at: now,
    };
    const report = (progress: Omit<PullProgress, 'model_id' | 'speed'>): void => {
      options.progress?.push({ model_id: model.id, speed: 0, ...progress });
    };

    let finished = false;
    const onUpdate = (update: PullUpdate): void => {
      const percent = update.total > 0 ? (update.completed / update.total) * 100 : 0;
      if (update.status === 'success') {
        finished = true;
        model.status = 'ready';
        model.size = update.total;
        model.checksum = update.digest ?? '';
        return;
      }
      if (update.total > 0 && update.digest) {
        model.size = update.total;
        model.checksum = update.digest;
      }
      report({ status: update.status, progress: percent, bytes_total: update.total, bytes_done: update.completed });
    };

    logger.info('pull started', { name });
    try {
      await this.client.pull(name, signal, onUpdate);
      if (!finished) throw new Error('pull stream ended before success');
    } catch (error) {
      model.status = 'error';
      report({ status: 'error', progress: 0, bytes_total: 0, bytes_done: 0, error: errorMessage(error) });
      logger.warn('pull failed', { name, error: errorMessage(error) });
      if (signal.aborted) throw abortError(signal);
      if (isUnitError(error)) throw error;
      throw modelError('MODEL_PULL_FAILED', `pull model ${name}: ${errorMessage(error)}`, error);
    }

    model.updated_at = nowSeconds();
    report({ status: 'completed', progress: 100, bytes_total: model.size, bytes_done: model.size });
    this.cache.set(name, cloneModel(model));
    logger.info('pull completed', { name, id: model.id });
    return model;
  }

  async search(request: SearchRequest, _signal: AbortSignal): Promise<ModelSearchResult[]> {
    const query = request.query.toLowerCase();
    const results: ModelSearchResult[] = [];
    for (const entry of OLLAMA_LIBRARY) {
      if (query && !entry.name.toLowerCase().includes(query) && !entry.description.toLowerCase().includes(query)) {
        continue;
      }
      if (request.type && entry.type !== request.type) continue;
      results.push({
        id: entry.name,
        name: entry.name,
        type: entry.type,
        source: 'ollama',
        description: entry.description,
        downloads: entry.downloads,
      });
      if (request.limit > 0 && results.length >= request.limit) break;
    }
    return results;
  }

  async importLocal(target: string, autoDetect: boolean, signal: AbortSignal): Promise<Model> {
    throwIfAborted(signal);
    const model = await importLocalModel(target, autoDetect);
    this.cache.set(model.name, cloneModel(model));
    return model;
  }

  async verify(modelId: string, _checksum: string, signal: AbortSignal): Promise<VerificationResult> {
    const name = this.nameFor(modelId);
    try {
      await this.client.show(name, signal);
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      return { valid: false, issues: [`model not found: ${name}`] };
    }
    return { valid: true, issues: [] };
  }

  async estimateResources(modelId: string, signal: AbortSignal): Promise<ModelRequirements> {
    const name = this.nameFor(modelId);
    let details: { parameter_size: string; quantization_level: string };
    try {
      details = (await this.client.show(name, signal)).details;
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      if (modelId.startsWith('model-') && name === modelId) throw modelNotFound(modelId);
      throw wrapError(error, 'get model info', 'EXECUTION_FAILED');
    }
    return estimateFromDetails(details.parameter_size, details.quantization_level);
  }

  async chat(model: string, messages: Message[], options: SamplingOptions, signal: AbortSignal): Promise<ChatResponse> {
    const response = await this.client.chat(
      model,
      messages.map((message) => ({ role: message.role, content: message.content })),
      ollamaOptions(options),
      signal,
    );
    return {
      content: response.message?.content ?? '',
      finish_reason: 'stop',
      usage: {
        prompt_tokens: response.prompt_eval_count,
        completion_tokens: response.eval_count,
        total_tokens: response.prompt_eval_count + response.eval_count,
      },
      model: response.model || model,
      id: `chatcmpl-${randomHex(4)}`,
      created: nowSeconds(),
    };
  }

  async complete(
    model: string,
    prompt: string,
    options: SamplingOptions,
    signal: AbortSignal,
  ): Promise<CompletionResponse> {
    const response = await this.client.generate(model, prompt, ollamaOptions(options), signal);
    return {
      text: response.response,
      finish_reason: 'stop',
      usage: {
        prompt_tokens: response.prompt_eval_count,
        completion_tokens: response.eval_count,
        total_tokens: response.prompt_eval_count + response.eval_count,
      },
    };
  }

  async embed(model: string, input: string[], signal: AbortSignal): Promise<EmbeddingResponse> {
    const embeddings: number[][] = [];
    let tokens = 0;
    for (const [index, text] of input.entries()) {
      try {
        embeddings.push(await this.client.embedding(model, text, signal));
      } catch (error) {
        throw wrapError(error, `embedding for input ${index}`, 'INFERENCE_FAILED');
      }
      // rough estimate; the embeddings endpoint reports no token counts
      tokens += Math.floor(text.length / 4);
    }
    return {
      embeddings,
      usage: { prompt_tokens: tokens, completion_tokens: 0, total_tokens: tokens },
    };
  }

  async listModels(type: string | undefined, signal: AbortSignal): Promise<InferenceModel[]> {
    const models = await this.client.listModels(signal);
    return models
      .map((model) => ({
        id: model.name,
        name: model.name,
        type: inferenceType(model.name),
        provider: 'ollama',
        max_tokens: 8192,
        modalities: ['text'],
      }))
      .filter((model) => !type || model.type === type);
  }

  private nameFor(modelId: string): string {
    if (!modelId.startsWith('model-')) return modelId;
    for (const [name, model] of this.cache) {
      if (model.id === modelId) return name;
    }
    return modelId;
  }
}
