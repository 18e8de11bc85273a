import { z } from 'zod';

export const MODEL_TYPES = [
  'llm',
  'vlm',
  'asr',
  'tts',
  'embedding',
  'diffusion',
  'video_gen',
  'detection',
  'rerank',
] as const;
export type ModelType = (typeof MODEL_TYPES)[number];

export const MODEL_FORMATS = ['gguf', 'safetensors', 'onnx', 'tensorrt', 'pytorch'] as const;
export type ModelFormat = (typeof MODEL_FORMATS)[number];

export const MODEL_STATUSES = ['pending', 'pulling', 'verifying', 'ready', 'error'] as const;
export type ModelStatus = (typeof MODEL_STATUSES)[number];

export const ModelTypeSchema = z.enum(MODEL_TYPES);
export const ModelFormatSchema = z.enum(MODEL_FORMATS);
export const ModelStatusSchema = z.enum(MODEL_STATUSES);

export interface ModelRequirements {
  memory_min?: number;
  memory_recommended?: number;
  gpu_type?: string;
  gpu_memory?: number;
  /** Parameter count when the source publishes one. */
  total_params?: number;
  /** Bytes of all weight files in the repository. */
  total_bytes?: number;
}

export const ModelRequirementsSchema = z.object({
  memory_min: z.number().nonnegative().optional(),
  memory_recommended: z.number().nonnegative().optional(),
  gpu_type: z.string().optional(),
  gpu_memory: z.number().nonnegative().optional(),
  total_params: z.number().nonnegative().optional(),
  total_bytes: z.number().nonnegative().optional(),
});

export interface Model {
  id: string;
  name: string;
  type: ModelType;
  format: ModelFormat;
  status: ModelStatus;
  source: string;
  path: string;
  size: number;
  checksum: string;
  requirements?: ModelRequirements;
  tags: string[];
  created_at: number;
  updated_at: number;
}

export const ModelSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  type: ModelTypeSchema,
  format: ModelFormatSchema,
  status: ModelStatusSchema,
  source: z.string().default(''),
  path: z.string().default(''),
  size: z.number().default(0),
  checksum: z.string().default(''),
  requirements: ModelRequirementsSchema.optional(),
  tags: z.array(z.string()).default([]),
  created_at: z.number(),
  updated_at: z.number(),
});

export interface ModelFilter {
  type?: ModelType;
  status?: ModelStatus;
  format?: ModelFormat;
  limit?: number;
  offset?: number;
}

export interface ModelPage {
  items: Model[];
  total: number;
}

export interface ModelSearchResult {
  id: string;
  name: string;
  type: ModelType;
  source: string;
  description: string;
  downloads: number;
}

export interface PullProgress {
  model_id: string;
  status: string;
  progress: number;
  bytes_total: number;
  bytes_done: number;
  speed: number;
  error?: string;
}

export function isTerminalProgress(progress: PullProgress): boolean {
  return progress.status === 'completed' || progress.status === 'error';
}

export interface VerificationResult {
  valid: boolean;
  issues: string[];
}

export interface PullRequest {
  source: string;
  repo: string;
  tag: string;
  mirror?: string;
}

export interface PullOptions {
  signal: AbortSignal;
  progress?: { push(progress: PullProgress): unknown };
}

export interface SearchRequest {
  query: string;
  source?: string;
  type?: ModelType;
  limit: number;
}

export interface ModelStore {
  create(model: Model): Promise<void>;
  get(id: string): Promise<Model>;
  list(filter?: ModelFilter): Promise<ModelPage>;
  update(model: Model): Promise<void>;
  delete(id: string): Promise<void>;
}

/** Fetches, imports and inspects model artifacts from one or more sources. */
export interface ModelProvider {
  pull(request: PullRequest, options: PullOptions): Promise<Model>;
  search(request: SearchRequest, signal: AbortSignal): Promise<ModelSearchResult[]>;
  importLocal(path: string, autoDetect: boolean, signal: AbortSignal): Promise<Model>;
  verify(modelId: string, checksum: string, signal: AbortSignal): Promise<VerificationResult>;
  estimateResources(modelId: string, signal: AbortSignal): Promise<ModelRequirements>;
}

export function cloneModel(model: Model): Model {
  return {
    ...model,
    tags: [...model.tags],
    requirements: model.requirements ? { ...model.requirements } : undefined,
  };
}
