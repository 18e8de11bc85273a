import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { abortError } from '../../unit/context';
import { errorMessage } from '../../unit/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('huggingface-client');

/** Cancels an unread response body so the connection is released. */
async function discardBody(reader: { cancel(): Promise<void> } | undefined): Promise<void> {
  if (!reader) return;
  try {
    await reader.cancel();
  } catch (error) {
    logger.debug('response body cancel failed', { error: errorMessage(error) });
  }
}

export const DEFAULT_HF_BASE_URL = 'https://huggingface.co';

const LfsInfoSchema = z.object({
  sha256: z.string().default(''),
  size: z.number().default(0),
});

const SiblingSchema = z.object({
  rfilename: z.string(),
  size: z.number().optional(),
  lfs: LfsInfoSchema.nullish(),
});

export const HfModelInfoSchema = z.object({
  id: z.string().default(''),
  modelId: z.string().optional(),
  author: z.string().optional(),
  sha: z.string().optional(),
  pipeline_tag: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  downloads: z.number().default(0),
  likes: z.number().default(0),
  library_name: z.string().nullish(),
  siblings: z.array(SiblingSchema).default([]),
  cardData: z.record(z.string(), z.unknown()).nullish(),
  safetensors: z
    .object({
      total: z.number().default(0),
      parameters: z.record(z.string(), z.number()).optional(),
    })
    .nullish(),
});

export type HfSibling = z.infer<typeof SiblingSchema>;
export type HfModelInfo = z.infer<typeof HfModelInfoSchema>;

const SearchResponseSchema = z.union([
  z.array(HfModelInfoSchema),
  z.object({ items: z.array(HfModelInfoSchema).default([]) }).transform((value) => value.items),
]);

const ErrorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

export interface HuggingFaceClientOptions {
  baseUrl?: string;
  token?: string;
  fetch?: typeof fetch;
}

export interface SearchParams {
  search: string;
  limit?: number;
  offset?: number;
  filters?: Record<string, string>;
}

export interface DownloadOptions {
  signal: AbortSignal;
  /** Overrides the base URL for file downloads only. */
  mirror?: string;
  onProgress?: (downloaded: number, total: number) => void;
}

export class HuggingFaceError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'HuggingFaceError';
  }
}

function trimSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

function encodeRepo(repo: string): string {
  return repo
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

export class HuggingFaceClient {
  readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HuggingFaceClientOptions = {}) {
    this.baseUrl = trimSlash(options.baseUrl || DEFAULT_HF_BASE_URL);
    this.token = options.token || undefined;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getModelInfo(repo: string, signal: AbortSignal): Promise<HfModelInfo> {
    const body = await this.requestJson(`/api/models/${encodeRepo(repo)}`, signal);
    const parsed = HfModelInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new HuggingFaceError(`huggingface error: unexpected model info for ${repo}`);
    }
    return parsed.data;
  }

  async searchModels(params: SearchParams, signal: AbortSignal): Promise<HfModelInfo[]> {
    const query = new URLSearchParams();
    if (params.search) query.set('search', params.search);
    if (params.limit && params.limit > 0) query.set('limit', String(params.limit));
    if (params.offset && params.offset > 0) query.set('offset', String(params.offset));
    for (const [key, value] of Object.entries(params.filters ?? {})) {
      query.append('filter', `${key}:${value}`);
    }
    const body = await this.requestJson(`/api/models?${query.toString()}`, signal);
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new HuggingFaceError('huggingface error: unexpected search response');
    }
    return parsed.data;
  }

  resolveUrl(repo: string, revision: string, filename: string, mirror?: string): string {
    const base = mirror ? trimSlash(mirror) : this.baseUrl;
    const file = filename
      .split('/')
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    return `${base}/${encodeRepo(repo)}/resolve/${encodeURIComponent(revision)}/${file}`;
  }

  /**
   * Streams one repository file to `destination` and returns the bytes
   * written. Progress reports cumulative bytes for this file.
   */
  async downloadFile(
    repo: string,
    filename: string,
    revision: string,
    destination: string,
    options: DownloadOptions,
  ): Promise<number> {
    const { signal } = options;
    const response = await this.send(this.resolveUrl(repo, revision, filename, options.mirror), signal);
    const reader = response.body?.getReader();
    if (!response.ok) {
      await discardBody(reader);
      throw new HuggingFaceError(
        `huggingface error: download failed with status ${response.status}`,
        response.status,
      );
    }
    const total = Number(response.headers.get('content-length') ?? 0) || 0;
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(destination, 'w', 0o644);
    } catch (error) {
      await discardBody(reader);
      throw error;
    }
    let written = 0;
    try {
      if (reader) {
        for (;;) {
          const chunk = await reader.read();
          if (chunk.done) break;
          if (signal.aborted) throw abortError(signal);
          await handle.write(chunk.value);
          written += chunk.value.byteLength;
          options.onProgress?.(written, total);
        }
      }
    } catch (error) {
      await discardBody(reader);
      if (signal.aborted) throw abortError(signal);
      throw error;
    } finally {
      await handle.close();
    }
    return written;
  }

  private async send(url: string, signal: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = { 'user-agent': 'aima-control-plane' };
    if (this.token) headers.authorization = `Bearer ${this.token}`;
    try {
      return await this.fetchImpl(url, { headers, signal });
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      throw new HuggingFaceError(`huggingface error: request failed: ${errorMessage(error)}`);
    }
  }

  private async requestJson(path: string, signal: AbortSignal): Promise<unknown> {
    const response = await this.send(`${this.baseUrl}${path}`, signal);
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      throw error;
    }
    if (response.status >= 400) {
      let detail: string | undefined;
      try {
        const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
        if (parsed.success) detail = parsed.data.error || parsed.data.message;
      } catch {
        detail = undefined;
      }
      throw new HuggingFaceError(
        detail
          ? `huggingface error: ${detail}`
          : `huggingface error: status ${response.status}, body: ${text}`,
        response.status,
      );
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new HuggingFaceError(`huggingface error: invalid json: ${errorMessage(error)}`);
    }
  }
}
