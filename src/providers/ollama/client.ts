import { z } from 'zod';
import { abortError } from '../../unit/context';
import { errorMessage } from '../../unit/errors';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

export const PullUpdateSchema = z.object({
  status: z.string().default(''),
  digest: z.string().optional(),
  total: z.number().default(0),
  completed: z.number().default(0),
  error: z.string().optional(),
});

export type PullUpdate = z.infer<typeof PullUpdateSchema>;

const DetailsSchema = z
  .object({
    format: z.string().default(''),
    family: z.string().default(''),
    parameter_size: z.string().default(''),
    quantization_level: z.string().default(''),
  })
  .default({});

export const ShowResponseSchema = z.object({
  license: z.string().optional(),
  modelfile: z.string().optional(),
  parameters: z.string().optional(),
  template: z.string().optional(),
  details: DetailsSchema,
});

export type ShowResponse = z.infer<typeof ShowResponseSchema>;

const TagsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().default(0),
        digest: z.string().default(''),
        details: DetailsSchema,
      }),
    )
    .default([]),
});

export type LocalModel = z.infer<typeof TagsResponseSchema>['models'][number];

const ChatResponseSchema = z.object({
  model: z.string().default(''),
  message: z.object({ role: z.string(), content: z.string() }).nullish(),
  done: z.boolean().default(true),
  prompt_eval_count: z.number().default(0),
  eval_count: z.number().default(0),
});

export type OllamaChatResponse = z.infer<typeof ChatResponseSchema>;

const GenerateResponseSchema = z.object({
  model: z.string().default(''),
  response: z.string().default(''),
  done: z.boolean().default(true),
  prompt_eval_count: z.number().default(0),
  eval_count: z.number().default(0),
});

export type OllamaGenerateResponse = z.infer<typeof GenerateResponseSchema>;

const EmbeddingResponseSchema = z.object({ embedding: z.array(z.number()).default([]) });

const ErrorBodySchema = z.object({ error: z.string() });

export interface OllamaMessage {
  role: string;
  content: string;
}

export class OllamaError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'OllamaError';
  }
}

export interface OllamaClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new OllamaError(`ollama error: unexpected ${what} response`);
  return parsed.data;
}

function readErrorField(text: string): string | undefined {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = ErrorBodySchema.safeParse(value);
  return parsed.success && parsed.data.error ? parsed.data.error : undefined;
}

function errorFromBody(status: number, text: string): OllamaError {
  const detail = readErrorField(text);
  return new OllamaError(
    detail ? `ollama error: ${detail}` : `ollama error: status ${status}, body: ${text}`,
    status,
  );
}

export class OllamaClient {
  readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl || DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Streams `/api/pull` and hands every NDJSON line to `onUpdate`. */
  async pull(name: string, signal: AbortSignal, onUpdate: (update: PullUpdate) => void): Promise<void> {
    const response = await this.post('/api/pull', { name, stream: true }, signal);
    if (response.status >= 400) {
      throw errorFromBody(response.status, await this.readText(response, signal));
    }
    if (!response.body) return;

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffered = '';
    const emit = (line: string): void => {
      const trimmed = line.trim();
      if (!trimmed) return;
      let value: unknown;
      try {
        value = JSON.parse(trimmed);
      } catch (error) {
        throw new OllamaError(`ollama error: decode line: ${errorMessage(error)}`);
      }
      const update = parseWith(PullUpdateSchema, value, 'pull');
      if (update.error) throw new OllamaError(`ollama error: ${update.error}`);
      onUpdate(update);
    };
    try {
      for (;;) {
        const chunk = await reader.read();
        if (chunk.done) break;
        buffered += decoder.decode(chunk.value, { stream: true });
        let newline = buffered.indexOf('\n');
        while (newline >= 0) {
          emit(buffered.slice(0, newline));
          buffered = buffered.slice(newline + 1);
          newline = buffered.indexOf('\n');
        }
      }
      emit(buffered + decoder.decode());
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      throw error;
    } finally {
      reader.releaseLock();
    }
  }

  async show(name: string, signal: AbortSignal): Promise<ShowResponse> {
    return parseWith(ShowResponseSchema, await this.postJson('/api/show', { name }, signal), 'show');
  }

  async listModels(signal: AbortSignal): Promise<LocalModel[]> {
    return parseWith(TagsResponseSchema, await this.getJson('/api/tags', signal), 'tags').models;
  }

  async chat(
    model: string,
    messages: OllamaMessage[],
    options: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<OllamaChatResponse> {
    const body = { model, messages, stream: false, options };
    return parseWith(ChatResponseSchema, await this.postJson('/api/chat', body, signal), 'chat');
  }

  async generate(
    model: string,
    prompt: string,
    options: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<OllamaGenerateResponse> {
    const body = { model, prompt, stream: false, options };
    return parseWith(GenerateResponseSchema, await this.postJson('/api/generate', body, signal), 'generate');
  }

  async embedding(model: string, prompt: string, signal: AbortSignal): Promise<number[]> {
    const body = await this.postJson('/api/embeddings', { model, prompt }, signal);
    return parseWith(EmbeddingResponseSchema, body, 'embeddings').embedding;
  }

  private async post(path: string, body: unknown, signal: AbortSignal): Promise<Response> {
    return this.send(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
  }

  private async send(url: string, init: RequestInit & { signal: AbortSignal }): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      if (init.signal.aborted) throw abortError(init.signal);
      throw new OllamaError(`ollama error: request failed: ${errorMessage(error)}`);
    }
  }

  private async readText(response: Response, signal: AbortSignal): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      if (signal.aborted) throw abortError(signal);
      throw error;
    }
  }

  private async decode(response: Response, signal: AbortSignal): Promise<unknown> {
    const text = await this.readText(response, signal);
    if (response.status >= 400) throw errorFromBody(response.status, text);
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new OllamaError(`ollama error: invalid json: ${errorMessage(error)}`);
    }
  }

  private async postJson(path: string, body: unknown, signal: AbortSignal): Promise<unknown> {
    return this.decode(await this.post(path, body, signal), signal);
  }

  private async getJson(path: string, signal: AbortSignal): Promise<unknown> {
    return this.decode(await this.send(`${this.baseUrl}${path}`, { method: 'GET', signal }), signal);
  }
}
