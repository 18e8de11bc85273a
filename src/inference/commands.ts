import { z } from 'zod';
import { defineCommand, requireCollaborator } from '../unit/define';
import { errorMessage, wrapError } from '../unit/errors';
import { type EventPublisher, publishSafely } from '../unit/events';
import { s, type Schema } from '../unit/schema';
import type { Command, UnitContext } from '../unit/types';
import { INFERENCE_DOMAIN, modelNotSpecified } from './errors';
import { requestCompletedEvent, requestFailedEvent, requestStartedEvent } from './events';
import {
  type ChatResponse,
  type CompletionResponse,
  type EmbeddingResponse,
  type InferenceProvider,
  MessageSchema,
  type SamplingOptions,
} from './types';

export interface InferenceUnitDeps {
  provider?: InferenceProvider;
  events?: EventPublisher;
}

const usageSchema = s.object({
  prompt_tokens: s.number(),
  completion_tokens: s.number(),
  total_tokens: s.number(),
});

const samplingProperties: Record<string, Schema> = {
  temperature: s.number({ min: 0, max: 2 }),
  max_tokens: s.number({ min: 1 }),
  top_p: s.number({ min: 0, max: 1 }),
  top_k: s.number({ min: 1 }),
  frequency_penalty: s.number({ min: -2, max: 2 }),
  presence_penalty: s.number({ min: -2, max: 2 }),
  stop: s.array(s.string()),
};

const SamplingFields = {
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().min(1).optional(),
  top_p: z.number().min(0).max(1).optional(),
  top_k: z.number().int().min(1).optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  stop: z.array(z.string()).optional(),
};

// model stays optional here so a missing one surfaces as MODEL_NOT_SPECIFIED
const modelField = z.string().trim().default('');

function samplingOptions(input: SamplingOptions): SamplingOptions {
  const options: SamplingOptions = {};
  if (input.temperature !== undefined) options.temperature = input.temperature;
  if (input.max_tokens !== undefined) options.max_tokens = input.max_tokens;
  if (input.top_p !== undefined) options.top_p = input.top_p;
  if (input.top_k !== undefined) options.top_k = input.top_k;
  if (input.frequency_penalty !== undefined) options.frequency_penalty = input.frequency_penalty;
  if (input.presence_penalty !== undefined) options.presence_penalty = input.presence_penalty;
  if (input.stop && input.stop.length > 0) options.stop = [...input.stop];
  return options;
}

/** Publishes request lifecycle events; provider failures without a code become INFERENCE_FAILED. */
async function track<T extends { usage: { total_tokens: number } }>(
  deps: InferenceUnitDeps,
  ctx: UnitContext,
  model: string,
  kind: string,
  run: () => Promise<T>,
): Promise<T> {
  const started = Date.now();
  publishSafely(deps.events, requestStartedEvent(ctx.requestId, model, kind));
  try {
    const result = await run();
    publishSafely(deps.events, requestCompletedEvent(ctx.requestId, Date.now() - started, result.usage.total_tokens));
    return result;
  } catch (error) {
    publishSafely(deps.events, requestFailedEvent(ctx.requestId, errorMessage(error)));
    throw wrapError(error, `${kind} failed`, 'INFERENCE_FAILED', INFERENCE_DOMAIN);
  }
}

/* inference.chat */

const ChatInput = z.object({
  model: modelField,
  messages: z.array(MessageSchema, { required_error: 'messages are required' }).min(1, 'messages are required'),
  ...SamplingFields,
});

export function createChatCommand(deps: InferenceUnitDeps): Command<z.infer<typeof ChatInput>, ChatResponse> {
  return defineCommand({
    name: 'inference.chat',
    domain: INFERENCE_DOMAIN,
    description: 'Run a chat completion against a served model',
    input: ChatInput,
    inputSchema: s.object(
      {
        model: s.string({ description: 'Model name as the serving engine knows it' }),
        messages: s.array(
          s.object(
            {
              role: s.string({ enum: ['system', 'user', 'assistant', 'tool'] }),
              content: s.string(),
            },
            ['role', 'content'],
          ),
        ),
        ...samplingProperties,
      },
      ['messages'],
    ),
    outputSchema: s.object(
      {
        content: s.string(),
        finish_reason: s.string(),
        usage: usageSchema,
        model: s.string(),
        id: s.string(),
      },
      ['content', 'finish_reason', 'usage'],
    ),
    examples: [
      {
        input: { model: 'llama3', messages: [{ role: 'user', content: 'Hello' }] },
        output: {
          content: 'Hi there.',
          finish_reason: 'stop',
          usage: { prompt_tokens: 5, completion_tokens: 3, total_tokens: 8 },
          model: 'llama3',
          id: 'chatcmpl-1a2b3c4d',
        },
      },
    ],
    async execute(ctx, input) {
      const provider = requireCollaborator(deps.provider, 'inference provider', INFERENCE_DOMAIN);
      if (!input.model) throw modelNotSpecified();
      return track(deps, ctx, input.model, 'chat', () =>
        provider.chat(input.model, input.messages, samplingOptions(input), ctx.signal),
      );
    },
  });
}

/* inference.complete */

const CompleteInput = z.object({
  model: modelField,
  prompt: z.string({ required_error: 'prompt is required' }).min(1, 'prompt is required'),
  ...SamplingFields,
});

export function createCompleteCommand(deps: InferenceUnitDeps): Command<z.infer<typeof CompleteInput>, CompletionResponse> {
  return defineCommand({
    name: 'inference.complete',
    domain: INFERENCE_DOMAIN,
    description: 'Run a raw text completion',
    input: CompleteInput,
    inputSchema: s.object(
      {
        model: s.string(),
        prompt: s.string({ min_length: 1 }),
        ...samplingProperties,
      },
      ['prompt'],
    ),
    outputSchema: s.object(
      { text: s.string(), finish_reason: s.string(), usage: usageSchema },
      ['text', 'finish_reason', 'usage'],
    ),
    examples: [
      {
        input: { model: 'llama3', prompt: 'Once upon a time' },
        output: {
          text: ' there was a model.',
          finish_reason: 'stop',
          usage: { prompt_tokens: 4, completion_tokens: 5, total_tokens: 9 },
        },
      },
    ],
    async execute(ctx, input) {
      const provider = requireCollaborator(deps.provider, 'inference provider', INFERENCE_DOMAIN);
      if (!input.model) throw modelNotSpecified();
      return track(deps, ctx, input.model, 'complete', () =>
        provider.complete(input.model, input.prompt, samplingOptions(input), ctx.signal),
      );
    },
  });
}

/* inference.embed */

const EmbedInput = z.object({
  model: modelField,
  input: z
    .union([z.string(), z.array(z.string())], {
      errorMap: () => ({ message: 'input must be string or array' }),
    })
    .transform((value) => (typeof value === 'string' ? [value] : value))
    .refine((value) => value.length > 0, 'input is required'),
});

export function createEmbedCommand(deps: InferenceUnitDeps): Command<z.infer<typeof EmbedInput>, EmbeddingResponse> {
  return defineCommand({
    name: 'inference.embed',
    domain: INFERENCE_DOMAIN,
    description: 'Compute embeddings for one or more texts; input is a string or a list of strings',
    input: EmbedInput,
    // input has two accepted shapes, so only its presence is declared here
    inputSchema: s.object({ model: s.string() }, ['input']),
    outputSchema: s.object(
      { embeddings: s.array(s.array(s.number())), usage: usageSchema },
      ['embeddings', 'usage'],
    ),
    examples: [
      {
        input: { model: 'nomic-embed-text', input: ['hello'] },
        output: { embeddings: [[0.1, 0.2]], usage: { prompt_tokens: 1, completion_tokens: 0, total_tokens: 1 } },
      },
    ],
    async execute(ctx, input) {
      const provider = requireCollaborator(deps.provider, 'inference provider', INFERENCE_DOMAIN);
      if (!input.model) throw modelNotSpecified();
      return track(deps, ctx, input.model, 'embed', () => provider.embed(input.model, input.input, ctx.signal));
    },
  });
}

export function createInferenceCommands(deps: InferenceUnitDeps): Command[] {
  return [createChatCommand(deps), createCompleteCommand(deps), createEmbedCommand(deps)];
}
