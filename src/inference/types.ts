import { z } from 'zod';

export const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
});

export type Message = z.infer<typeof MessageSchema>;

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface SamplingOptions {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  top_k?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  stop?: string[];
}

export interface ChatResponse {
  content: string;
  finish_reason: string;
  usage: Usage;
  model: string;
  id: string;
  created?: number;
}

export interface CompletionResponse {
  text: string;
  finish_reason: string;
  usage: Usage;
}

export interface EmbeddingResponse {
  embeddings: number[][];
  usage: Usage;
}

export interface InferenceModel {
  id: string;
  name: string;
  type: string;
  provider: string;
  description?: string;
  max_tokens?: number;
  modalities?: string[];
}

/** Runs inference against whatever engine serves the named model. */
export interface InferenceProvider {
  chat(model: string, messages: Message[], options: SamplingOptions, signal: AbortSignal): Promise<ChatResponse>;
  complete(model: string, prompt: string, options: SamplingOptions, signal: AbortSignal): Promise<CompletionResponse>;
  embed(model: string, input: string[], signal: AbortSignal): Promise<EmbeddingResponse>;
  listModels(type: string | undefined, signal: AbortSignal): Promise<InferenceModel[]>;
}

export function emptyUsage(): Usage {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
}
