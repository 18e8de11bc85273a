import { z } from 'zod';
import { defineQuery, requireCollaborator } from '../unit/define';
import { wrapError } from '../unit/errors';
import { s } from '../unit/schema';
import type { Query } from '../unit/types';
import type { InferenceUnitDeps } from './commands';
import { INFERENCE_DOMAIN } from './errors';
import type { InferenceModel } from './types';

const ModelsInput = z.object({ type: z.string().trim().optional() });

export function createModelsQuery(
  deps: InferenceUnitDeps,
): Query<z.infer<typeof ModelsInput>, { models: InferenceModel[] }> {
  return defineQuery({
    name: 'inference.models',
    domain: INFERENCE_DOMAIN,
    description: 'List models the inference provider can serve',
    input: ModelsInput,
    inputSchema: s.object({ type: s.string({ description: 'llm, embedding, asr, ...' }) }),
    outputSchema: s.object(
      {
        models: s.array(
          s.object(
            {
              id: s.string(),
              name: s.string(),
              type: s.string(),
              provider: s.string(),
              max_tokens: s.number(),
            },
            ['id', 'name', 'type'],
          ),
        ),
      },
      ['models'],
    ),
    examples: [
      {
        input: { type: 'llm' },
        output: { models: [{ id: 'llama3:latest', name: 'llama3:latest', type: 'llm', provider: 'ollama' }] },
      },
    ],
    async execute(ctx, input) {
      const provider = requireCollaborator(deps.provider, 'inference provider', INFERENCE_DOMAIN);
      try {
        return { models: await provider.listModels(input.type || undefined, ctx.signal) };
      } catch (error) {
        throw wrapError(error, 'list models', 'INFERENCE_FAILED', INFERENCE_DOMAIN);
      }
    },
  });
}

export function createInferenceQueries(deps: InferenceUnitDeps): Query[] {
  return [createModelsQuery(deps)];
}
