import { z } from 'zod';
import { requireCollaborator, decodeInput, defineCommand } from '../unit/define';
import { rootCode, wrapError } from '../unit/errors';
import { type EventPublisher, publishSafely } from '../unit/events';
import { s } from '../unit/schema';
import type { Command, UnitContext, UnitExample } from '../unit/types';
import { generateModelId, nowSeconds } from '../utils/ids';
import { createLogger } from '../utils/logger';
import { ProgressChannel } from '../utils/progress-channel';
import { MODEL_DOMAIN, pullInProgress } from './errors';
import {
  modelCreatedEvent,
  modelDeletedEvent,
  modelVerifiedEvent,
  pullProgressEvent,
} from './events';
import {
  isTerminalProgress,
  MODEL_FORMATS,
  MODEL_STATUSES,
  MODEL_TYPES,
  type Model,
  ModelFormatSchema,
  type ModelProvider,
  type ModelStore,
  ModelTypeSchema,
  type PullProgress,
} from './types';

const logger = createLogger('model');

export interface ModelUnitDeps {
  store?: ModelStore;
  provider?: ModelProvider;
  events?: EventPublisher;
  /** Source used when a pull names none. */
  defaultSource?: string;
}

const requiredText = (field: string) => z.string({ required_error: `${field} is required` }).trim().min(1, `${field} is required`);

async function upsertModel(store: ModelStore, model: Model): Promise<'created' | 'updated'> {
  try {
    await store.get(model.id);
  } catch (error) {
    if (rootCode(error) !== 'MODEL_NOT_FOUND') throw error;
    await store.create(model);
    return 'created';
  }
  await store.update(model);
  return 'updated';
}

/* model.create */

const CreateInput = z.object({
  name: requiredText('name'),
  type: ModelTypeSchema.default('llm'),
  format: ModelFormatSchema.default('gguf'),
  source: z.string().default(''),
  path: z.string().default(''),
  size: z.number().int().nonnegative().default(0),
  tags: z.array(z.string()).default([]),
});

export function createModelCreateCommand(deps: ModelUnitDeps): Command<z.infer<typeof CreateInput>, { model_id: string }> {
  return defineCommand({
    name: 'model.create',
    domain: MODEL_DOMAIN,
    description: 'Register a model record; the artifact is not fetched',
    input: CreateInput,
    inputSchema: s.object(
      {
        name: s.string({ description: 'Display name', min_length: 1 }),
        type: s.string({ enum: MODEL_TYPES, default: 'llm' }),
        format: s.string({ enum: MODEL_FORMATS, default: 'gguf' }),
        source: s.string(),
        path: s.string(),
        size: s.number({ min: 0 }),
        tags: s.array(s.string()),
      },
      ['name'],
    ),
    outputSchema: s.object({ model_id: s.string() }, ['model_id']),
    examples: [
      {
        description: 'Register a GGUF model by name',
        input: { name: 'llama3-8b', type: 'llm', format: 'gguf' },
        output: { model_id: 'model-1a2b3c4d' },
      },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'model store', MODEL_DOMAIN);
      const now = nowSeconds();
      const model: Model = {
        id: generateModelId(),
        name: input.name,
        type: input.type,
        format: input.format,
        status: 'pending',
        source: input.source,
        path: input.path,
        size: input.size,
        checksum: '',
        tags: input.tags,
        created_at: now,
        updated_at: now,
      };
      try {
        await store.create(model);
      } catch (error) {
        throw wrapError(error, 'create model', 'INTERNAL_ERROR', MODEL_DOMAIN);
      }
      publishSafely(deps.events, modelCreatedEvent(model, ctx.requestId));
      return { model_id: model.id };
    },
  });
}

/* model.delete */

const DeleteInput = z.object({
  model_id: requiredText('model_id'),
  force: z.boolean().default(false),
});

export function createModelDeleteCommand(deps: ModelUnitDeps): Command<z.infer<typeof DeleteInput>, { success: boolean }> {
  return defineCommand({
    name: 'model.delete',
    domain: MODEL_DOMAIN,
    description: 'Delete a model record',
    input: DeleteInput,
    inputSchema: s.object(
      {
        model_id: s.string({ min_length: 1 }),
        force: s.boolean({ description: 'Skip in-use checks', default: false }),
      },
      ['model_id'],
    ),
    outputSchema: s.object({ success: s.boolean() }, ['success']),
    examples: [{ input: { model_id: 'model-1a2b3c4d' }, output: { success: true } }],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'model store', MODEL_DOMAIN);
      const model = await store.get(input.model_id);
      await store.delete(model.id);
      publishSafely(deps.events, modelDeletedEvent(model, ctx.requestId));
      return { success: true };
    },
  });
}

/* model.pull */

const PullInput = z.object({
  source: z.string().trim().default(''),
  repo: requiredText('repo'),
  tag: z.string().trim().default(''),
  mirror: z.string().trim().optional(),
});

type PullInputValue = z.infer<typeof PullInput>;

export interface PullOutput {
  model_id: string;
  status: string;
}

/**
 * Owns the in-flight set of `source/repo/tag` keys. The check and insert run
 * in one synchronous step, so concurrent calls for one key cannot both pass.
 */
export class PullCommand implements Command<PullInputValue, PullOutput> {
  readonly kind = 'command';
  readonly name = 'model.pull';
  readonly domain = MODEL_DOMAIN;
  readonly description = 'Download a model from a remote source and register it';
  readonly inputSchema = s.object(
    {
      source: s.string({ description: 'huggingface, hf, ollama, ...' }),
      repo: s.string({ min_length: 1, description: 'Repository or model name' }),
      tag: s.string({ description: 'Revision or tag; defaults per source' }),
      mirror: s.string({ description: 'Alternative download base URL' }),
    },
    ['repo'],
  );
  readonly outputSchema = s.object(
    { model_id: s.string(), status: s.string({ enum: MODEL_STATUSES }) },
    ['model_id', 'status'],
  );
  readonly examples: UnitExample[] = [
    {
      description: 'Pull a GGUF repository from HuggingFace',
      input: { source: 'huggingface', repo: 'org/tiny-gguf', tag: 'main' },
      output: { model_id: 'model-1a2b3c4d', status: 'ready' },
    },
  ];

  private readonly inFlight = new Set<string>();

  constructor(private readonly deps: ModelUnitDeps) {}

  decode(input: unknown): PullInputValue {
    return decodeInput(PullInput, input, MODEL_DOMAIN);
  }

  isPulling(key: string): boolean {
    return this.inFlight.has(key);
  }

  async execute(ctx: UnitContext, input: PullInputValue): Promise<PullOutput> {
    const store = requireCollaborator(this.deps.store, 'model store', MODEL_DOMAIN);
    const provider = requireCollaborator(this.deps.provider, 'model provider', MODEL_DOMAIN);
    const source = input.source || this.deps.defaultSource || 'huggingface';
    const key = `${source}/${input.repo}/${input.tag}`;

    if (this.inFlight.has(key)) throw pullInProgress(key);
    this.inFlight.add(key);
    try {
      const channel = new ProgressChannel<PullProgress>(10, isTerminalProgress);
      const forwarding = this.forwardProgress(channel, ctx.requestId);
      let model: Model;
      try {
        model = await provider.pull(
          { source, repo: input.repo, tag: input.tag, mirror: input.mirror },
          { signal: ctx.signal, progress: channel },
        );
      } finally {
        channel.close();
        await forwarding;
      }
      const outcome = await upsertModel(store, model);
      if (outcome === 'created') publishSafely(this.deps.events, modelCreatedEvent(model, ctx.requestId));
      return { model_id: model.id, status: model.status };
    } catch (error) {
      throw wrapError(error, `pull model ${key}`, 'MODEL_PULL_FAILED', MODEL_DOMAIN);
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async forwardProgress(channel: ProgressChannel<PullProgress>, correlationId: string): Promise<void> {
    for await (const progress of channel) {
      publishSafely(this.deps.events, pullProgressEvent(progress, correlationId));
    }
    if (channel.dropped > 0) {
      logger.debug('pull progress updates dropped', { dropped: channel.dropped });
    }
  }
}

/* model.import */

const ImportInput = z.object({
  path: requiredText('path'),
  name: z.string().trim().optional(),
  type: ModelTypeSchema.optional(),
  auto_detect: z.boolean().default(true),
});

export function createModelImportCommand(deps: ModelUnitDeps): Command<z.infer<typeof ImportInput>, { model_id: string }> {
  return defineCommand({
    name: 'model.import',
    domain: MODEL_DOMAIN,
    description: 'Register model weights that already exist on local disk',
    input: ImportInput,
    inputSchema: s.object(
      {
        path: s.string({ min_length: 1 }),
        name: s.string(),
        type: s.string({ enum: MODEL_TYPES }),
        auto_detect: s.boolean({ default: true }),
      },
      ['path'],
    ),
    outputSchema: s.object({ model_id: s.string() }, ['model_id']),
    examples: [
      { input: { path: '/models/llama3-8b.gguf' }, output: { model_id: 'model-1a2b3c4d' } },
    ],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'model store', MODEL_DOMAIN);
      const provider = requireCollaborator(deps.provider, 'model provider', MODEL_DOMAIN);
      let model: Model;
      try {
        model = await provider.importLocal(input.path, input.auto_detect, ctx.signal);
      } catch (error) {
        throw wrapError(error, 'import model', 'MODEL_IMPORT_FAILED', MODEL_DOMAIN);
      }
      if (input.name) model.name = input.name;
      if (input.type) model.type = input.type;
      await store.create(model);
      publishSafely(deps.events, modelCreatedEvent(model, ctx.requestId));
      return { model_id: model.id };
    },
  });
}

/* model.verify */

const VerifyInput = z.object({
  model_id: requiredText('model_id'),
  checksum: z.string().default(''),
});

export function createModelVerifyCommand(
  deps: ModelUnitDeps,
): Command<z.infer<typeof VerifyInput>, { valid: boolean; issues: string[] }> {
  return defineCommand({
    name: 'model.verify',
    domain: MODEL_DOMAIN,
    description: 'Check that a model is present on disk and matches its checksum',
    input: VerifyInput,
    inputSchema: s.object(
      {
        model_id: s.string({ min_length: 1 }),
        checksum: s.string({ description: 'size:<bytes>, sha256:<hex> or safetensors:<n>' }),
      },
      ['model_id'],
    ),
    outputSchema: s.object(
      { valid: s.boolean(), issues: s.array(s.string()) },
      ['valid', 'issues'],
    ),
    examples: [{ input: { model_id: 'model-1a2b3c4d' }, output: { valid: true, issues: [] } }],
    async execute(ctx, input) {
      const store = requireCollaborator(deps.store, 'model store', MODEL_DOMAIN);
      const provider = requireCollaborator(deps.provider, 'model provider', MODEL_DOMAIN);
      await store.get(input.model_id);
      let result: { valid: boolean; issues: string[] };
      try {
        result = await provider.verify(input.model_id, input.checksum, ctx.signal);
      } catch (error) {
        throw wrapError(error, 'verify model', 'MODEL_VERIFY_FAILED', MODEL_DOMAIN);
      }
      publishSafely(deps.events, modelVerifiedEvent(input.model_id, result, ctx.requestId));
      return { valid: result.valid, issues: [...result.issues] };
    },
  });
}

export function createModelCommands(deps: ModelUnitDeps): { commands: Command[]; pull: PullCommand } {
  const pull = new PullCommand(deps);
  return {
    pull,
    commands: [
      createModelCreateCommand(deps),
      createModelDeleteCommand(deps),
      pull,
      createModelImportCommand(deps),
      createModelVerifyCommand(deps),
    ],
  };
}
