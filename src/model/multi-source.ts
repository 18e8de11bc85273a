import { UnitError } from '../unit/errors';
import { MODEL_DOMAIN, modelNotFound } from './errors';
import type {
  Model,
  ModelProvider,
  ModelRequirements,
  ModelSearchResult,
  PullOptions,
  PullRequest,
  SearchRequest,
  VerificationResult,
} from './types';

export interface MultiSourceOptions {
  providers: Record<string, ModelProvider>;
  aliases?: Record<string, string>;
  defaultSource: string;
}

export const DEFAULT_SOURCE = 'huggingface';

/**
 * Routes provider calls by source name. Models it has produced are
 * remembered so verify and estimate reach the provider that owns them.
 */
export class MultiSourceModelProvider implements ModelProvider {
  private readonly providers: Map<string, ModelProvider>;
  private readonly aliases: Map<string, string>;
  private readonly owners = new Map<string, string>();
  readonly defaultSource: string;

  constructor(options: MultiSourceOptions) {
    this.providers = new Map(
      Object.entries(options.providers).map(([name, provider]) => [name.toLowerCase(), provider]),
    );
    this.aliases = new Map(
      Object.entries(options.aliases ?? {}).map(([alias, name]) => [alias.toLowerCase(), name.toLowerCase()]),
    );
    const fallback = options.defaultSource.trim().toLowerCase() || DEFAULT_SOURCE;
    this.defaultSource = this.aliases.get(fallback) ?? fallback;
  }

  sources(): string[] {
    return [...this.providers.keys()].sort();
  }

  canonical(source: string | undefined): string {
    const name = (source ?? '').trim().toLowerCase();
    if (!name) return this.defaultSource;
    return this.aliases.get(name) ?? name;
  }

  resolve(source: string | undefined): ModelProvider {
    const name = this.canonical(source);
    const provider = this.providers.get(name);
    if (!provider) {
      throw new UnitError('INVALID_INPUT', `unsupported source: ${source ?? ''}`, {
        domain: MODEL_DOMAIN,
        details: { supported: this.sources() },
      });
    }
    return provider;
  }

  async pull(request: PullRequest, options: PullOptions): Promise<Model> {
    const source = this.canonical(request.source);
    const model = await this.resolve(source).pull({ ...request, source }, options);
    this.owners.set(model.id, source);
    return model;
  }

  async search(request: SearchRequest, signal: AbortSignal): Promise<ModelSearchResult[]> {
    return this.resolve(request.source).search(request, signal);
  }

  async importLocal(path: string, autoDetect: boolean, signal: AbortSignal): Promise<Model> {
    const source = this.defaultSource;
    const model = await this.resolve(source).importLocal(path, autoDetect, signal);
    this.owners.set(model.id, source);
    return model;
  }

  async verify(modelId: string, checksum: string, signal: AbortSignal): Promise<VerificationResult> {
    const owner = this.owners.get(modelId);
    if (!owner) return { valid: false, issues: [`model not found: ${modelId}`] };
    return this.resolve(owner).verify(modelId, checksum, signal);
  }

  async estimateResources(modelId: string, signal: AbortSignal): Promise<ModelRequirements> {
    const owner = this.owners.get(modelId);
    if (!owner) throw modelNotFound(modelId);
    return this.resolve(owner).estimateResources(modelId, signal);
  }
}
