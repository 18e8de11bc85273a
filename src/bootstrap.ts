import * as path from 'node:path';
import { loadEngineAssets, type EngineAsset } from './catalog/engine-assets';
import { registerCatalogUnits } from './catalog/index';
import { SqliteRecipeStore } from './catalog/sqlite-store';
import { MemoryRecipeStore } from './catalog/store';
import type { RecipeStore } from './catalog/types';
import type { ControlPlaneConfig } from './config/schema';
import { createApiKeyAuth, readsOptionalPolicy } from './gateway/auth';
import { Gateway } from './gateway/gateway';
import { registerInferenceUnits } from './inference/index';
import type { InferenceProvider } from './inference/types';
import { FileModelStore } from './model/file-store';
import { registerModelUnits } from './model/index';
import { MultiSourceModelProvider } from './model/multi-source';
import { SqliteModelStore } from './model/sqlite-store';
import { MemoryModelStore } from './model/store';
import type { ModelProvider, ModelStore } from './model/types';
import { HuggingFaceClient } from './providers/huggingface/client';
import { HuggingFaceProvider } from './providers/huggingface/provider';
import { OllamaProvider } from './providers/ollama/provider';
import { registerServiceUnits } from './service/index';
import { LocalServiceProvider } from './service/local-provider';
import { SqliteServiceStore } from './service/sqlite-store';
import { MemoryServiceStore } from './service/store';
import type { ServiceProvider, ServiceStore } from './service/types';
import { openSqliteDatabase, type SqliteDatabase } from './storage/sqlite';
import { InMemoryEventBus } from './unit/events';
import { UnitRegistry } from './unit/registry';
import { configureLogging, createLogger } from './utils/logger';

const logger = createLogger('bootstrap');

export const DATABASE_FILE = 'aima.db';
export const MODELS_FILE = 'models.json';

/** Collaborators that replace the ones built from configuration. */
export interface ControlPlaneOverrides {
  fetch?: typeof fetch;
  modelProvider?: ModelProvider;
  inferenceProvider?: InferenceProvider;
  serviceProvider?: ServiceProvider;
}

export interface ControlPlane {
  config: ControlPlaneConfig;
  registry: UnitRegistry;
  gateway: Gateway;
  bus: InMemoryEventBus;
  stores: { models: ModelStore; recipes: RecipeStore; services: ServiceStore };
  engineAssets: ReadonlyMap<string, EngineAsset>;
  close(): void;
}

interface Stores {
  models: ModelStore;
  recipes: RecipeStore;
  services: ServiceStore;
  db?: SqliteDatabase;
}

/** `sqlite` keeps every domain in one database; otherwise recipes and services live in memory. */
function createStores(config: ControlPlaneConfig): Stores {
  const dataDir = config.general.data_dir;
  switch (config.model.store) {
    case 'sqlite': {
      const db = openSqliteDatabase(path.join(dataDir, DATABASE_FILE));
      return {
        models: new SqliteModelStore(db),
        recipes: new SqliteRecipeStore(db),
        services: new SqliteServiceStore(db),
        db,
      };
    }
    case 'file':
      return {
        models: new FileModelStore(path.join(dataDir, MODELS_FILE)),
        recipes: new MemoryRecipeStore(),
        services: new MemoryServiceStore(),
      };
    case 'memory':
      return { models: new MemoryModelStore(), recipes: new MemoryRecipeStore(), services: new MemoryServiceStore() };
  }
}

export async function createControlPlane(
  config: ControlPlaneConfig,
  overrides: ControlPlaneOverrides = {},
): Promise<ControlPlane> {
  configureLogging({ file: config.logging.file, level: config.logging.level });

  const stores = createStores(config);
  const bus = new InMemoryEventBus();

  const ollama = new OllamaProvider({ baseUrl: config.ollama.base_url, fetch: overrides.fetch });
  const huggingface = new HuggingFaceProvider({
    downloadDir: config.model.download_dir,
    client: new HuggingFaceClient({
      baseUrl: config.huggingface.base_url,
      token: config.huggingface.token,
      fetch: overrides.fetch,
    }),
  });
  const modelProvider =
    overrides.modelProvider ??
    new MultiSourceModelProvider({
      providers: { huggingface, ollama },
      aliases: { hf: 'huggingface' },
      defaultSource: config.model.default_source,
    });

  const engineAssets = config.catalog.engine_assets_dir
    ? await loadEngineAssets(config.catalog.engine_assets_dir)
    : new Map<string, EngineAsset>();

  const registry = new UnitRegistry();
  registerModelUnits(registry, {
    store: stores.models,
    provider: modelProvider,
    events: bus,
    defaultSource: config.model.default_source,
  });
  registerCatalogUnits(registry, { store: stores.recipes, events: bus, engineAssets });
  registerServiceUnits(registry, {
    store: stores.services,
    provider: overrides.serviceProvider ?? new LocalServiceProvider(),
    models: stores.models,
    events: bus,
  });
  registerInferenceUnits(registry, { provider: overrides.inferenceProvider ?? ollama, events: bus });

  const gateway = new Gateway(registry, {
    timeoutMs: config.gateway.request_timeout_ms,
    maxInFlight: config.gateway.max_in_flight,
    maxQueued: config.gateway.max_queued,
    validateInput: config.gateway.validate_input,
    publisher: bus,
    auth: config.security.api_keys.length > 0 ? createApiKeyAuth(config.security.api_keys, readsOptionalPolicy) : undefined,
  });

  logger.info('control plane ready', {
    units: registry.size,
    domains: registry.domains(),
    model_store: config.model.store,
    engine_assets: engineAssets.size,
  });

  return {
    config,
    registry,
    gateway,
    bus,
    stores: { models: stores.models, recipes: stores.recipes, services: stores.services },
    engineAssets,
    close() {
      stores.db?.close();
    },
  };
}
