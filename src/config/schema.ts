import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const ModelStoreKindSchema = z.enum(['memory', 'file', 'sqlite']);
export type ModelStoreKind = z.infer<typeof ModelStoreKindSchema>;

export const GeneralConfigSchema = z.object({
  data_dir: z.string().min(1).default(path.join(os.homedir(), '.aima')),
});

export const GatewayConfigSchema = z.object({
  request_timeout_ms: z.number().int().positive().default(300_000),
  max_in_flight: z.number().int().positive().default(64),
  max_queued: z.number().int().nonnegative().default(256),
  validate_input: z.boolean().default(true),
});

export const ApiConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65_535).default(9090),
  enable_cors: z.boolean().default(false),
});

export const SecurityConfigSchema = z.object({
  api_keys: z.array(z.string().min(1)).default([]),
});

export const ModelConfigSchema = z.object({
  download_dir: z.string().min(1).default('/tmp/aima-models'),
  default_source: z.string().trim().min(1).default('huggingface'),
  store: ModelStoreKindSchema.default('sqlite'),
});

export const HuggingFaceConfigSchema = z.object({
  base_url: z.string().url().default('https://huggingface.co'),
  token: z.string().optional(),
});

export const OllamaConfigSchema = z.object({
  base_url: z.string().url().default('http://localhost:11434'),
});

export const LoggingConfigSchema = z.object({
  file: z.string().optional(),
  level: LogLevelSchema.default('info'),
});

export const CatalogConfigSchema = z.object({
  // Directory of engine asset YAML files; unset disables them.
  engine_assets_dir: z.string().optional(),
});

export const ControlPlaneConfigSchema = z.object({
  general: GeneralConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  api: ApiConfigSchema.default({}),
  security: SecurityConfigSchema.default({}),
  model: ModelConfigSchema.default({}),
  huggingface: HuggingFaceConfigSchema.default({}),
  ollama: OllamaConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
});

export type ControlPlaneConfig = z.infer<typeof ControlPlaneConfigSchema>;
/** Configuration as written in a file: every section and field optional. */
export type ControlPlaneConfigInput = z.input<typeof ControlPlaneConfigSchema>;
