import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { UnitError } from '../unit/errors';
import { createLogger } from '../utils/logger';
import { type ControlPlaneConfig, ControlPlaneConfigSchema } from './schema';

const logger = createLogger('config');

type Env = Record<string, string | undefined>;
type ConfigDocument = Record<string, unknown>;

function isObject(value: unknown): value is ConfigDocument {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Nested objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(base: ConfigDocument, override: ConfigDocument): ConfigDocument {
  const result: ConfigDocument = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isObject(current) && isObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function invalidConfig(message: string, details?: unknown): UnitError {
  return new UnitError('INVALID_INPUT', `invalid configuration: ${message}`, { domain: 'config', details });
}

function readConfigFile(file: string): ConfigDocument {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw invalidConfig(`cannot read ${file}`, { cause: String(error) });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw invalidConfig(`${file} is not valid JSON`, { cause: String(error) });
  }
  if (!isObject(parsed)) throw invalidConfig(`${file} must contain a JSON object`);
  return parsed;
}

function expandHome(value: string): string {
  return value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value;
}

function numberFromEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw invalidConfig(`${name} must be a number, got "${value}"`);
  return parsed;
}

/** Environment variables laid over the file, as a partial config document. */
export function envOverlay(env: Env): ConfigDocument {
  const overlay: ConfigDocument = {};
  const set = (section: string, key: string, value: unknown): void => {
    const current = overlay[section];
    overlay[section] = { ...(isObject(current) ? current : {}), [key]: value };
  };
  if (env.AIMA_DATA_DIR) set('general', 'data_dir', expandHome(env.AIMA_DATA_DIR));
  if (env.AIMA_REQUEST_TIMEOUT_MS) {
    set('gateway', 'request_timeout_ms', numberFromEnv('AIMA_REQUEST_TIMEOUT_MS', env.AIMA_REQUEST_TIMEOUT_MS));
  }
  const token = env.AIMA_HF_TOKEN || env.HF_TOKEN;
  if (token) set('huggingface', 'token', token);
  if (env.AIMA_HF_BASE_URL) set('huggingface', 'base_url', env.AIMA_HF_BASE_URL);
  if (env.AIMA_OLLAMA_BASE_URL) set('ollama', 'base_url', env.AIMA_OLLAMA_BASE_URL);
  if (env.AIMA_DOWNLOAD_DIR) set('model', 'download_dir', expandHome(env.AIMA_DOWNLOAD_DIR));
  if (env.AIMA_API_KEYS) {
    set(
      'security',
      'api_keys',
      env.AIMA_API_KEYS.split(',')
        .map((key) => key.trim())
        .filter(Boolean),
    );
  }
  if (env.AIMA_API_PORT) set('api', 'port', numberFromEnv('AIMA_API_PORT', env.AIMA_API_PORT));
  if (env.AIMA_LOG_FILE) set('logging', 'file', env.AIMA_LOG_FILE);
  return overlay;
}

export function parseConfig(document: unknown): ControlPlaneConfig {
  const result = ControlPlaneConfigSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    const first = issues[0];
    throw invalidConfig(first ? `${first.path}: ${first.message}` : 'schema mismatch', issues);
  }
  return result.data;
}

export interface LoadConfigOptions {
  env?: Env;
  /** Explicit config file; otherwise `AIMA_CONFIG`, then `<data_dir>/config.json` when present. */
  file?: string;
}

/**
 * Resolves the configuration: defaults, then the JSON file, then the
 * environment. An explicitly named file must exist; the default one may not.
 */
export function loadConfig(options: LoadConfigOptions = {}): ControlPlaneConfig {
  const env = options.env ?? process.env;
  const overlay = envOverlay(env);
  const explicit = options.file ?? env.AIMA_CONFIG;

  let fileDocument: ConfigDocument = {};
  if (explicit) {
    fileDocument = readConfigFile(expandHome(explicit));
  } else {
    const dataDir = parseConfig(deepMerge({}, overlay)).general.data_dir;
    const candidate = path.join(dataDir, 'config.json');
    if (fs.existsSync(candidate)) fileDocument = readConfigFile(candidate);
  }

  const config = parseConfig(deepMerge(fileDocument, overlay));
  logger.debug('configuration loaded', {
    file: explicit ?? null,
    data_dir: config.general.data_dir,
    model_store: config.model.store,
  });
  return config;
}
