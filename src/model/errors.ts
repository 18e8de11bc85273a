import { UnitError } from '../unit/errors';

export const MODEL_DOMAIN = 'model';

export function modelNotFound(id: string): UnitError {
  return new UnitError('MODEL_NOT_FOUND', `model not found: ${id}`, { domain: MODEL_DOMAIN });
}

export function modelAlreadyExists(id: string): UnitError {
  return new UnitError('MODEL_ALREADY_EXISTS', `model already exists: ${id}`, {
    domain: MODEL_DOMAIN,
  });
}

export function invalidModelId(id: string): UnitError {
  return new UnitError('INVALID_MODEL_ID', `invalid model id: ${JSON.stringify(id)}`, {
    domain: MODEL_DOMAIN,
  });
}

export function pullInProgress(key: string): UnitError {
  return new UnitError('PULL_IN_PROGRESS', `pull already in progress: ${key}`, {
    domain: MODEL_DOMAIN,
    details: { key },
  });
}

export function unsupportedSource(source: string): UnitError {
  return new UnitError('INVALID_INPUT', `unsupported source: ${source}`, { domain: MODEL_DOMAIN });
}

export function modelError(
  code: 'MODEL_PULL_FAILED' | 'MODEL_VERIFY_FAILED' | 'MODEL_IMPORT_FAILED',
  message: string,
  cause?: unknown,
): UnitError {
  return new UnitError(code, message, { domain: MODEL_DOMAIN, cause });
}
