export const ERROR_CODES = [
  'INVALID_REQUEST',
  'INVALID_INPUT',
  'INVALID_MODEL_ID',
  'NOT_FOUND',
  'UNIT_NOT_FOUND',
  'RESOURCE_NOT_FOUND',
  'EXECUTION_FAILED',
  'TIMEOUT',
  'CANCELLED',
  'INTERNAL_ERROR',
  'UNAUTHORIZED',
  'ALREADY_EXISTS',
  'OVERLOADED',
  'PROVIDER_NOT_SET',
  'MODEL_NOT_FOUND',
  'MODEL_ALREADY_EXISTS',
  'MODEL_PULL_FAILED',
  'PULL_IN_PROGRESS',
  'MODEL_VERIFY_FAILED',
  'MODEL_IMPORT_FAILED',
  'MODEL_INVALID_SOURCE',
  'RECIPE_NOT_FOUND',
  'RECIPE_ALREADY_EXISTS',
  'RECIPE_INVALID',
  'RECIPE_APPLY_FAILED',
  'SERVICE_NOT_FOUND',
  'SERVICE_ALREADY_EXISTS',
  'SERVICE_ALREADY_RUNNING',
  'SERVICE_START_FAILED',
  'SERVICE_INVALID_REPLICAS',
  'INFERENCE_FAILED',
  'MODEL_NOT_SPECIFIED',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorInfo {
  code: string;
  message: string;
  domain?: string;
  details?: unknown;
}

export interface UnitErrorOptions {
  domain?: string;
  details?: unknown;
  cause?: unknown;
}

export class UnitError extends Error {
  readonly code: ErrorCode;
  readonly domain?: string;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, options: UnitErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UnitError';
    this.code = code;
    this.domain = options.domain;
    this.details = options.details;
  }

  toInfo(): ErrorInfo {
    return toErrorInfo(this);
  }
}

export function isUnitError(error: unknown): error is UnitError {
  return error instanceof UnitError;
}

export function isErrorCode(value: string): value is ErrorCode {
  return ERROR_CODES.some((code) => code === value);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Innermost UnitError along the cause chain. */
export function rootUnitError(error: unknown): UnitError | undefined {
  let found: UnitError | undefined;
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof UnitError) found = current;
    current = current instanceof Error ? current.cause : undefined;
  }
  return found;
}

export function rootCode(error: unknown): ErrorCode {
  return rootUnitError(error)?.code ?? 'INTERNAL_ERROR';
}

/**
 * Adds context to an error. A UnitError anywhere in the chain keeps its code;
 * anything else becomes `fallback`.
 */
export function wrapError(
  error: unknown,
  context: string,
  fallback: ErrorCode = 'INTERNAL_ERROR',
  domain?: string,
): UnitError {
  const root = rootUnitError(error);
  return new UnitError(root?.code ?? fallback, `${context}: ${errorMessage(error)}`, {
    domain: root?.domain ?? domain,
    details: root?.details,
    cause: error,
  });
}

export function toErrorInfo(error: unknown): ErrorInfo {
  const root = rootUnitError(error);
  if (!root) {
    return { code: 'INTERNAL_ERROR', message: errorMessage(error) };
  }
  const outer = error instanceof UnitError ? error : root;
  const info: ErrorInfo = { code: root.code, message: outer.message };
  const domain = outer.domain ?? root.domain;
  if (domain) info.domain = domain;
  if (root.details !== undefined) info.details = root.details;
  return info;
}

const HTTP_STATUS: Partial<Record<ErrorCode, number>> = {
  INVALID_REQUEST: 400,
  INVALID_INPUT: 400,
  RECIPE_INVALID: 400,
  MODEL_INVALID_SOURCE: 400,
  SERVICE_INVALID_REPLICAS: 400,
  MODEL_NOT_SPECIFIED: 400,
  INVALID_MODEL_ID: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  UNIT_NOT_FOUND: 404,
  RESOURCE_NOT_FOUND: 404,
  MODEL_NOT_FOUND: 404,
  RECIPE_NOT_FOUND: 404,
  SERVICE_NOT_FOUND: 404,
  TIMEOUT: 408,
  ALREADY_EXISTS: 409,
  MODEL_ALREADY_EXISTS: 409,
  RECIPE_ALREADY_EXISTS: 409,
  PULL_IN_PROGRESS: 409,
  SERVICE_ALREADY_EXISTS: 409,
  SERVICE_ALREADY_RUNNING: 409,
  OVERLOADED: 429,
  CANCELLED: 499,
};

export function errorToHttpStatus(code: string): number {
  if (!isErrorCode(code)) return 500;
  return HTTP_STATUS[code] ?? 500;
}
