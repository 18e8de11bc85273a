import { generateRequestId } from '../utils/ids';
import { createLogger } from '../utils/logger';
import { abortPromise, cancelledError, timeoutError } from '../unit/context';
import { type ErrorInfo, UnitError, toErrorInfo } from '../unit/errors';
import type { EventPublisher } from '../unit/events';
import { executeUnit } from '../unit/execution';
import type { UnitRegistry } from '../unit/registry';
import { validateAgainstSchema } from '../unit/schema';
import type { ExecutableUnit, UnitContext } from '../unit/types';
import type { AuthHook } from './auth';
import { ExecutionLimiter, type ExecutionLimiterOptions } from './limiter';
import {
  type GatewayRequest,
  GatewayRequestSchema,
  type GatewayResponse,
  isRequestType,
} from './protocol';

export const DEFAULT_REQUEST_TIMEOUT_MS = 5 * 60 * 1000;

export interface GatewayOptions extends ExecutionLimiterOptions {
  timeoutMs?: number;
  publisher?: EventPublisher;
  auth?: AuthHook;
  /** Check input against the unit's declared schema before decoding. */
  validateInput?: boolean;
}

export interface HandleOptions {
  signal?: AbortSignal;
  token?: string;
}

const logger = createLogger('gateway');

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Envelope-level validation; mirrors the schema with human-facing messages. */
function parseRequest(raw: unknown): GatewayRequest {
  if (raw === null || raw === undefined) {
    throw new UnitError('INVALID_REQUEST', 'request is nil');
  }
  if (!isRecord(raw)) {
    throw new UnitError('INVALID_REQUEST', 'request must be an object');
  }
  if (!isRequestType(raw.type)) {
    throw new UnitError('INVALID_REQUEST', `invalid request type: ${String(raw.type ?? '')}`);
  }
  if (typeof raw.unit !== 'string' || !raw.unit.trim()) {
    throw new UnitError('INVALID_REQUEST', 'unit is required');
  }
  const parsed = GatewayRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'request';
    throw new UnitError('INVALID_REQUEST', `invalid request: ${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

function peekRequestId(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  return typeof raw.request_id === 'string' && raw.request_id ? raw.request_id : undefined;
}

export class Gateway {
  private readonly timeoutMs: number;
  private readonly validateInput: boolean;
  private readonly limiter: ExecutionLimiter;

  constructor(
    private readonly registry: UnitRegistry,
    private readonly options: GatewayOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.validateInput = options.validateInput ?? true;
    this.limiter = new ExecutionLimiter(options);
  }

  /** Never throws: every outcome is an envelope. */
  async handle(raw: unknown, options: HandleOptions = {}): Promise<GatewayResponse> {
    const started = Date.now();
    let requestId = peekRequestId(raw) ?? generateRequestId();
    try {
      const request = parseRequest(raw);
      requestId = request.request_id ?? requestId;
      const data = await this.dispatch(request, requestId, options);
      return {
        success: true,
        data,
        error: null,
        request_id: requestId,
        duration_ms: Date.now() - started,
      };
    } catch (error) {
      const info: ErrorInfo = toErrorInfo(error);
      if (info.code === 'INTERNAL_ERROR') {
        logger.error('unit execution failed', { request_id: requestId, error });
      }
      return {
        success: false,
        data: null,
        error: info,
        request_id: requestId,
        duration_ms: Date.now() - started,
      };
    }
  }

  stats(): ReturnType<ExecutionLimiter['stats']> {
    return this.limiter.stats();
  }

  private async dispatch(
    request: GatewayRequest,
    requestId: string,
    options: HandleOptions,
  ): Promise<unknown> {
    const auth = this.options.auth
      ? await this.options.auth({ token: options.token, request })
      : {};

    const timeoutMs = Math.min(request.timeout_ms ?? this.timeoutMs, this.timeoutMs);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(timeoutError(timeoutMs)), timeoutMs);
    const onCallerAbort = (): void => controller.abort(cancelledError());
    if (options.signal?.aborted) onCallerAbort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    const aborted = abortPromise(controller.signal);
    // The race below may settle before the unit does; keep its rejection observed.
    aborted.promise.catch(() => undefined);

    const ctx: UnitContext = {
      requestId,
      signal: controller.signal,
      startedAt: Date.now(),
      userId: auth.userId,
      traceId: request.trace_id,
    };

    try {
      const work = this.limiter.run(() => this.run(request, ctx));
      return await Promise.race([work, aborted.promise]);
    } finally {
      clearTimeout(timer);
      aborted.dispose();
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async run(request: GatewayRequest, ctx: UnitContext): Promise<unknown> {
    if (ctx.signal.aborted) throw ctx.signal.reason;
    const input = request.input ?? {};
    switch (request.type) {
      case 'command': {
        const command = this.registry.getCommand(request.unit);
        if (!command) throw new UnitError('UNIT_NOT_FOUND', `command not found: ${request.unit}`);
        return this.execute(command, ctx, input);
      }
      case 'query': {
        const query = this.registry.getQuery(request.unit);
        if (!query) throw new UnitError('UNIT_NOT_FOUND', `query not found: ${request.unit}`);
        return this.execute(query, ctx, input);
      }
      case 'resource_get': {
        const resource = this.registry.getResource(request.unit);
        if (!resource) throw new UnitError('UNIT_NOT_FOUND', `resource not found: ${request.unit}`);
        return resource.get(ctx);
      }
    }
  }

  private async execute(
    unit: ExecutableUnit,
    ctx: UnitContext,
    input: Record<string, unknown>,
  ): Promise<unknown> {
    if (this.validateInput) {
      const issues = validateAgainstSchema(unit.inputSchema, input);
      const first = issues[0];
      if (first) {
        throw new UnitError('INVALID_INPUT', `invalid input: ${first.path} ${first.message}`, {
          domain: unit.domain,
          details: { issues },
        });
      }
    }
    const decoded = unit.decode(input);
    return executeUnit(unit, ctx, decoded, this.options.publisher);
  }
}
