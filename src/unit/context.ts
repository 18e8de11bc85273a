import { generateRequestId } from '../utils/ids';
import { UnitError } from './errors';
import type { UnitContext } from './types';

export function createUnitContext(options: Partial<UnitContext> = {}): UnitContext {
  return {
    requestId: options.requestId ?? generateRequestId(),
    signal: options.signal ?? new AbortController().signal,
    startedAt: options.startedAt ?? Date.now(),
    userId: options.userId,
    traceId: options.traceId,
  };
}

export function timeoutError(ms: number): UnitError {
  return new UnitError('TIMEOUT', `request timed out after ${ms}ms`);
}

export function cancelledError(reason = 'request cancelled'): UnitError {
  return new UnitError('CANCELLED', reason);
}

/** The error a unit should surface once its signal has fired. */
export function abortError(signal: AbortSignal): UnitError {
  const reason: unknown = signal.reason;
  if (reason instanceof UnitError) return reason;
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new UnitError('TIMEOUT', reason.message, { cause: reason });
  }
  return cancelledError();
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw abortError(signal);
}

/** Rejects with the abort error as soon as `signal` fires. */
export function abortPromise(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let dispose = (): void => {};
  const promise = new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = (): void => reject(abortError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    dispose = () => signal.removeEventListener('abort', onAbort);
  });
  return { promise, dispose };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
