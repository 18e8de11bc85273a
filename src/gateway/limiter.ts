import { UnitError } from '../unit/errors';

export interface ExecutionLimiterOptions {
  maxInFlight?: number;
  maxQueued?: number;
  queueTimeoutMs?: number;
}

interface QueuedTask {
  start: () => void;
  timeout: ReturnType<typeof setTimeout>;
}

/**
 * Bounds the number of concurrently executing units. Calls beyond the limit
 * wait in a FIFO queue; a full queue or a queue timeout fails with OVERLOADED.
 */
export class ExecutionLimiter {
  private inFlight = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly maxInFlight: number;
  private readonly maxQueued: number;
  private readonly queueTimeoutMs: number;

  constructor(options: ExecutionLimiterOptions = {}) {
    this.maxInFlight = Math.max(1, Math.floor(options.maxInFlight ?? 64));
    this.maxQueued = Math.max(0, Math.floor(options.maxQueued ?? 256));
    this.queueTimeoutMs = Math.max(100, Math.floor(options.queueTimeoutMs ?? 15_000));
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.inFlight < this.maxInFlight) {
      return this.executeNow(task);
    }
    if (this.queue.length >= this.maxQueued) {
      throw new UnitError(
        'OVERLOADED',
        `gateway overloaded: in_flight=${this.inFlight} queued=${this.queue.length}`,
      );
    }
    return await new Promise<T>((resolve, reject) => {
      const queued: QueuedTask = {
        start: () => {
          this.executeNow(task).then(resolve, reject);
        },
        timeout: setTimeout(() => {
          const index = this.queue.indexOf(queued);
          if (index >= 0) this.queue.splice(index, 1);
          reject(new UnitError('OVERLOADED', 'gateway queue timeout'));
        }, this.queueTimeoutMs),
      };
      this.queue.push(queued);
    });
  }

  stats(): { inFlight: number; queued: number; maxInFlight: number; maxQueued: number } {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      maxInFlight: this.maxInFlight,
      maxQueued: this.maxQueued,
    };
  }

  private async executeNow<T>(task: () => Promise<T>): Promise<T> {
    this.inFlight += 1;
    try {
      return await task();
    } finally {
      this.inFlight = Math.max(0, this.inFlight - 1);
      this.drainQueue();
    }
  }

  private drainQueue(): void {
    if (this.inFlight >= this.maxInFlight) return;
    const next = this.queue.shift();
    if (!next) return;
    clearTimeout(next.timeout);
    next.start();
  }
}
