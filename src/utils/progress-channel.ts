/**
 * Bounded single-consumer queue for progress updates. When the buffer is full
 * a non-terminal update is dropped; a terminal update evicts the oldest
 * non-terminal one so it is always delivered.
 */
export class ProgressChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | undefined;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly capacity = 10,
    private readonly isTerminal: (item: T) => boolean = () => false,
  ) {}

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: item, done: false });
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      if (!this.isTerminal(item)) {
        this.droppedCount += 1;
        return false;
      }
      const evict = this.buffer.findIndex((queued) => !this.isTerminal(queued));
      if (evict >= 0) {
        this.buffer.splice(evict, 1);
        this.droppedCount += 1;
      }
    }
    this.buffer.push(item);
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.({ value: undefined, done: true });
  }

  get dropped(): number {
    return this.droppedCount;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => {
        const item = this.buffer.shift();
        if (item !== undefined) return Promise.resolve({ value: item, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiter = resolve;
        });
      },
    };
  }
}
