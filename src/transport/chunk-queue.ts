// src/transport/chunk-queue.ts

type Waiter = {
  resolve: (result: IteratorResult<Uint8Array, undefined>) => void;
  reject: (err: Error) => void;
};

/**
 * Bridges event-driven `data`/`close`/`error` callbacks to a single-consumer async iterable.
 * Chunks pushed while nobody is waiting are buffered in arrival order.
 */
export class ChunkQueue implements AsyncIterable<Uint8Array> {
  private chunks: Uint8Array[] = [];
  private waiters: Waiter[] = [];
  private done: boolean = false;
  private failure: Error | null = null;

  get ended(): boolean {
    return this.done;
  }

  push(chunk: Uint8Array): void {
    if (this.done) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve({ value: chunk, done: false });
    else this.chunks.push(chunk);
  }

  /** Signals end of stream; buffered chunks are still delivered */
  end(): void {
    if (this.done) return;
    this.done = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve({ value: undefined, done: true });
  }

  /** Ends the stream with an error delivered after the buffered chunks */
  fail(err: Error): void {
    if (this.done) return;
    this.failure = err;
    this.done = true;
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }

  private next(): Promise<IteratorResult<Uint8Array, undefined>> {
    const chunk = this.chunks.shift();
    if (chunk !== undefined) return Promise.resolve({ value: chunk, done: false });
    if (this.failure) return Promise.reject(this.failure);
    if (this.done) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.end();
        return { value: undefined, done: true };
      },
    };
  }
}
