// src/transport/iterable-source.ts

import { WitsSourceClosedError } from '../errors.js';
import type { FrameSource } from '../types/wits-types.js';

type Chunk = string | Uint8Array;

/**
 * FrameSource over chunks already in memory or produced by any (async) iterable.
 */
export class IterableSource implements FrameSource {
  private readonly iterable: AsyncIterable<Chunk> | Iterable<Chunk>;
  private _closed: boolean = false;

  constructor(iterable: AsyncIterable<Chunk> | Iterable<Chunk>) {
    this.iterable = iterable;
  }

  get closed(): boolean {
    return this._closed;
  }

  async *chunks(): AsyncGenerator<Chunk, void, undefined> {
    if (this._closed) throw new WitsSourceClosedError();
    for await (const chunk of this.iterable) {
      if (this._closed) return;
      yield chunk;
    }
  }

  async close(): Promise<void> {
    this._closed = true;
  }
}
