// src/transport/frame-reader.ts

import { Mutex } from 'async-mutex';
import { FrameExtractor } from '../framers/frame-extractor.js';
import { rootLogger } from '../logger.js';
import type { FrameReaderOptions, FrameSource } from '../types/wits-types.js';

const logger = rootLogger.createLogger('FrameReader');

/**
 * Pulls complete frames out of a FrameSource one at a time.
 *
 * Concurrent `next()` calls are serialized so each frame goes to exactly one caller.
 */
export class FrameReader implements AsyncIterable<string> {
  private readonly source: FrameSource;
  private readonly options: Required<FrameReaderOptions>;
  private readonly extractor: FrameExtractor = new FrameExtractor();
  private readonly _operationMutex: Mutex = new Mutex();
  private frames: AsyncIterator<string, void, undefined> | null = null;
  private _closed: boolean = false;
  private _skipped: number = 0;

  constructor(source: FrameSource, options: FrameReaderOptions = {}) {
    this.source = source;
    this.options = {
      skipOwnFrames: options.skipOwnFrames ?? true,
    };
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Frames dropped because the source injected them */
  get skipped(): number {
    return this._skipped;
  }

  /**
   * Resolves with the next frame, or null once the source is exhausted or the reader closed.
   */
  async next(): Promise<string | null> {
    return this._operationMutex.runExclusive(async () => {
      for (;;) {
        if (this._closed) return null;
        this.frames ??= this.extractor.extract(this.source.chunks());
        const result = await this.frames.next();
        if (result.done) {
          await this.close();
          return null;
        }
        const frame = result.value;
        if (this.options.skipOwnFrames && this.source.isOwnFrame?.(frame)) {
          this._skipped++;
          logger.trace('Skipping frame injected by the source');
          continue;
        }
        return frame;
      }
    });
  }

  /**
   * Stops reading and closes the source. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    const frames = this.frames;
    this.frames = null;
    // Source first: a pending pull only settles once the source stops producing
    try {
      await this.source.close();
    } finally {
      await frames?.return?.();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    for (;;) {
      const frame = await this.next();
      if (frame === null) return;
      yield frame;
    }
  }
}
