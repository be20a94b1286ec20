// src/transport/node-transports/file-source.ts

import { createReadStream, type ReadStream } from 'node:fs';
import { rootLogger } from '../../logger.js';
import { WitsSourceClosedError } from '../../errors.js';
import type { FileSourceOptions, FrameSource } from '../../types/wits-types.js';

const logger = rootLogger.createLogger('FileSource');

/**
 * Streams a recorded WITS capture from disk.
 */
export class FileSource implements FrameSource {
  private readonly path: string;
  private readonly options: Required<FileSourceOptions>;
  private stream: ReadStream | null = null;
  private _closed: boolean = false;

  constructor(path: string, options: FileSourceOptions = {}) {
    this.path = path;
    this.options = {
      encoding: options.encoding ?? 'utf8',
      highWaterMark: options.highWaterMark ?? 64 * 1024,
    };
  }

  async *chunks(): AsyncGenerator<string, void, undefined> {
    if (this._closed) throw new WitsSourceClosedError();
    const stream = createReadStream(this.path, {
      encoding: this.options.encoding,
      highWaterMark: this.options.highWaterMark,
    });
    this.stream = stream;
    logger.debug(`Reading ${this.path}`, { source: this.path, transport: 'file' });
    try {
      for await (const chunk of stream) {
        if (typeof chunk === 'string') yield chunk;
      }
    } catch (err: unknown) {
      // close() destroys the stream under the iterator
      if (this._closed) return;
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    this.stream?.destroy();
    this.stream = null;
  }
}
