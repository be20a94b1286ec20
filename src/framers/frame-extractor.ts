// src/framers/frame-extractor.ts

import { TextDecoder } from 'node:util';
import { FRAME_END, FRAME_START } from '../constants/constants.js';
import { WitsExtractorClosedError } from '../errors.js';

/**
 * Result of scanning a text for its next complete frame.
 * `consumed` is the number of characters that can be dropped from the front of the text.
 */
interface ScanResult {
  frame: string | null;
  consumed: number;
}

/**
 * Locates the next `&&`…`!!` frame. The end marker is searched from just after the start marker,
 * so a second `&&` before the first `!!` is swallowed into the frame.
 */
function scanFrame(text: string, from: number = 0): ScanResult {
  const start = text.indexOf(FRAME_START, from);
  if (start === -1) {
    // Keep a trailing '&' that could be the first half of a start marker
    const keep = text.endsWith(FRAME_START[0] ?? '&') ? 1 : 0;
    return { frame: null, consumed: Math.max(from, text.length - keep) };
  }
  const end = text.indexOf(FRAME_END, start + FRAME_START.length);
  if (end === -1) {
    return { frame: null, consumed: start };
  }
  const stop = end + FRAME_END.length;
  return { frame: text.slice(start, stop), consumed: stop };
}

/**
 * Splits a complete in-memory text into its frames, in order.
 * Text outside frames and a trailing unterminated frame are dropped.
 */
export function splitFrames(text: string): string[] {
  const frames: string[] = [];
  let offset = 0;
  for (;;) {
    const { frame, consumed } = scanFrame(text, offset);
    if (frame === null) break;
    frames.push(frame);
    offset = consumed;
  }
  return frames;
}

/**
 * Stateful scanner that turns arbitrarily split chunks of a WITS stream into complete frames.
 *
 * One instance serves one stream: after `end()` it rejects further input. Feeding the same chunks
 * to a fresh instance yields the same frames regardless of where the chunk boundaries fall.
 */
export class FrameExtractor {
  private buffer: string = '';
  private decoder: TextDecoder = new TextDecoder('utf-8');
  private _closed: boolean = false;
  private _framesEmitted: number = 0;

  /** Characters currently buffered (a partial frame or a trailing '&') */
  public get pending(): number {
    return this.buffer.length;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public get framesEmitted(): number {
    return this._framesEmitted;
  }

  /**
   * Appends a chunk and returns every frame it completed.
   * Byte chunks are decoded as streaming UTF-8, so a character split across chunks survives.
   * @throws WitsExtractorClosedError after end()
   */
  public push(chunk: string | Uint8Array): string[] {
    if (this._closed) {
      throw new WitsExtractorClosedError();
    }
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });

    const frames: string[] = [];
    for (;;) {
      const { frame, consumed } = scanFrame(this.buffer);
      this.buffer = this.buffer.slice(consumed);
      if (frame === null) break;
      frames.push(frame);
    }
    this._framesEmitted += frames.length;
    return frames;
  }

  /**
   * Finishes the stream. A buffered partial frame is discarded, not reported.
   * @returns Number of characters discarded
   */
  public end(): number {
    if (this._closed) return 0;
    this.buffer += this.decoder.decode();
    const discarded = this.buffer.length;
    this.buffer = '';
    this._closed = true;
    return discarded;
  }

  /**
   * Lazily pulls chunks from `source` and yields complete frames as they appear.
   * The extractor is ended when the source is exhausted or the consumer stops early.
   */
  public async *extract(source: AsyncIterable<string | Uint8Array>): AsyncGenerator<string, void, undefined> {
    try {
      for await (const chunk of source) {
        yield* this.push(chunk);
      }
    } finally {
      this.end();
    }
  }
}
