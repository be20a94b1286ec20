import { describe, it, expect } from 'vitest';
import { FrameExtractor, splitFrames } from '../src/framers/frame-extractor.js';
import { WitsExtractorClosedError } from '../src/errors.js';

const STREAM = 'noise&&\n01081.5\n!!junk&&\n01132.5\n!!tail&&\n0110';

async function* fromArray<T>(items: T[]): AsyncGenerator<T, void, undefined> {
  for (const item of items) yield item;
}

describe('splitFrames', () => {
  it('returns complete frames in order and drops text outside them', () => {
    expect(splitFrames(STREAM)).toEqual(['&&\n01081.5\n!!', '&&\n01132.5\n!!']);
  });

  it('returns nothing for text without a start marker', () => {
    expect(splitFrames('010812345')).toEqual([]);
  });

  it('keeps a second start marker inside the first frame', () => {
    expect(splitFrames('&&\n01081\n&&\n01102\n!!')).toEqual(['&&\n01081\n&&\n01102\n!!']);
  });
});

describe('FrameExtractor', () => {
  it('assembles a frame split across chunks', () => {
    const extractor = new FrameExtractor();
    expect(extractor.push('&')).toEqual([]);
    expect(extractor.pending).toBe(1);
    expect(extractor.push('&\n0108')).toEqual([]);
    expect(extractor.push('12.5\n!')).toEqual([]);
    expect(extractor.push('!')).toEqual(['&&\n010812.5\n!!']);
    expect(extractor.pending).toBe(0);
    expect(extractor.framesEmitted).toBe(1);
  });

  it('discards garbage before a frame', () => {
    const extractor = new FrameExtractor();
    expect(extractor.push('garbage')).toEqual([]);
    expect(extractor.pending).toBe(0);
  });

  it('yields the same frames however the input is chunked', () => {
    const whole = new FrameExtractor().push(STREAM);
    const perChar = new FrameExtractor();
    const collected: string[] = [];
    for (const ch of STREAM) collected.push(...perChar.push(ch));
    const pairs = new FrameExtractor();
    const collectedPairs: string[] = [];
    for (let i = 0; i < STREAM.length; i += 2) collectedPairs.push(...pairs.push(STREAM.slice(i, i + 2)));

    expect(whole).toEqual(['&&\n01081.5\n!!', '&&\n01132.5\n!!']);
    expect(collected).toEqual(whole);
    expect(collectedPairs).toEqual(whole);
  });

  it('keeps a multi-byte character split across byte chunks', () => {
    const bytes = new TextEncoder().encode('&&\n0101Wéll\n!!');
    const cut = bytes.indexOf(0xc3) + 1;
    const extractor = new FrameExtractor();
    expect(extractor.push(bytes.subarray(0, cut))).toEqual([]);
    expect(extractor.push(bytes.subarray(cut))).toEqual(['&&\n0101Wéll\n!!']);
  });

  it('discards a partial frame at end of stream and rejects further input', () => {
    const extractor = new FrameExtractor();
    extractor.push('&&\n0108');
    expect(extractor.end()).toBe(7);
    expect(extractor.closed).toBe(true);
    expect(extractor.end()).toBe(0);
    expect(() => extractor.push('!!')).toThrow(WitsExtractorClosedError);
  });

  it('extracts frames lazily from an async source', async () => {
    const extractor = new FrameExtractor();
    const frames: string[] = [];
    for await (const frame of extractor.extract(fromArray(['&&\n01', '081.5\n!!&&\n01', '132.5\n!!&&']))) {
      frames.push(frame);
    }
    expect(frames).toEqual(['&&\n01081.5\n!!', '&&\n01132.5\n!!']);
    expect(extractor.closed).toBe(true);
  });
});
