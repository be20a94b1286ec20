import { describe, it, expect, vi } from 'vitest';
import { FrameReader } from '../src/transport/frame-reader.js';
import { IterableSource } from '../src/transport/iterable-source.js';
import { DEFAULT_HANDSHAKE_PACKET } from '../src/constants/constants.js';
import { WitsSourceClosedError } from '../src/errors.js';
import type { FrameSource } from '../src/types/wits-types.js';

function echoingSource(chunks: string[]) {
  const close = vi.fn(async (): Promise<void> => undefined);
  const source: FrameSource = {
    chunks: () => new IterableSource(chunks).chunks(),
    close,
    isOwnFrame: (frame: string) => frame.trim() === DEFAULT_HANDSHAKE_PACKET.trim(),
  };
  return { source, close };
}

describe('FrameReader', () => {
  it('returns frames one at a time, then null', async () => {
    const reader = new FrameReader(new IterableSource(['&&\n01081\n!!&&', '\n01082\n!!']));
    expect(await reader.next()).toBe('&&\n01081\n!!');
    expect(await reader.next()).toBe('&&\n01082\n!!');
    expect(await reader.next()).toBeNull();
    expect(reader.closed).toBe(true);
    expect(await reader.next()).toBeNull();
  });

  it('hands each frame to exactly one concurrent caller', async () => {
    const reader = new FrameReader(new IterableSource(['&&\n01081\n!!', '&&\n01082\n!!', '&&\n01083\n!!']));
    const results = await Promise.all([reader.next(), reader.next(), reader.next(), reader.next()]);
    expect(results).toEqual(['&&\n01081\n!!', '&&\n01082\n!!', '&&\n01083\n!!', null]);
  });

  it('skips frames the source injected itself', async () => {
    const { source, close } = echoingSource([DEFAULT_HANDSHAKE_PACKET, '&&\n01081\n!!']);
    const reader = new FrameReader(source);
    const frames: string[] = [];
    for await (const frame of reader) frames.push(frame);
    expect(frames).toEqual(['&&\n01081\n!!']);
    expect(reader.skipped).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('keeps injected frames when asked to', async () => {
    const reader = new FrameReader(echoingSource([DEFAULT_HANDSHAKE_PACKET]).source, { skipOwnFrames: false });
    expect(await reader.next()).toBe(DEFAULT_HANDSHAKE_PACKET.trim());
  });

  it('closes the source only once', async () => {
    const { source, close } = echoingSource(['&&\n01081\n!!']);
    const reader = new FrameReader(source);
    await reader.next();
    await reader.close();
    await reader.close();
    expect(close).toHaveBeenCalledTimes(1);
    expect(await reader.next()).toBeNull();
  });
});

describe('IterableSource', () => {
  it('refuses to stream after close', async () => {
    const source = new IterableSource(['&&\n!!']);
    await source.close();
    await expect(source.chunks().next()).rejects.toThrow(WitsSourceClosedError);
  });
});
