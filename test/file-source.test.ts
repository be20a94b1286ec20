import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileSource } from '../src/transport/node-transports/file-source.js';
import { WitsDecoder } from '../src/decoder.js';
import { WitsSourceClosedError } from '../src/errors.js';
import type { DecodedFrame } from '../src/types/wits-types.js';

const CAPTURE = [
  'header noise\r\n',
  '&&\r\n0101WELL-A 7\r\n01083650.40\r\n011323.38\r\n!!\r\n',
  '&&\r\n01083651.10\r\n9999123\r\n!!\r\n',
  '&&\r\n0108',
].join('');

describe('FileSource', () => {
  let dir = '';
  let path = '';

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'wits-'));
    path = join(dir, 'capture.wits');
    writeFileSync(path, CAPTURE, 'utf8');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('decodes every complete frame of a capture read in small chunks', async () => {
    const decoder = new WitsDecoder({ source: 'capture' });
    const frames: DecodedFrame[] = [];
    for await (const frame of decoder.stream(new FileSource(path, { highWaterMark: 8 }))) frames.push(frame);

    expect(frames).toHaveLength(2);
    expect(frames[0]?.dataPoints.map(point => point.parsedValue)).toEqual(['WELL-A 7', 3650.4, 23.38]);
    expect(frames[1]?.dataPoints.map(point => point.parsedValue)).toEqual([3651.1]);
    expect(frames[1]?.errors).toEqual(['unknown symbol code 9999']);
  });

  it('refuses to stream after close', async () => {
    const source = new FileSource(path);
    await source.close();
    await source.close();
    await expect(source.chunks().next()).rejects.toThrow(WitsSourceClosedError);
  });
});
