import { describe, it, expect, vi, afterEach } from 'vitest';
import { Diagnostics } from '../src/utils/diagnostics.js';
import { decodeBatch, decodeFrame } from '../src/decoder.js';

describe('Diagnostics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts empty', () => {
    const stats = new Diagnostics().getStats();
    expect(stats.framesDecoded).toBe(0);
    expect(stats.errorRate).toBeNull();
    expect(stats.lastFrameTimestamp).toBeNull();
    expect(stats.lastErrors).toEqual([]);
  });

  it('counts issues by kind', () => {
    const diagnostics = new Diagnostics();
    const frames = decodeBatch('&&\n01081\n0108x\n7777\n!!&&\n01102\n!!', { convertTo: 'fps' });
    frames.push(decodeFrame('garbage'));
    for (const frame of frames) diagnostics.recordFrame(frame);

    const stats = diagnostics.getStats();
    expect(stats.framesDecoded).toBe(3);
    expect(stats.framesWithIssues).toBe(2);
    expect(stats.structuralErrors).toBe(1);
    expect(stats.symbolLookupErrors).toBe(1);
    expect(stats.valueCoercionErrors).toBe(1);
    expect(stats.dataPoints).toBe(3);
    expect(stats.unknownCodes).toEqual({ '7777': 1 });
    expect(stats.symbolCounts).toEqual({ '0108': 2, '0110': 1 });
    expect(stats.lastErrors).toEqual([
      "invalid value for 0108: 'x' is not a valid Float",
      'unknown symbol code 7777',
      "structural error: frame must start with '&&' and end with '!!'",
    ]);
  });

  it('warns once the share of bad frames passes the threshold', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const diagnostics = new Diagnostics({ errorRateThreshold: 50 });
    diagnostics.recordFrame(decodeFrame('&&\n01081\n!!'));
    diagnostics.recordFrame(decodeFrame('&&\n7777\n!!'));
    expect(warn).not.toHaveBeenCalled();
    diagnostics.recordFrame(decodeFrame('&&\n7777\n!!'));
    expect(warn).toHaveBeenCalledTimes(1);

    const analysis = diagnostics.analyze();
    expect(analysis.isHealthy).toBe(false);
    expect(analysis.warnings).toEqual([
      'High error rate: 66.67% (threshold: 50%)',
      'Unknown symbol codes: 7777',
    ]);
  });

  it('merges and resets', () => {
    const a = new Diagnostics();
    const b = new Diagnostics();
    a.recordFrame(decodeFrame('&&\n01081\n!!'));
    b.recordFrame(decodeFrame('&&\n01081\n6666\n!!'));
    a.mergeWith(b);
    expect(a.getStats().framesDecoded).toBe(2);
    expect(a.getStats().symbolCounts).toEqual({ '0108': 2 });
    expect(a.getStats().unknownCodes).toEqual({ '6666': 1 });
    expect(JSON.parse(a.serialize()).framesWithIssues).toBe(1);

    a.reset();
    expect(a.getStats().framesDecoded).toBe(0);
    expect(a.analyze().isHealthy).toBe(true);
  });
});
