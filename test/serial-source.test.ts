import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import {
  SerialSource,
  type SerialPortLike,
  type SerialPortSettings,
} from '../src/transport/node-transports/serial-source.js';
import { FrameReader } from '../src/transport/frame-reader.js';
import { WitsConnectionError, WitsTransportError } from '../src/errors.js';
import type { SerialSourceOptions } from '../src/types/wits-types.js';

class FakePort extends EventEmitter implements SerialPortLike {
  isOpen = false;
  settings: SerialPortSettings | null = null;

  private pendingOpen: ((err: Error | null) => void) | null = null;

  constructor(
    private readonly openError: Error | null = null,
    private readonly deferOpen: boolean = false
  ) {
    super();
  }

  get opening(): boolean {
    return this.pendingOpen !== null;
  }

  open(callback: (err: Error | null) => void): void {
    if (this.deferOpen) this.pendingOpen = callback;
    else this.finishOpen(callback);
  }

  completeOpen(): void {
    const callback = this.pendingOpen;
    this.pendingOpen = null;
    if (callback) this.finishOpen(callback);
  }

  private finishOpen(callback: (err: Error | null) => void): void {
    this.isOpen = this.openError === null;
    callback(this.openError);
  }

  close(callback: (err: Error | null) => void): void {
    this.isOpen = false;
    this.emit('close');
    callback(null);
  }
}

function sourceWith(port: FakePort, options: SerialSourceOptions = {}): SerialSource {
  return new SerialSource('/dev/ttyTEST', options, settings => {
    port.settings = settings;
    return port;
  });
}

describe('SerialSource', () => {
  it('opens the port with 9600 8N1 defaults', async () => {
    const port = new FakePort();
    const source = sourceWith(port);
    await source.connect();
    expect(port.settings).toEqual({
      path: '/dev/ttyTEST',
      baudRate: 9600,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      autoOpen: false,
    });
    expect(source.isOpen).toBe(true);
  });

  it('passes line settings through', async () => {
    const port = new FakePort();
    await sourceWith(port, { baudRate: 19200, parity: 'even' }).connect();
    expect(port.settings?.baudRate).toBe(19200);
    expect(port.settings?.parity).toBe('even');
  });

  it('yields frames from received bytes', async () => {
    const port = new FakePort();
    const source = sourceWith(port);
    await source.connect();
    port.emit('data', Buffer.from('&&\r\n0108'));
    port.emit('data', Buffer.from('1.5\r\n!!\r\n'));

    const reader = new FrameReader(source);
    expect(await reader.next()).toBe('&&\r\n01081.5\r\n!!');
    await reader.close();
    expect(port.isOpen).toBe(false);
  });

  it('ends the stream when the port closes', async () => {
    const port = new FakePort();
    const source = sourceWith(port);
    await source.connect();
    const reader = new FrameReader(source);
    const pending = reader.next();
    port.emit('close');
    expect(await pending).toBeNull();
  });

  it('surfaces port errors to the reader', async () => {
    const port = new FakePort();
    const source = sourceWith(port);
    await source.connect();
    port.emit('error', new Error('unplugged'));
    const reader = new FrameReader(source);
    await expect(reader.next()).rejects.toThrow(WitsTransportError);
    await expect(source.chunks().next()).rejects.toThrow('Serial port /dev/ttyTEST failed: unplugged');
  });

  it('fails with a connection error when the port cannot be opened', async () => {
    const source = sourceWith(new FakePort(new Error('Permission denied')));
    await expect(source.connect()).rejects.toThrow(WitsConnectionError);
    await expect(source.connect()).rejects.toThrow('Failed to connect to /dev/ttyTEST: Permission denied');
  });

  it('closes a port that finishes opening after close() was called', async () => {
    const port = new FakePort(null, true);
    const source = sourceWith(port);
    const reader = new FrameReader(source);
    const pending = reader.next();
    await vi.waitFor(() => expect(port.opening).toBe(true));

    const closing = reader.close();
    port.completeOpen();
    expect(await pending).toBeNull();
    await closing;
    expect(port.isOpen).toBe(false);
    expect(source.isOpen).toBe(false);
  });
});
