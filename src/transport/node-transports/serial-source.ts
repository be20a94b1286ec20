// src/transport/node-transports/serial-source.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { ChunkQueue } from '../chunk-queue.js';
import { rootLogger } from '../../logger.js';
import { WitsConnectionError, WitsSourceClosedError, WitsTransportError } from '../../errors.js';
import type { FrameSource, SerialSourceOptions } from '../../types/wits-types.js';

const logger = rootLogger.createLogger('SerialSource');

export interface SerialPortSettings extends Required<SerialSourceOptions> {
  path: string;
  autoOpen: false;
}

/** The part of a `serialport` port this source drives */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
}

export type SerialPortFactory = (settings: SerialPortSettings) => SerialPortLike;

const defaultFactory: SerialPortFactory = settings => new SerialPort(settings);

/**
 * Reads a WITS feed from a serial line (classic WITS runs at 9600 8N1).
 */
export class SerialSource implements FrameSource {
  private readonly settings: SerialPortSettings;
  private readonly factory: SerialPortFactory;
  private port: SerialPortLike | null = null;
  private queue: ChunkQueue | null = null;
  private _closed: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: SerialSourceOptions = {}, factory: SerialPortFactory = defaultFactory) {
    this.settings = {
      path,
      baudRate: 9600,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      ...options,
      autoOpen: false,
    };
    this.factory = factory;
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  /**
   * Opens the port. Called by `chunks()` when needed.
   * @throws WitsConnectionError when the port cannot be opened
   */
  async connect(): Promise<void> {
    await this._operationMutex.runExclusive(async () => {
      if (this._closed) throw new WitsSourceClosedError();
      if (this.port) return;
      const port = this.factory(this.settings);
      await new Promise<void>((resolve, reject) => {
        port.open(err => (err ? reject(new WitsConnectionError(this.settings.path, err.message)) : resolve()));
      });
      if (this._closed) {
        // close() ran while the port was opening
        await this.closePort(port);
        throw new WitsSourceClosedError();
      }
      const queue = new ChunkQueue();
      port.on('data', (data: Buffer) => queue.push(new Uint8Array(data)));
      port.on('error', (err: Error) => {
        logger.error(`Serial port error: ${err.message}`, { source: this.settings.path, transport: 'serial' });
        queue.fail(new WitsTransportError(`Serial port ${this.settings.path} failed: ${err.message}`));
      });
      port.on('close', () => queue.end());
      this.port = port;
      this.queue = queue;
      logger.info(`Opened ${this.settings.path} at ${this.settings.baudRate} baud`, { source: this.settings.path, transport: 'serial' });
    });
  }

  async *chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    if (this._closed) throw new WitsSourceClosedError();
    try {
      await this.connect();
    } catch (err: unknown) {
      // Closed while opening: the sequence just ends
      if (this._closed) return;
      throw err;
    }
    const queue = this.queue;
    if (queue === null) return;
    yield* queue;
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    // Serialised with connect(): a port it is still opening is closed there
    await this._operationMutex.runExclusive(async () => {
      this.queue?.end();
      const port = this.port;
      this.port = null;
      if (port === null || !port.isOpen) return;
      await this.closePort(port);
      logger.info(`Closed ${this.settings.path}`, { source: this.settings.path, transport: 'serial' });
    });
  }

  private closePort(port: SerialPortLike): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      port.close(err =>
        err ? reject(new WitsTransportError(`Failed to close ${this.settings.path}: ${err.message}`)) : resolve()
      );
    });
  }
}
