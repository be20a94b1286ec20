// src/transport/node-transports/tcp-source.ts

import * as net from 'node:net';
import { Mutex } from 'async-mutex';
import { ChunkQueue } from '../chunk-queue.js';
import { rootLogger } from '../../logger.js';
import { WitsConnectionError, WitsSourceClosedError, WitsTransportError } from '../../errors.js';
import {
  DEFAULT_HANDSHAKE_INTERVAL_MS,
  DEFAULT_HANDSHAKE_PACKET,
  DEFAULT_REQUEST_PACKET,
} from '../../constants/constants.js';
import type { FrameSource, TcpSourceOptions } from '../../types/wits-types.js';

const logger = rootLogger.createLogger('TcpSource');

interface ResolvedTcpOptions {
  request: string | null;
  handshake: { packet: string; intervalMs: number } | null;
  connectTimeout: number;
  encoding: BufferEncoding;
}

/**
 * Reads a WITS feed from a TCP server.
 *
 * After connecting it optionally sends a request packet and then a periodic handshake frame.
 * Some servers echo the handshake back; `isOwnFrame` lets readers drop those echoes.
 */
export class TcpSource implements FrameSource {
  private readonly host: string;
  private readonly port: number;
  private readonly options: ResolvedTcpOptions;
  private socket: net.Socket | null = null;
  private connecting: net.Socket | null = null;
  private queue: ChunkQueue | null = null;
  private handshakeTimer: NodeJS.Timeout | null = null;
  private _closed: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: TcpSourceOptions = {}) {
    this.host = host;
    this.port = port;
    const handshake = options.handshake ?? false;
    this.options = {
      request: options.request === true ? DEFAULT_REQUEST_PACKET : options.request || null,
      handshake:
        handshake === false
          ? null
          : {
              packet: handshake.packet ?? DEFAULT_HANDSHAKE_PACKET,
              intervalMs: handshake.intervalMs ?? DEFAULT_HANDSHAKE_INTERVAL_MS,
            },
      connectTimeout: options.connectTimeout ?? 5000,
      encoding: options.encoding ?? 'utf8',
    };
  }

  private get target(): string {
    return `${this.host}:${this.port}`;
  }

  get isOpen(): boolean {
    return this.socket !== null && !this._closed;
  }

  /**
   * Opens the connection. Called by `chunks()` when needed.
   * @throws WitsConnectionError when the server is unreachable or the timeout expires
   */
  async connect(): Promise<void> {
    await this._operationMutex.runExclusive(async () => {
      if (this._closed) throw new WitsSourceClosedError();
      if (this.socket) return;
      const socket = await this.openSocket();
      if (this._closed) {
        // close() ran while the connection was being established
        socket.destroy();
        throw new WitsSourceClosedError();
      }
      this.socket = socket;
      this.queue = new ChunkQueue();
      this.attach(socket, this.queue);
      if (this.options.request !== null) await this.send(this.options.request);
      this.startHandshake();
    });
  }

  private openSocket(): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      logger.info(`Connecting to ${this.target}...`, { source: this.target, transport: 'tcp' });
      const socket = net.connect({ host: this.host, port: this.port });
      this.connecting = socket;

      const settle = (): void => {
        clearTimeout(timer);
        this.connecting = null;
        socket.off('error', onError);
        socket.off('close', onClose);
      };
      const timer = setTimeout(() => {
        settle();
        socket.destroy();
        reject(new WitsConnectionError(this.target, 'connection timeout'));
      }, this.options.connectTimeout);

      const onError = (err: Error): void => {
        settle();
        reject(new WitsConnectionError(this.target, err.message));
      };
      const onClose = (): void => {
        settle();
        reject(new WitsSourceClosedError());
      };
      socket.once('error', onError);
      socket.once('close', onClose);
      socket.once('connect', () => {
        settle();
        socket.setNoDelay(true);
        logger.info(`Connected to ${this.target}`, { source: this.target, transport: 'tcp' });
        resolve(socket);
      });
    });
  }

  private attach(socket: net.Socket, queue: ChunkQueue): void {
    socket.on('data', (data: Buffer) => queue.push(new Uint8Array(data)));
    socket.on('error', (err: Error) => {
      logger.error(`Socket error: ${err.message}`, { source: this.target, transport: 'tcp' });
      queue.fail(new WitsTransportError(`Connection to ${this.target} failed: ${err.message}`));
    });
    socket.on('close', () => {
      this.stopHandshake();
      if (!this._closed) logger.warn(`Connection closed by ${this.target}`, { source: this.target, transport: 'tcp' });
      queue.end();
    });
  }

  private send(packet: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = this.socket;
      if (socket === null || socket.destroyed) {
        reject(new WitsTransportError(`Not connected to ${this.target}`));
        return;
      }
      socket.write(packet, this.options.encoding, err => (err ? reject(err) : resolve()));
    });
  }

  private startHandshake(): void {
    const handshake = this.options.handshake;
    if (handshake === null) return;
    const sendHandshake = (): void => {
      this.send(handshake.packet).catch((err: unknown) => {
        logger.warn(`Handshake failed: ${err instanceof Error ? err.message : String(err)}`, {
          source: this.target,
          transport: 'tcp',
        });
      });
    };
    sendHandshake();
    this.handshakeTimer = setInterval(sendHandshake, handshake.intervalMs);
    this.handshakeTimer.unref();
  }

  private stopHandshake(): void {
    if (this.handshakeTimer) clearInterval(this.handshakeTimer);
    this.handshakeTimer = null;
  }

  async *chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    if (this._closed) throw new WitsSourceClosedError();
    try {
      await this.connect();
    } catch (err: unknown) {
      // Closed while connecting: the sequence just ends
      if (this._closed) return;
      throw err;
    }
    const queue = this.queue;
    if (queue === null) return;
    yield* queue;
  }

  /** True for the handshake frame this source sends itself */
  isOwnFrame(frame: string): boolean {
    const handshake = this.options.handshake;
    return handshake !== null && frame.trim() === handshake.packet.trim();
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    this.connecting?.destroy();
    // Serialised with connect(): a socket it is still opening is released there
    await this._operationMutex.runExclusive(async () => {
      this.stopHandshake();
      this.queue?.end();
      const socket = this.socket;
      this.socket = null;
      if (socket === null || socket.destroyed) return;
      await new Promise<void>(resolve => {
        socket.once('close', () => resolve());
        socket.destroy();
      });
      logger.info(`Disconnected from ${this.target}`, { source: this.target, transport: 'tcp' });
    });
  }
}
