// src/transport/node-tcp-transport.ts

import * as net from 'node:net';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, allocUint8Array, decodeAscii, toPrintable } from '../utils/utils.js';
import { logger as rootLogger } from '../logger.js';
import { DEFAULTS } from '../constants/constants.js';
import {
  RotatorConnectionError,
  RotatorConnectionTimeoutError,
  RotatorNotConnectedError,
  RotatorTimeoutError,
} from '../errors.js';
import type { NodeTcpTransportOptions, Transport } from '../types/rotator-types.js';

const logger = rootLogger.createLogger('NodeTcpTransport');

class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);

  private _isConnecting: boolean = false;
  private _peerClosed: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      connectTimeout: options.connectTimeout || DEFAULTS.CONNECT_TIMEOUT_MS,
      maxBufferSize: options.maxBufferSize || DEFAULTS.MAX_BUFFER_SIZE,
      pollInterval: options.pollInterval || DEFAULTS.READ_POLL_INTERVAL_MS,
    };
  }

  /**
   * Wraps a socket that is already connected, e.g. one accepted by a server.
   */
  public static fromSocket(
    socket: net.Socket,
    options: NodeTcpTransportOptions = {}
  ): NodeTcpTransport {
    const transport = new NodeTcpTransport(
      socket.remoteAddress ?? 'unknown',
      socket.remotePort ?? 0,
      options
    );
    transport._attach(socket);
    transport.isOpen = !socket.destroyed;
    return transport;
  }

  public get address(): string {
    return `${this.host}:${this.port}`;
  }

  /**
   * Opens the socket. Fails after `connectTimeout`; never retries.
   */
  public async connect(): Promise<void> {
    if (this._isConnecting || this.isOpen) return;
    this._isConnecting = true;
    this._peerClosed = false;

    return new Promise((resolve, reject) => {
      logger.info(`Connecting to ${this.address}...`);

      const socket = net.connect({ host: this.host, port: this.port });
      this._attach(socket);

      const fail = (err: Error): void => {
        if (!this._isConnecting) return;
        this._isConnecting = false;
        socket.destroy();
        reject(err);
      };

      socket.once('connect', () => {
        this.isOpen = true;
        this._isConnecting = false;
        socket.setTimeout(0);
        socket.setNoDelay(true);
        logger.info(`SUCCESS: Connected to ${this.address}`);
        resolve();
      });
      socket.once('error', err => fail(new RotatorConnectionError(err.message)));
      // destroy() during the handshake emits neither 'connect' nor 'error'
      socket.once('close', () => fail(new RotatorConnectionError('Closed while connecting')));
      socket.setTimeout(this.options.connectTimeout, () =>
        fail(new RotatorConnectionTimeoutError(this.host, this.port, this.options.connectTimeout))
      );
    });
  }

  private _attach(socket: net.Socket): void {
    this.socket = socket;
    socket.on('data', (data: Buffer) => this._onData(data));
    // With allowHalfOpen the write side stays usable after the peer's FIN
    socket.on('end', () => {
      this._peerClosed = true;
    });
    socket.on('error', err => this._onError(err));
    socket.on('close', () => this._onClose());
  }

  private _onData(data: Buffer): void {
    logger.trace(`RX ${this.address} (${data.length} bytes): ${toPrintable(decodeAscii(data))}`);
    const chunk = new Uint8Array(data);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      logger.warn(
        `Read buffer overflow on ${this.address}, dropping ${this.readBuffer.length} bytes`
      );
      this.readBuffer = allocUint8Array(0);
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
  }

  private _onError(err: Error): void {
    if (this._isConnecting) return;
    logger.error(`Socket error on ${this.address}: ${err.message}`);
  }

  private _onClose(): void {
    this.isOpen = false;
    this._peerClosed = true;
    logger.debug(`Connection closed for ${this.address}`);
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this.isOpen || !socket) throw new RotatorNotConnectedError();
    await this._operationMutex.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          logger.trace(`TX ${this.address}: ${toPrintable(decodeAscii(buffer))}`);
          socket.write(Buffer.from(buffer), err => {
            if (err) reject(new RotatorConnectionError(err.message));
            else resolve();
          });
        })
    );
  }

  /**
   * Waits for data and returns everything buffered so far.
   * @param timeout - ms to wait; unbounded when omitted
   * @returns the buffered bytes, or an empty array once the peer has closed
   * @throws RotatorTimeoutError If nothing arrived in time
   */
  public async read(timeout: number = Infinity): Promise<Uint8Array> {
    const start = Date.now();
    return this._operationMutex.runExclusive(
      () =>
        new Promise<Uint8Array>((resolve, reject) => {
          const check = (): void => {
            if (this.readBuffer.length > 0) {
              const data = this.readBuffer;
              this.readBuffer = allocUint8Array(0);
              return resolve(data);
            }
            if (this._peerClosed || !this.socket) return resolve(allocUint8Array(0));
            if (Date.now() - start >= timeout) {
              return reject(
                new RotatorTimeoutError(`No data from ${this.address} within ${timeout}ms`)
              );
            }
            setTimeout(check, this.options.pollInterval);
          };
          check();
        })
    );
  }

  /**
   * Closes the socket. Safe to call more than once.
   */
  public async disconnect(): Promise<void> {
    const socket = this.socket;
    this.isOpen = false;
    if (!socket || socket.destroyed) return;
    return new Promise(resolve => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }

  public async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }
}

export default NodeTcpTransport;
