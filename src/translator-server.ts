// src/translator-server.ts

import * as net from 'node:net';
import { RT21_QUERY_POSITION, parseQueryPositionResponse } from './commands/index.js';
import { DEFAULTS } from './constants/constants.js';
import { errorMessage } from './errors.js';
import { logger as rootLogger } from './logger.js';
import { DEFAULT_MOVE_FAILURE_POLICY } from './protocol/reply-formatter.js';
import Session from './session.js';
import NodeTcpTransport from './transport/node-tcp-transport.js';
import type {
  ListenAddress,
  Transport,
  TransportFactory,
  TranslatorServerOptions,
} from './types/rotator-types.js';
import { decodeAscii, encodeAscii } from './utils/utils.js';

const logger = rootLogger.createLogger('TranslatorServer');

export interface CloseOptions {
  /** Also close every running session instead of letting it finish on its own */
  terminateSessions?: boolean;
}

/**
 * Accepts K4 clients and gives each one its own Session and RT21 connection.
 *
 * Sessions are not limited in number. RT21 units usually take one connection at a
 * time, so two concurrent clients compete for the device.
 */
class TranslatorServer {
  private server: net.Server;
  private options: Required<Omit<TranslatorServerOptions, 'transportFactory'>>;
  private transportFactory: TransportFactory;
  private controller: AbortController = new AbortController();
  private sessions: Map<Session, Promise<void>> = new Map();
  private nextSessionId: number = 1;

  constructor(options: TranslatorServerOptions) {
    this.options = {
      deviceHost: options.deviceHost,
      devicePort: options.devicePort,
      listenHost: options.listenHost ?? DEFAULTS.LISTEN_HOST,
      listenPort: options.listenPort ?? DEFAULTS.LISTEN_PORT,
      connectTimeout: options.connectTimeout ?? DEFAULTS.CONNECT_TIMEOUT_MS,
      ackTimeout: options.ackTimeout ?? DEFAULTS.ACK_TIMEOUT_MS,
      moveFailurePolicy: options.moveFailurePolicy ?? DEFAULT_MOVE_FAILURE_POLICY,
    };
    this.transportFactory =
      options.transportFactory ??
      (() =>
        new NodeTcpTransport(this.options.deviceHost, this.options.devicePort, {
          connectTimeout: this.options.connectTimeout,
        }));

    // A client may half-close right after its last request and still expect the reply
    this.server = net.createServer({ allowHalfOpen: true }, socket =>
      this._onConnection(socket)
    );
    this.server.on('error', err => logger.error(`Server error: ${err.message}`));
  }

  public get activeSessions(): number {
    return this.sessions.size;
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Starts accepting clients.
   * @returns the bound address; useful with port 0
   */
  public async listen(): Promise<ListenAddress> {
    const { listenHost, listenPort } = this.options;
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.server.once('error', onError);
      this.server.listen(listenPort, listenHost, () => {
        this.server.off('error', onError);
        resolve();
      });
    });

    const address = this.server.address();
    const bound: ListenAddress =
      address !== null && typeof address === 'object'
        ? { host: address.address, port: address.port }
        : { host: listenHost, port: listenPort };
    logger.info(`Protocol translator started on port ${bound.port}`);
    logger.info(`Forwarding to RT21 at ${this.options.deviceHost}:${this.options.devicePort}`);
    return bound;
  }

  private _onConnection(socket: net.Socket): void {
    if (this.controller.signal.aborted) {
      socket.destroy();
      return;
    }

    const client = NodeTcpTransport.fromSocket(socket);
    const session = new Session(client, this.transportFactory(), {
      id: this.nextSessionId++,
      peer: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      ackTimeout: this.options.ackTimeout,
      moveFailurePolicy: this.options.moveFailurePolicy,
      signal: this.controller.signal,
    });

    // run() never rejects
    const done = session.run().finally(() => this.sessions.delete(session));
    this.sessions.set(session, done);
  }

  /**
   * Connects once, asks for the position and disconnects.
   * Used at startup to report whether the device is reachable.
   * @returns the azimuth, or null when the device could not be reached or answered nonsense
   */
  public async probeDevice(transport: Transport = this.transportFactory()): Promise<number | null> {
    logger.info('Testing RT21 connection...');
    try {
      await transport.connect();
      await transport.write(encodeAscii(RT21_QUERY_POSITION));
      const response = await transport.read(this.options.connectTimeout);
      if (response.length === 0) {
        logger.warn('RT21 connected but no response');
        return null;
      }
      const azimuth = parseQueryPositionResponse(response);
      logger.info(`RT21 connected - current position: ${decodeAscii(response).trim()}`);
      return azimuth;
    } catch (err: unknown) {
      logger.warn(`Could not connect to RT21 device - ${errorMessage(err)}`);
      return null;
    } finally {
      await transport.disconnect();
    }
  }

  /**
   * Stops accepting clients and signals running sessions to finish after their
   * current request. Sessions waiting on a read keep waiting unless
   * `terminateSessions` is set.
   *
   * Resolves once the server socket is closed. While sessions are left running,
   * that only happens after they end, so it then resolves as soon as accepting stops.
   */
  public async close(options: CloseOptions = {}): Promise<void> {
    this.controller.abort();
    const closed = new Promise<void>(resolve => {
      if (!this.server.listening) return resolve();
      this.server.close(err => {
        if (err) logger.warn(`Server close: ${err.message}`);
        else logger.info('Translator stopped');
        resolve();
      });
    });
    if (options.terminateSessions) {
      await Promise.all([...this.sessions.keys()].map(session => session.close()));
    }
    if (this.sessions.size === 0) await closed;
  }

  /**
   * Resolves once every running session has closed.
   */
  public async drain(): Promise<void> {
    await Promise.all(this.sessions.values());
  }
}

export default TranslatorServer;
