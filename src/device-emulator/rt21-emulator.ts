// src/device-emulator/rt21-emulator.ts

import * as net from 'node:net';
import { AZIMUTH_DIGITS, RT21_COMMANDS } from '../constants/constants.js';
import { logger as rootLogger } from '../logger.js';
import type { ListenAddress, LoggerInstance, Rt21EmulatorOptions } from '../types/rotator-types.js';
import { decodeAscii, isDigit, padAzimuth, toPrintable } from '../utils/utils.js';

const TERMINATOR = ';';

/**
 * In-process stand-in for an RT21 controller.
 *
 * Understands `AI1\r;`, `AP0nnn\r;` and `;`. Moves complete instantly. Every
 * command received is recorded in `received`, in order.
 */
class Rt21Emulator {
  public azimuth: number;
  public readonly received: string[] = [];
  public connections: number = 0;
  private options: Required<Omit<Rt21EmulatorOptions, 'queryResponse'>> & {
    queryResponse: string | null;
  };
  private server: net.Server;
  private sockets: Set<net.Socket> = new Set();
  private logger: LoggerInstance;

  constructor(options: Rt21EmulatorOptions = {}) {
    this.options = {
      host: options.host ?? '127.0.0.1',
      port: options.port ?? 0,
      initialAzimuth: options.initialAzimuth ?? 0,
      acknowledgeMoves: options.acknowledgeMoves ?? false,
      ackDelay: options.ackDelay ?? 0,
      queryResponse: options.queryResponse ?? null,
      silent: options.silent ?? false,
      loggerEnabled: options.loggerEnabled ?? false,
    };
    this.azimuth = this.options.initialAzimuth;
    this.logger = rootLogger.createLogger('Rt21Emulator');
    if (!this.options.loggerEnabled) this.logger.pause();
    this.server = net.createServer(socket => this._onConnection(socket));
  }

  public async start(): Promise<ListenAddress> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Emulator is not bound to a TCP port');
    }
    this.logger.info(`RT21 emulator listening on ${address.address}:${address.port}`);
    return { host: address.address, port: address.port };
  }

  /**
   * Drops every open device connection, as a power-cycled unit would.
   */
  public dropConnections(): void {
    for (const socket of this.sockets) socket.destroy();
  }

  public async stop(): Promise<void> {
    this.dropConnections();
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }

  private _onConnection(socket: net.Socket): void {
    this.connections++;
    this.sockets.add(socket);
    let pending = '';

    socket.on('data', (data: Buffer) => {
      pending += decodeAscii(data);
      let end = pending.indexOf(TERMINATOR);
      while (end !== -1) {
        const command = pending.slice(0, end + 1);
        pending = pending.slice(end + 1);
        this._handleCommand(socket, command);
        end = pending.indexOf(TERMINATOR);
      }
    });
    socket.on('error', err => this.logger.warn(`Emulator socket error: ${err.message}`));
    socket.on('close', () => this.sockets.delete(socket));
  }

  private _handleCommand(socket: net.Socket, command: string): void {
    this.received.push(command);
    this.logger.debug(`Command ${toPrintable(command)}`);

    if (command === RT21_COMMANDS.QUERY_POSITION) {
      if (this.options.silent) return;
      const reply =
        this.options.queryResponse ?? `${padAzimuth(this.azimuth, AZIMUTH_DIGITS)}${TERMINATOR}`;
      socket.write(reply);
      return;
    }

    const target = this._parseMove(command);
    if (target !== null) {
      this.azimuth = target;
    } else if (command !== RT21_COMMANDS.STOP) {
      this.logger.warn(`Unknown command ${toPrintable(command)}`);
      return;
    }
    if (!this.options.acknowledgeMoves) return;

    const ack = `OK${TERMINATOR}`;
    if (this.options.ackDelay > 0) {
      setTimeout(() => {
        if (!socket.destroyed) socket.write(ack);
      }, this.options.ackDelay);
    } else {
      socket.write(ack);
    }
  }

  private _parseMove(command: string): number | null {
    const { MOVE_PREFIX, MOVE_SUFFIX } = RT21_COMMANDS;
    if (!command.startsWith(MOVE_PREFIX) || !command.endsWith(MOVE_SUFFIX)) return null;
    const digits = command.slice(MOVE_PREFIX.length, command.length - MOVE_SUFFIX.length);
    if (digits.length === 0 || !Array.from(digits).every(ch => isDigit(ch))) return null;
    return Number.parseInt(digits, 10);
  }
}

export default Rt21Emulator;
