// src/session.ts

import { isEncodable } from './commands/index.js';
import {
  LOG_DIRECTIONS,
  LOG_PROTOCOLS,
  type LogDirection,
  type LogProtocol,
} from './constants/constants.js';
import { RotatorAzimuthRangeError, errorMessage } from './errors.js';
import { logger as rootLogger } from './logger.js';
import { describeCommand, parseClientCommand } from './protocol/k4-parser.js';
import { formatReply } from './protocol/reply-formatter.js';
import Rt21Client from './rt21-client.js';
import type {
  Command,
  LogContext,
  ReplyFormatterOptions,
  SessionOptions,
  SessionState,
  Transport,
  TranslationResult,
} from './types/rotator-types.js';
import { decodeAscii, toPrintable } from './utils/utils.js';

const logger = rootLogger.createLogger('Session');

interface Translation {
  /** The command as it is answered; an unencodable move is answered as invalid */
  command: Command;
  result: TranslationResult | null;
}

/**
 * Couples one client connection to one RT21 connection.
 *
 * connecting → active → closing → closed. A failed device connect skips `active`.
 * Requests are served strictly one at a time. Both transports are closed exactly
 * once on every exit path.
 */
class Session {
  public readonly id: number;
  public readonly peer: string;
  private _state: SessionState = 'connecting';
  private client: Transport;
  private device: Transport;
  private rt21: Rt21Client;
  private signal: AbortSignal | undefined;
  private formatterOptions: ReplyFormatterOptions;
  private _closing: Promise<void> | null = null;

  constructor(client: Transport, device: Transport, options: SessionOptions) {
    this.id = options.id;
    this.peer = options.peer;
    this.client = client;
    this.device = device;
    this.signal = options.signal;
    this.formatterOptions = { moveFailurePolicy: options.moveFailurePolicy };
    this.rt21 = new Rt21Client(device, { ackTimeout: options.ackTimeout, sessionId: options.id });
  }

  public get state(): SessionState {
    return this._state;
  }

  private _context(direction: LogDirection, protocol: LogProtocol): LogContext {
    return { session: this.id, peer: this.peer, protocol, direction };
  }

  /**
   * Runs the session to completion. Never rejects.
   */
  public async run(): Promise<void> {
    logger.info(
      `Client connected: ${this.peer}`,
      this._context(LOG_DIRECTIONS.CONNECTION, LOG_PROTOCOLS.PROXY)
    );
    try {
      // close() may have started while the device was still connecting
      if ((await this._connectDevice()) && this._closing === null) {
        this._state = 'active';
        await this._serve();
      }
    } catch (err: unknown) {
      logger.error(
        `Client handler error: ${errorMessage(err)}`,
        this._context(LOG_DIRECTIONS.ERROR, LOG_PROTOCOLS.PROXY)
      );
    } finally {
      await this.close();
    }
  }

  private async _connectDevice(): Promise<boolean> {
    try {
      await this.device.connect();
      logger.info(
        'Connected to RT21',
        this._context(LOG_DIRECTIONS.CONNECTION, LOG_PROTOCOLS.RT21)
      );
      return true;
    } catch (err: unknown) {
      logger.error(
        `Could not connect to RT21: ${errorMessage(err)}`,
        this._context(LOG_DIRECTIONS.ERROR, LOG_PROTOCOLS.RT21)
      );
      return false;
    }
  }

  private async _serve(): Promise<void> {
    while (this._state === 'active') {
      // Cancellation is seen here; a read that is already waiting is not interrupted
      if (this.signal?.aborted) {
        logger.info(
          'Shutdown requested',
          this._context(LOG_DIRECTIONS.CONNECTION, LOG_PROTOCOLS.PROXY)
        );
        return;
      }

      const data = await this.client.read();
      if (data.length === 0) return;

      const reply = await this.handle(data);
      await this.client.write(reply);
      logger.info(
        toPrintable(decodeAscii(reply).trim()),
        this._context(LOG_DIRECTIONS.REPLIED, LOG_PROTOCOLS.PROGRAM)
      );
    }
  }

  /**
   * Parses one client request, forwards it to the device and returns the K4 reply.
   */
  public async handle(data: Uint8Array): Promise<Uint8Array> {
    logger.info(
      toPrintable(decodeAscii(data).trim()),
      this._context(LOG_DIRECTIONS.RECEIVED, LOG_PROTOCOLS.PROGRAM)
    );

    const parsed = parseClientCommand(data);
    logger.info(
      `Command: ${describeCommand(parsed)}`,
      this._context(LOG_DIRECTIONS.PARSED, LOG_PROTOCOLS.TRANSLATOR)
    );

    const { command, result } = await this._translate(parsed);
    return formatReply(command, result, this.formatterOptions);
  }

  private async _translate(command: Command): Promise<Translation> {
    if (command.kind === 'query') {
      return { command, result: await this.rt21.queryPosition() };
    }
    if (!isEncodable(command)) {
      return { command, result: null };
    }
    try {
      return { command, result: await this.rt21.send(command) };
    } catch (err: unknown) {
      if (err instanceof RotatorAzimuthRangeError) {
        logger.warn(err.message, this._context(LOG_DIRECTIONS.PARSED, LOG_PROTOCOLS.TRANSLATOR));
        return { command: { kind: 'invalid' }, result: null };
      }
      throw err;
    }
  }

  /**
   * Closes both connections. Later calls return the same promise.
   */
  public close(): Promise<void> {
    if (!this._closing) {
      this._closing = this._teardown();
    }
    return this._closing;
  }

  private async _teardown(): Promise<void> {
    this._state = 'closing';
    const [device, client] = await Promise.allSettled([
      this.device.disconnect(),
      this.client.disconnect(),
    ]);
    if (device.status === 'rejected') {
      logger.warn(
        `Error closing RT21 connection: ${errorMessage(device.reason)}`,
        this._context(LOG_DIRECTIONS.ERROR, LOG_PROTOCOLS.RT21)
      );
    } else {
      logger.info(
        'Disconnected from RT21',
        this._context(LOG_DIRECTIONS.CONNECTION, LOG_PROTOCOLS.RT21)
      );
    }
    if (client.status === 'rejected') {
      logger.warn(
        `Error closing client connection: ${errorMessage(client.reason)}`,
        this._context(LOG_DIRECTIONS.ERROR, LOG_PROTOCOLS.PROXY)
      );
    }
    this._state = 'closed';
    logger.info(
      'Client disconnected',
      this._context(LOG_DIRECTIONS.CONNECTION, LOG_PROTOCOLS.PROXY)
    );
  }
}

export default Session;
