// src/rt21-client.ts

import { Mutex } from 'async-mutex';
import {
  RT21_QUERY_POSITION,
  encodeRt21Command,
  parseQueryPositionResponse,
} from './commands/index.js';
import {
  DEFAULTS,
  LOG_DIRECTIONS,
  LOG_PROTOCOLS,
  type LogDirection,
  type LogProtocol,
} from './constants/constants.js';
import { RotatorTimeoutError, errorMessage } from './errors.js';
import { logger as rootLogger } from './logger.js';
import type {
  EncodableCommand,
  LogContext,
  Rt21ClientOptions,
  Transport,
  TranslationResult,
} from './types/rotator-types.js';
import { decodeAscii, encodeAscii, toPrintable } from './utils/utils.js';

const logger = rootLogger.createLogger('Rt21Client');

/**
 * Speaks the RT21 protocol over an already connected transport.
 *
 * Every request is a write followed by a read, run under a mutex so only one is in
 * flight. Nothing here reconnects: once the socket is gone each call reports `failed`.
 */
class Rt21Client {
  private transport: Transport;
  private ackTimeout: number;
  private sessionId: number | undefined;
  private _mutex: Mutex = new Mutex();

  constructor(transport: Transport, options: Rt21ClientOptions = {}) {
    this.transport = transport;
    this.ackTimeout = options.ackTimeout ?? DEFAULTS.ACK_TIMEOUT_MS;
    this.sessionId = options.sessionId;
  }

  private _context(
    direction: LogDirection,
    protocol: LogProtocol = LOG_PROTOCOLS.RT21
  ): LogContext {
    return this.sessionId === undefined
      ? { protocol, direction }
      : { session: this.sessionId, protocol, direction };
  }

  /**
   * Asks the device for its azimuth.
   *
   * The reply is read without a timeout, so a silent device stalls the caller until the
   * socket closes.
   */
  public async queryPosition(): Promise<TranslationResult> {
    return this._mutex.runExclusive(async (): Promise<TranslationResult> => {
      try {
        // A late move/stop acknowledgment must not be read as the position
        await this.transport.flush();
        await this.transport.write(encodeAscii(RT21_QUERY_POSITION));
        logger.info(toPrintable(RT21_QUERY_POSITION), this._context(LOG_DIRECTIONS.SENT));

        const response = await this.transport.read();
        if (response.length === 0) {
          return this._failed('RT21 closed the connection before answering');
        }
        const text = decodeAscii(response).trim();
        logger.info(toPrintable(text), this._context(LOG_DIRECTIONS.RESPONSE));

        return { kind: 'position', azimuth: parseQueryPositionResponse(text) };
      } catch (err: unknown) {
        return this._failed(`RT21 query failed: ${errorMessage(err)}`);
      }
    });
  }

  /**
   * Sends a move or stop and waits briefly for an optional acknowledgment.
   * A missing acknowledgment is not an error.
   * @throws RotatorAzimuthRangeError Before anything is written, for a move outside 0-999
   */
  public async send(command: EncodableCommand): Promise<TranslationResult> {
    const wire = encodeRt21Command(command);
    return this._mutex.runExclusive(async (): Promise<TranslationResult> => {
      try {
        await this.transport.write(encodeAscii(wire));
        logger.info(toPrintable(wire), this._context(LOG_DIRECTIONS.SENT));
      } catch (err: unknown) {
        return this._failed(`RT21 communication failed: ${errorMessage(err)}`);
      }

      try {
        const response = await this.transport.read(this.ackTimeout);
        if (response.length === 0) return { kind: 'acknowledged' };
        const text = decodeAscii(response);
        logger.info(toPrintable(text), this._context(LOG_DIRECTIONS.RESPONSE));
        return { kind: 'acknowledged', response: text };
      } catch (err: unknown) {
        if (err instanceof RotatorTimeoutError) {
          logger.debug(
            `No acknowledgment within ${this.ackTimeout}ms`,
            this._context(LOG_DIRECTIONS.RESPONSE)
          );
          return { kind: 'acknowledged' };
        }
        return this._failed(`RT21 acknowledgment read failed: ${errorMessage(err)}`);
      }
    });
  }

  private _failed(reason: string): TranslationResult {
    logger.error(reason, this._context(LOG_DIRECTIONS.ERROR, LOG_PROTOCOLS.TRANSLATOR));
    return { kind: 'failed', reason };
  }
}

export default Rt21Client;
