// src/constants/constants.ts

/**
 * RT21 device commands (outbound wire literals)
 */
export const RT21_COMMANDS = {
  QUERY_POSITION: 'AI1\r;',
  MOVE_PREFIX: 'AP0',
  MOVE_SUFFIX: '\r;',
  STOP: ';',
} as const;

/**
 * K4 client replies
 */
export const K4_REPLIES = {
  OK: 'OK\r\n',
  ERROR: 'ERROR\r\n',
  POSITION_PREFIX: 'AZ=',
  LINE_END: '\r\n',
} as const;

/** Width of the azimuth field on both wires */
export const AZIMUTH_DIGITS = 3;
export const MIN_WIRE_AZIMUTH = 0;
export const MAX_WIRE_AZIMUTH = 999;

export const DEFAULTS = {
  RT21_HOST: '192.168.1.8',
  RT21_PORT: 6555,
  LISTEN_HOST: '0.0.0.0',
  LISTEN_PORT: 6555,
  CONNECT_TIMEOUT_MS: 5000,
  ACK_TIMEOUT_MS: 2000,
  MAX_BUFFER_SIZE: 8192,
  READ_POLL_INTERVAL_MS: 10,
} as const;

/**
 * Protocol labels used in log context
 */
export const LOG_PROTOCOLS = {
  PROGRAM: 'PROGRAM',
  RT21: 'RT21',
  TRANSLATOR: 'TRANSLATOR',
  PROXY: 'PROXY',
} as const;

export type LogProtocol = (typeof LOG_PROTOCOLS)[keyof typeof LOG_PROTOCOLS];

/**
 * Message directions used in log context
 */
export const LOG_DIRECTIONS = {
  RECEIVED: 'RECEIVED',
  SENT: 'SENT',
  PARSED: 'PARSED',
  RESPONSE: 'RESPONSE',
  REPLIED: 'REPLIED',
  CONNECTION: 'CONNECTION',
  ERROR: 'ERROR',
} as const;

export type LogDirection = (typeof LOG_DIRECTIONS)[keyof typeof LOG_DIRECTIONS];
