// src/index.ts

export { default as TranslatorServer } from './translator-server.js';
export type { CloseOptions } from './translator-server.js';
export { default as Session } from './session.js';
export { default as Rt21Client } from './rt21-client.js';
export { default as NodeTcpTransport } from './transport/node-tcp-transport.js';
export { default as Rt21Emulator } from './device-emulator/rt21-emulator.js';
export { default as Logger, logger } from './logger.js';

export { parseClientCommand, describeCommand } from './protocol/k4-parser.js';
export {
  formatReply,
  formatReplyText,
  formatPosition,
  DEFAULT_MOVE_FAILURE_POLICY,
} from './protocol/reply-formatter.js';
export {
  encodeRt21Command,
  isEncodable,
  buildMoveToRequest,
  buildStopRequest,
  RT21_QUERY_POSITION,
  parseQueryPositionResponse,
} from './commands/index.js';
export { loadConfig } from './config.js';
export { runSelfTest, SELF_TEST_CASES } from './self-test.js';

export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/rotator-types.js';
