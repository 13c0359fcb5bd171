// src/commands/index.ts

import type { Command, EncodableCommand } from '../types/rotator-types.js';
import { buildMoveToRequest } from './move-to.js';
import { buildStopRequest } from './stop.js';

export { buildMoveToRequest } from './move-to.js';
export { buildStopRequest } from './stop.js';
export { RT21_QUERY_POSITION, parseQueryPositionResponse } from './query-position.js';

export function isEncodable(command: Command): command is EncodableCommand {
  return command.kind === 'moveTo' || command.kind === 'stop';
}

/**
 * Maps a move or stop command to its RT21 wire string.
 * Queries use the fixed RT21_QUERY_POSITION literal and invalid commands are never sent.
 * @throws RotatorAzimuthRangeError For a move outside 0-999
 */
export function encodeRt21Command(command: EncodableCommand): string {
  switch (command.kind) {
    case 'moveTo':
      return buildMoveToRequest(command.azimuth);
    case 'stop':
      return buildStopRequest();
  }
}
