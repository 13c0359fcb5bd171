// src/protocol/reply-formatter.ts

import { AZIMUTH_DIGITS, K4_REPLIES } from '../constants/constants.js';
import type {
  Command,
  MoveFailurePolicy,
  ReplyFormatterOptions,
  TranslationResult,
} from '../types/rotator-types.js';
import { encodeAscii, padAzimuth } from '../utils/utils.js';

export const DEFAULT_MOVE_FAILURE_POLICY: MoveFailurePolicy = 'acknowledge';

/**
 * K4 position reply, e.g. `AZ=045\r\n`. Azimuths above 999 keep all their digits.
 */
export function formatPosition(azimuth: number): string {
  const digits = padAzimuth(azimuth, AZIMUTH_DIGITS);
  return `${K4_REPLIES.POSITION_PREFIX}${digits}${K4_REPLIES.LINE_END}`;
}

/**
 * Reply text for one command and its translation result.
 */
export function formatReplyText(
  command: Command,
  result: TranslationResult | null,
  options: ReplyFormatterOptions = {}
): string {
  switch (command.kind) {
    case 'invalid':
      return K4_REPLIES.ERROR;

    case 'query':
      return result?.kind === 'position' ? formatPosition(result.azimuth) : K4_REPLIES.ERROR;

    case 'moveTo':
    case 'stop': {
      // Move/stop failures are acknowledged unless the policy says to report them
      const policy = options.moveFailurePolicy ?? DEFAULT_MOVE_FAILURE_POLICY;
      if (result?.kind === 'failed' && policy === 'report') return K4_REPLIES.ERROR;
      return K4_REPLIES.OK;
    }
  }
}

/**
 * Bytes sent back to the client for one command.
 * @param result - null when the device was never contacted
 */
export function formatReply(
  command: Command,
  result: TranslationResult | null,
  options: ReplyFormatterOptions = {}
): Uint8Array {
  return encodeAscii(formatReplyText(command, result, options));
}
