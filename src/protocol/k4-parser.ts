// src/protocol/k4-parser.ts

import type { Command } from '../types/rotator-types.js';
import { decodeAscii, isDigit } from '../utils/utils.js';

const INVALID: Command = { kind: 'invalid' };

/**
 * Reads the run of decimal digits starting at `start`.
 * @returns the digit run, empty when `text[start]` is not a digit
 */
function readDigitRun(text: string, start: number): string {
  let end = start;
  while (isDigit(text[end])) end++;
  return text.slice(start, end);
}

/**
 * Classifies one client request.
 *
 * The input is decoded as ASCII (non-ASCII bytes are dropped) and trimmed.
 * Matching is case-insensitive:
 *
 * - `C...` is a position query
 * - `M` followed by digits is a move; trailing text after the digits is ignored
 * - `S`, `STOP` or `;` on its own is a stop
 *
 * Everything else, including an empty request, is `invalid`.
 */
export function parseClientCommand(data: Uint8Array | string): Command {
  const text = decodeAscii(data).trim();
  const upper = text.toUpperCase();
  const head = upper.charAt(0);

  if (head === 'C') {
    return { kind: 'query' };
  }

  if (head === 'M') {
    const digits = readDigitRun(upper, 1);
    if (digits.length > 0) {
      return { kind: 'moveTo', azimuth: Number.parseInt(digits, 10) };
    }
  }

  if (upper === 'S' || upper === 'STOP' || upper === ';') {
    return { kind: 'stop' };
  }

  return INVALID;
}

/**
 * Short human-readable form of a command for logs.
 */
export function describeCommand(command: Command): string {
  switch (command.kind) {
    case 'query':
      return 'query';
    case 'moveTo':
      return `move to ${command.azimuth}`;
    case 'stop':
      return 'stop';
    case 'invalid':
      return 'no valid command found';
  }
}
