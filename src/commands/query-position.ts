// src/commands/query-position.ts

import { RT21_COMMANDS } from '../constants/constants.js';
import { RotatorResponseError } from '../errors.js';
import { decodeAscii, isDigit } from '../utils/utils.js';

/** Fixed position query; it takes no arguments so it is sent as-is */
export const RT21_QUERY_POSITION: string = RT21_COMMANDS.QUERY_POSITION;

/**
 * Extracts the azimuth from an RT21 position reply.
 *
 * The device answers with free-form bytes such as `030;`. The first run of
 * decimal digits is the azimuth.
 *
 * @param response - raw reply bytes
 * @returns azimuth in degrees
 * @throws RotatorResponseError If the reply contains no digits
 */
export function parseQueryPositionResponse(response: Uint8Array | string): number {
  const text = decodeAscii(response).trim();

  let start = 0;
  while (start < text.length && !isDigit(text[start])) start++;
  let end = start;
  while (isDigit(text[end])) end++;

  if (end === start) {
    throw new RotatorResponseError(`No azimuth in RT21 response: ${JSON.stringify(text)}`);
  }
  return Number.parseInt(text.slice(start, end), 10);
}
