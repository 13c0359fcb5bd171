// src/commands/move-to.ts

import {
  AZIMUTH_DIGITS,
  MAX_WIRE_AZIMUTH,
  MIN_WIRE_AZIMUTH,
  RT21_COMMANDS,
} from '../constants/constants.js';
import { RotatorAzimuthRangeError } from '../errors.js';
import { padAzimuth } from '../utils/utils.js';

/**
 * Validates that an azimuth fits the 3-digit RT21 field.
 * Values from 360 to 999 fit and are passed through; the device decides what to do with them.
 */
function validateWireAzimuth(azimuth: number): void {
  if (!Number.isInteger(azimuth) || azimuth < MIN_WIRE_AZIMUTH || azimuth > MAX_WIRE_AZIMUTH) {
    throw new RotatorAzimuthRangeError(azimuth);
  }
}

/**
 * Builds the RT21 "move to azimuth" request.
 * @param azimuth - integer degrees, 0-999
 * @returns `AP0` + 3-digit azimuth + `\r;`, e.g. `AP0035\r;`
 * @throws RotatorAzimuthRangeError If the azimuth does not fit the wire field
 */
export function buildMoveToRequest(azimuth: number): string {
  validateWireAzimuth(azimuth);
  const digits = padAzimuth(azimuth, AZIMUTH_DIGITS);
  return `${RT21_COMMANDS.MOVE_PREFIX}${digits}${RT21_COMMANDS.MOVE_SUFFIX}`;
}
