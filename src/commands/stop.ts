// src/commands/stop.ts

import { RT21_COMMANDS } from '../constants/constants.js';

/**
 * Builds the RT21 stop request, a bare `;`.
 */
export function buildStopRequest(): string {
  return RT21_COMMANDS.STOP;
}
