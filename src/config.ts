// src/config.ts

import { DEFAULTS } from './constants/constants.js';
import { RotatorConfigError } from './errors.js';
import { logger } from './logger.js';
import { DEFAULT_MOVE_FAILURE_POLICY } from './protocol/reply-formatter.js';
import type { MoveFailurePolicy, TranslatorConfig } from './types/rotator-types.js';

type Env = Record<string, string | undefined>;

const MAX_PORT = 0xffff;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readInteger(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RotatorConfigError(key, raw, `an integer ${min}-${max}`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new RotatorConfigError(key, raw, 'true or false');
}

function readMoveFailurePolicy(env: Env): MoveFailurePolicy {
  const raw = env['MOVE_FAILURE_POLICY']?.trim().toLowerCase();
  if (!raw) return DEFAULT_MOVE_FAILURE_POLICY;
  if (raw === 'acknowledge' || raw === 'report') return raw;
  throw new RotatorConfigError('MOVE_FAILURE_POLICY', raw, "'acknowledge' or 'report'");
}

/**
 * Reads the translator settings from the environment.
 * @throws RotatorConfigError For a value that is present but unusable
 */
export function loadConfig(env: Env = process.env): TranslatorConfig {
  const logLevel = readString(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!logger.isLevel(logLevel)) {
    throw new RotatorConfigError('LOG_LEVEL', logLevel, 'trace, debug, info, warn or error');
  }

  return {
    deviceHost: readString(env, 'RT21_HOST', DEFAULTS.RT21_HOST),
    devicePort: readInteger(env, 'RT21_PORT', DEFAULTS.RT21_PORT, 1, MAX_PORT),
    listenHost: readString(env, 'LISTEN_HOST', DEFAULTS.LISTEN_HOST),
    listenPort: readInteger(env, 'LISTEN_PORT', DEFAULTS.LISTEN_PORT, 0, MAX_PORT),
    connectTimeout: readInteger(
      env,
      'CONNECT_TIMEOUT_MS',
      DEFAULTS.CONNECT_TIMEOUT_MS,
      1,
      Number.MAX_SAFE_INTEGER
    ),
    ackTimeout: readInteger(
      env,
      'ACK_TIMEOUT_MS',
      DEFAULTS.ACK_TIMEOUT_MS,
      1,
      Number.MAX_SAFE_INTEGER
    ),
    moveFailurePolicy: readMoveFailurePolicy(env),
    logLevel,
    probeOnStart: readBoolean(env, 'PROBE_ON_START', true),
  };
}
