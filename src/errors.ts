// src/errors.ts

import { MAX_WIRE_AZIMUTH, MIN_WIRE_AZIMUTH } from './constants/constants.js';

/**
 * Base class for all translator errors
 */
export class RotatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RotatorError';
  }
}

/**
 * Error class for a read that timed out
 */
export class RotatorTimeoutError extends RotatorError {
  constructor(message: string = 'RT21 read timed out') {
    super(message);
    this.name = 'RotatorTimeoutError';
  }
}

/**
 * Error class for a device reply that carries no azimuth
 */
export class RotatorResponseError extends RotatorError {
  constructor(message: string = 'Invalid RT21 response') {
    super(message);
    this.name = 'RotatorResponseError';
  }
}

/**
 * Error class for an azimuth that does not fit the 3-digit wire field
 */
export class RotatorAzimuthRangeError extends RotatorError {
  azimuth: number;

  constructor(azimuth: number) {
    const range = `${MIN_WIRE_AZIMUTH}-${MAX_WIRE_AZIMUTH}`;
    super(`Azimuth ${azimuth} does not fit the RT21 field; must be an integer ${range}`);
    this.name = 'RotatorAzimuthRangeError';
    this.azimuth = azimuth;
  }
}

// --- Connection errors ---

/**
 * Error class for a socket-level failure while connecting or writing
 */
export class RotatorConnectionError extends RotatorError {
  constructor(message: string = 'RT21 connection failed') {
    super(message);
    this.name = 'RotatorConnectionError';
  }
}

/**
 * Error class for a connect attempt that did not complete in time
 */
export class RotatorConnectionTimeoutError extends RotatorConnectionError {
  constructor(host: string, port: number, timeout: number) {
    super(`Connection to ${host}:${port} timed out after ${timeout}ms`);
    this.name = 'RotatorConnectionTimeoutError';
  }
}

/**
 * Error class for I/O on a transport that is not open
 */
export class RotatorNotConnectedError extends RotatorConnectionError {
  constructor(message: string = 'Transport not open') {
    super(message);
    this.name = 'RotatorNotConnectedError';
  }
}

// --- Configuration ---

/**
 * Error class for an invalid configuration value
 */
export class RotatorConfigError extends RotatorError {
  constructor(key: string, value: unknown, expected: string) {
    super(`Invalid ${key}: ${String(value)}, expected ${expected}`);
    this.name = 'RotatorConfigError';
  }
}

/**
 * Returns the message of anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
