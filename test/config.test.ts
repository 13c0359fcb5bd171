import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { RotatorConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadConfig({})).toEqual({
      deviceHost: '192.168.1.8',
      devicePort: 6555,
      listenHost: '0.0.0.0',
      listenPort: 6555,
      connectTimeout: 5000,
      ackTimeout: 2000,
      moveFailurePolicy: 'acknowledge',
      logLevel: 'info',
      probeOnStart: true,
    });
  });

  it('reads every setting from the environment', () => {
    const config = loadConfig({
      RT21_HOST: '10.0.0.20',
      RT21_PORT: '4001',
      LISTEN_HOST: '127.0.0.1',
      LISTEN_PORT: '0',
      CONNECT_TIMEOUT_MS: '750',
      ACK_TIMEOUT_MS: '100',
      MOVE_FAILURE_POLICY: 'Report',
      LOG_LEVEL: 'DEBUG',
      PROBE_ON_START: 'no',
    });

    expect(config).toEqual({
      deviceHost: '10.0.0.20',
      devicePort: 4001,
      listenHost: '127.0.0.1',
      listenPort: 0,
      connectTimeout: 750,
      ackTimeout: 100,
      moveFailurePolicy: 'report',
      logLevel: 'debug',
      probeOnStart: false,
    });
  });

  it('ignores blank values', () => {
    expect(loadConfig({ RT21_HOST: '  ', LISTEN_PORT: '' }).listenPort).toBe(6555);
  });

  it('rejects ports outside 0-65535', () => {
    expect(() => loadConfig({ LISTEN_PORT: '70000' })).toThrow(RotatorConfigError);
    expect(() => loadConfig({ LISTEN_PORT: '70000' })).toThrow(
      'Invalid LISTEN_PORT: 70000, expected an integer 0-65535'
    );
  });

  it('rejects a device port of zero and non-numeric timeouts', () => {
    expect(() => loadConfig({ RT21_PORT: '0' })).toThrow(RotatorConfigError);
    expect(() => loadConfig({ ACK_TIMEOUT_MS: 'soon' })).toThrow(RotatorConfigError);
  });

  it('rejects unknown policies, levels and flags', () => {
    expect(() => loadConfig({ MOVE_FAILURE_POLICY: 'ignore' })).toThrow(RotatorConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(RotatorConfigError);
    expect(() => loadConfig({ PROBE_ON_START: 'maybe' })).toThrow(RotatorConfigError);
  });
});
