import { describe, expect, it } from 'vitest';
import { RotatorConnectionError, RotatorConnectionTimeoutError } from '../src/errors.js';
import Session from '../src/session.js';
import type { SessionOptions } from '../src/types/rotator-types.js';
import { FakeTransport, type ReadStep } from './helpers/fake-transport.js';

function createSession(
  clientSteps: ReadStep[],
  deviceSteps: ReadStep[] = [],
  options: Partial<SessionOptions> = {}
): { session: Session; client: FakeTransport; device: FakeTransport } {
  const client = new FakeTransport(clientSteps);
  const device = new FakeTransport(deviceSteps);
  const session = new Session(client, device, {
    id: 1,
    peer: '127.0.0.1:50000',
    ackTimeout: 20,
    ...options,
  });
  return { session, client, device };
}

describe('Session', () => {
  it('answers a position query with the device azimuth', async () => {
    const { session, client, device } = createSession(['C'], ['045;']);

    await session.run();

    expect(client.written).toEqual(['AZ=045\r\n']);
    expect(device.written).toEqual(['AI1\r;']);
  });

  it('acknowledges a move when the device stays silent', async () => {
    const { session, client, device } = createSession(['M200'], ['timeout']);

    await session.run();

    expect(device.written).toEqual(['AP0200\r;']);
    expect(device.readTimeouts).toEqual([20]);
    expect(client.written).toEqual(['OK\r\n']);
  });

  it('still answers OK when the stop cannot be written to the device', async () => {
    const { session, client, device } = createSession(['STOP']);
    device.writeError = new RotatorConnectionError('write EPIPE');

    await session.run();

    expect(client.written).toEqual(['OK\r\n']);
  });

  it('answers ERROR for a failed stop under the report policy', async () => {
    const { session, client, device } = createSession(['STOP'], [], {
      moveFailurePolicy: 'report',
    });
    device.writeError = new RotatorConnectionError('write EPIPE');

    await session.run();

    expect(client.written).toEqual(['ERROR\r\n']);
  });

  it('answers ERROR for junk without touching the device', async () => {
    const { session, client, device } = createSession(['JUNK']);

    await session.run();

    expect(client.written).toEqual(['ERROR\r\n']);
    expect(device.written).toEqual([]);
    expect(device.readTimeouts).toEqual([]);
  });

  it('answers ERROR for a move that does not fit the device field', async () => {
    const { session, client, device } = createSession(['M1000']);

    await session.run();

    expect(client.written).toEqual(['ERROR\r\n']);
    expect(device.written).toEqual([]);
  });

  it('answers ERROR when the position reply has no digits', async () => {
    const { session, client } = createSession(['C'], [';;;no digits']);

    await session.run();

    expect(client.written).toEqual(['ERROR\r\n']);
  });

  it('serves requests in order and keeps going after a failure', async () => {
    const { session, client, device } = createSession(
      ['C', 'M030', 'C', 'S', 'C'],
      ['010;', 'timeout', 'garbage', 'timeout', '030;']
    );

    await session.run();

    expect(client.written).toEqual(['AZ=010\r\n', 'OK\r\n', 'ERROR\r\n', 'OK\r\n', 'AZ=030\r\n']);
    expect(device.written).toEqual(['AI1\r;', 'AP0030\r;', 'AI1\r;', ';', 'AI1\r;']);
    expect(device.connectCalls).toBe(1);
  });

  it('closes both connections exactly once when the client disconnects', async () => {
    const { session, client, device } = createSession(['eof']);

    await session.run();
    await session.close();

    expect(session.state).toBe('closed');
    expect(client.disconnectCalls).toBe(1);
    expect(device.disconnectCalls).toBe(1);
    expect(client.written).toEqual([]);
    expect(device.written).toEqual([]);
  });

  it('aborts before serving anything when the device cannot be reached', async () => {
    const { session, client, device } = createSession(['C']);
    device.connectError = new RotatorConnectionTimeoutError('192.0.2.1', 6555, 5000);

    await session.run();

    expect(session.state).toBe('closed');
    expect(client.pendingReads).toBe(1);
    expect(client.written).toEqual([]);
    expect(client.disconnectCalls).toBe(1);
    expect(device.disconnectCalls).toBe(1);
  });

  it('finishes when closed while the device is still connecting', async () => {
    const { session, client, device } = createSession(['C'], ['045;']);
    device.holdConnect = 'fail';

    const running = session.run();
    await session.close();
    await running;

    expect(session.state).toBe('closed');
    expect(client.pendingReads).toBe(1);
    expect(client.disconnectCalls).toBe(1);
    expect(device.disconnectCalls).toBe(1);
  });

  it('stays closed when a connect completes after close', async () => {
    const { session, client, device } = createSession(['C'], ['045;']);
    device.holdConnect = 'succeed';

    const running = session.run();
    await session.close();
    await running;

    expect(session.state).toBe('closed');
    expect(client.pendingReads).toBe(1);
    expect(device.written).toEqual([]);
  });

  it('tears down when writing the reply to the client fails', async () => {
    const { session, client, device } = createSession(['C', 'C'], ['045;']);
    client.writeError = new RotatorConnectionError('client gone');

    await expect(session.run()).resolves.toBeUndefined();

    expect(client.pendingReads).toBe(1);
    expect(client.disconnectCalls).toBe(1);
    expect(device.disconnectCalls).toBe(1);
  });

  it('stops at the next request boundary once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const { session, client, device } = createSession(['C'], ['045;'], {
      signal: controller.signal,
    });

    await session.run();

    expect(client.pendingReads).toBe(1);
    expect(device.written).toEqual([]);
    expect(session.state).toBe('closed');
  });

  it('handles a single request without running the loop', async () => {
    const { session, device } = createSession([], ['123;']);
    await device.connect();

    const reply = await session.handle(Buffer.from('c\r\n'));

    expect(Buffer.from(reply).toString('ascii')).toBe('AZ=123\r\n');
  });
});
