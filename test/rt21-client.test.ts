import { describe, expect, it } from 'vitest';
import { RotatorAzimuthRangeError, RotatorConnectionError } from '../src/errors.js';
import Rt21Client from '../src/rt21-client.js';
import { FakeTransport } from './helpers/fake-transport.js';

describe('Rt21Client.queryPosition', () => {
  it('sends the query literal and decodes the reply', async () => {
    const device = new FakeTransport(['045;']);
    const client = new Rt21Client(device);

    await expect(client.queryPosition()).resolves.toEqual({ kind: 'position', azimuth: 45 });
    expect(device.written).toEqual(['AI1\r;']);
    expect(device.flushCalls).toBe(1);
  });

  it('reads the reply without a timeout', async () => {
    const device = new FakeTransport(['010;']);
    await new Rt21Client(device, { ackTimeout: 50 }).queryPosition();
    expect(device.readTimeouts).toEqual([undefined]);
  });

  it('fails when the reply has no digits', async () => {
    const device = new FakeTransport([';;;no digits']);
    const result = await new Rt21Client(device).queryPosition();
    expect(result.kind).toBe('failed');
  });

  it('fails when the device closes before answering', async () => {
    const device = new FakeTransport(['eof']);
    await expect(new Rt21Client(device).queryPosition()).resolves.toEqual({
      kind: 'failed',
      reason: 'RT21 closed the connection before answering',
    });
  });

  it('fails when the write fails', async () => {
    const device = new FakeTransport();
    device.writeError = new RotatorConnectionError('write EPIPE');
    await expect(new Rt21Client(device).queryPosition()).resolves.toEqual({
      kind: 'failed',
      reason: 'RT21 query failed: write EPIPE',
    });
  });
});

describe('Rt21Client.send', () => {
  it('treats a missing acknowledgment as success', async () => {
    const device = new FakeTransport(['timeout']);
    const client = new Rt21Client(device, { ackTimeout: 25 });

    await expect(client.send({ kind: 'moveTo', azimuth: 200 })).resolves.toEqual({
      kind: 'acknowledged',
    });
    expect(device.written).toEqual(['AP0200\r;']);
    expect(device.readTimeouts).toEqual([25]);
  });

  it('keeps an acknowledgment that arrives', async () => {
    const device = new FakeTransport(['OK;']);
    await expect(new Rt21Client(device).send({ kind: 'stop' })).resolves.toEqual({
      kind: 'acknowledged',
      response: 'OK;',
    });
    expect(device.written).toEqual([';']);
  });

  it('uses the default two second acknowledgment timeout', async () => {
    const device = new FakeTransport(['timeout']);
    await new Rt21Client(device).send({ kind: 'stop' });
    expect(device.readTimeouts).toEqual([2000]);
  });

  it('reports a failed write', async () => {
    const device = new FakeTransport();
    device.writeError = new RotatorConnectionError('write ECONNRESET');
    await expect(new Rt21Client(device).send({ kind: 'stop' })).resolves.toEqual({
      kind: 'failed',
      reason: 'RT21 communication failed: write ECONNRESET',
    });
  });

  it('reports a read error other than a timeout', async () => {
    const device = new FakeTransport([new RotatorConnectionError('read ECONNRESET')]);
    await expect(new Rt21Client(device).send({ kind: 'stop' })).resolves.toEqual({
      kind: 'failed',
      reason: 'RT21 acknowledgment read failed: read ECONNRESET',
    });
  });

  it('refuses to encode an azimuth above 999 and writes nothing', async () => {
    const device = new FakeTransport();
    await expect(new Rt21Client(device).send({ kind: 'moveTo', azimuth: 1000 })).rejects.toThrow(
      RotatorAzimuthRangeError
    );
    expect(device.written).toEqual([]);
  });
});
