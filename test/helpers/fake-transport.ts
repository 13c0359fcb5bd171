import { RotatorConnectionError, RotatorTimeoutError } from '../../src/errors.js';
import type { Transport } from '../../src/types/rotator-types.js';
import { decodeAscii, encodeAscii } from '../../src/utils/utils.js';

/** One scripted read: data, an ack timeout, end of stream, or a thrown error */
export type ReadStep = string | 'timeout' | 'eof' | Error;

/**
 * Scripted transport. Reads are served from `steps` in order; once they run out
 * every read is end-of-stream.
 */
export class FakeTransport implements Transport {
  public isOpen = false;
  public readonly written: string[] = [];
  public readonly readTimeouts: Array<number | undefined> = [];
  public connectCalls = 0;
  public disconnectCalls = 0;
  public flushCalls = 0;
  public connectError: Error | null = null;
  public writeError: Error | null = null;
  /** Keeps connect() pending until disconnect(), then fails or succeeds it */
  public holdConnect: 'fail' | 'succeed' | null = null;
  private steps: ReadStep[];
  private releaseConnect: (() => void) | null = null;

  constructor(steps: ReadStep[] = []) {
    this.steps = [...steps];
  }

  get pendingReads(): number {
    return this.steps.length;
  }

  async connect(): Promise<void> {
    this.connectCalls++;
    if (this.connectError) throw this.connectError;
    if (this.holdConnect) {
      const outcome = this.holdConnect;
      await new Promise<void>(resolve => {
        this.releaseConnect = resolve;
      });
      if (outcome === 'fail') throw new RotatorConnectionError('Closed while connecting');
    }
    this.isOpen = true;
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.writeError) throw this.writeError;
    this.written.push(decodeAscii(data));
  }

  async read(timeout?: number): Promise<Uint8Array> {
    this.readTimeouts.push(timeout);
    const step = this.steps.shift();
    if (step === undefined || step === 'eof') return new Uint8Array(0);
    if (step === 'timeout') throw new RotatorTimeoutError();
    if (step instanceof Error) throw step;
    return encodeAscii(step);
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.isOpen = false;
    this.releaseConnect?.();
    this.releaseConnect = null;
  }

  async flush(): Promise<void> {
    this.flushCalls++;
  }
}
