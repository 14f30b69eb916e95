/**
 * In-memory ClientTransport for broadcast tests.
 */

import type { ClientTransport, WriteCallback } from '../../src/services/broadcast/types.ts';

/**
 * - `auto`: every write completes immediately
 * - `manual`: writes complete when the test calls flushNext()
 * - `stall`: writes never complete
 * - `fail`: every write fails
 */
export type TransportMode = 'auto' | 'manual' | 'stall' | 'fail';

export interface SentFrame {
  data: string | Buffer;
  binary: boolean;
}

export class FakeTransport implements ClientTransport {
  readonly sent: SentFrame[] = [];
  closedWith: { code: number; reason: string } | null = null;
  terminated = false;
  private pending: WriteCallback[] = [];

  constructor(
    readonly id: string,
    public mode: TransportMode = 'auto'
  ) {}

  send(data: string | Buffer, binary: boolean, done: WriteCallback): void {
    this.sent.push({ data, binary });
    switch (this.mode) {
      case 'auto':
        done();
        break;
      case 'fail':
        done(new Error('connection reset'));
        break;
      case 'manual':
      case 'stall':
        this.pending.push(done);
        break;
    }
  }

  /** Complete the oldest outstanding write */
  flushNext(error?: Error): void {
    const done = this.pending.shift();
    done?.(error);
  }

  close(code: number, reason: string): void {
    this.closedWith = { code, reason };
  }

  terminate(): void {
    this.terminated = true;
  }

  /** Text frames received, in order */
  texts(): string[] {
    return this.sent.filter((frame) => !frame.binary).map((frame) => String(frame.data));
  }
}
