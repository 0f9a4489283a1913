/**
 * RateLimiter
 *
 * Holds each packet for `length / rate` seconds before forwarding it, which
 * caps throughput at `rate` bytes per second. Closing the filter cuts a
 * pending delay short and drops that packet.
 */

import { Filter, requirePositive, type SendFn } from './filter.js';

export interface RateLimiterOptions {
  /** Bytes per second */
  rate: number;
}

interface PendingDelay {
  timer: ReturnType<typeof setTimeout>;
  resolve: (completed: boolean) => void;
}

export class RateLimiter extends Filter {
  private readonly rate: number;
  private pending: PendingDelay | null = null;
  private closed = false;

  constructor(send: SendFn, name: string, options: RateLimiterOptions) {
    super(send, name);
    this.rate = requirePositive('RateLimiter', 'rate', options.rate);
  }

  async process(packet: Uint8Array): Promise<void> {
    if (this.closed) {
      this.drop(packet);
      return;
    }

    const completed = await this.delay((packet.length / this.rate) * 1000);
    if (!completed) {
      this.drop(packet);
      return;
    }
    await this.forward(packet, 'delayed');
  }

  override close(): void {
    this.closed = true;
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      this.pending = null;
      pending.resolve(false);
    }
  }

  private delay(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(true);
      }, ms);
      this.pending = { timer, resolve };
    });
  }
}
