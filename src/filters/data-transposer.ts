/**
 * DataTransposer
 *
 * Randomly swaps adjacent packets. With probability `rate` a packet is held
 * back; the next packet is then sent first and the held one right after it.
 * A held packet with no successor within `timeout` seconds is sent alone,
 * in its original position.
 */

import { SeededRandom, type RandomSource } from '../utils/random.js';
import { logger } from '../utils/logger.js';
import { Filter, requirePositive, requireRate, type SendFn } from './filter.js';

export interface DataTransposerOptions {
  /** Probability in [0, 1] that a packet is held back */
  rate: number;
  /** Seconds a held packet waits for a successor */
  timeout: number;
  seed?: number;
  /** Overrides the seeded generator */
  random?: RandomSource;
}

interface HeldPacket {
  packet: Uint8Array;
  timer: ReturnType<typeof setTimeout>;
}

export class DataTransposer extends Filter {
  private readonly rate: number;
  private readonly timeoutMs: number;
  private readonly random: RandomSource;
  private held: HeldPacket | null = null;
  private flushing: Promise<void> | null = null;
  private flushError: unknown = null;

  constructor(send: SendFn, name: string, options: DataTransposerOptions) {
    super(send, name);
    this.rate = requireRate('DataTransposer', 'rate', options.rate);
    this.timeoutMs = requirePositive('DataTransposer', 'timeout', options.timeout) * 1000;

    if (options.random) {
      this.random = options.random;
    } else {
      const generator = new SeededRandom(options.seed);
      this.random = generator;
      logger.info(`[${name}] DataTransposer initialized`, {
        rate: this.rate,
        timeout: options.timeout,
        seed: generator.seed,
      });
    }
  }

  /**
   * Whether a packet is currently held back
   */
  get isHolding(): boolean {
    return this.held !== null;
  }

  async process(packet: Uint8Array): Promise<void> {
    await this.settleFlush();

    const held = this.held;
    if (held) {
      clearTimeout(held.timer);
      this.held = null;
      await this.forward(packet, 'transposed');
      await this.forward(held.packet, 'transposed');
      return;
    }

    if (this.random.uniform(0, 1) < this.rate) {
      logger.packetAction(this.name, 'held', packet);
      this.held = {
        packet,
        timer: setTimeout(() => this.onTimeout(), this.timeoutMs),
      };
      return;
    }

    await this.forward(packet);
  }

  override async flush(): Promise<void> {
    await this.settleFlush();

    const held = this.held;
    if (held) {
      clearTimeout(held.timer);
      this.held = null;
      await this.forward(held.packet, 'flushed');
    }
  }

  override close(): void {
    const held = this.held;
    if (held) {
      clearTimeout(held.timer);
      this.held = null;
      logger.warn(`[${this.name}] dropping held packet on close`, { bytes: held.packet.length });
    }
  }

  private onTimeout(): void {
    const held = this.held;
    if (!held) return;
    this.held = null;

    this.flushing = this.forward(held.packet, 'flushed').catch((error: unknown) => {
      logger.error(`[${this.name}] timed-out flush failed`, error);
      this.flushError = error;
    });
  }

  /**
   * Wait for a timer flush still in progress and rethrow its failure, so a
   * send error reaches the next caller instead of vanishing with the timer.
   */
  private async settleFlush(): Promise<void> {
    if (this.flushing) {
      await this.flushing;
      this.flushing = null;
    }

    if (this.flushError !== null) {
      const error = this.flushError;
      this.flushError = null;
      throw error;
    }
  }
}
