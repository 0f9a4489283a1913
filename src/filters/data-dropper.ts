/**
 * DataDropper: drops each packet independently with probability `rate`.
 */

import { logger } from '../utils/logger.js';
import { SeededRandom, type RandomSource } from '../utils/random.js';
import { Filter, requireRate, type SendFn } from './filter.js';

export interface DataDropperOptions {
  rate: number;
  seed?: number;
  random?: RandomSource;
}

export class DataDropper extends Filter {
  private readonly rate: number;
  private readonly random: RandomSource;

  constructor(send: SendFn, name: string, options: DataDropperOptions) {
    super(send, name);
    this.rate = requireRate('DataDropper', 'rate', options.rate);

    if (options.random) {
      this.random = options.random;
    } else {
      const generator = new SeededRandom(options.seed);
      this.random = generator;
      logger.info(`[${name}] DataDropper initialized`, { rate: this.rate, seed: generator.seed });
    }
  }

  async process(packet: Uint8Array): Promise<void> {
    if (this.random.uniform(0, 1) < this.rate) {
      this.drop(packet);
      return;
    }
    await this.forward(packet);
  }
}
