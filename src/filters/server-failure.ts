/**
 * ServerFailure
 *
 * Simulates a server that goes dark after relaying a set number of packets.
 * Each TRANSFER_START event revives it for the next count in the list; once
 * the list is used up the filter stays open for good.
 */

import { defaultChunkClassifier, type ChunkClassifier } from '../codec/classifier.js';
import { ConfigurationError } from '../errors.js';
import { EventType, type ProxyEvent } from '../events/types.js';
import { logger } from '../utils/logger.js';
import { Filter, type SendFn } from './filter.js';

export type ServerFailureState =
  | { kind: 'open' }
  | { kind: 'forwarding'; remaining: number }
  | { kind: 'failed' };

export interface ServerFailureOptions {
  packetsBeforeFailure: readonly number[];
  /** Begin counting at construction instead of waiting for TRANSFER_START */
  startImmediately?: boolean;
  /** Count (and drop) only packets that are transfer chunks */
  onlyConsiderTransferChunks?: boolean;
  classifier?: ChunkClassifier;
}

export class ServerFailure extends Filter {
  private readonly counts: number[];
  private readonly onlyConsiderTransferChunks: boolean;
  private readonly classifier: ChunkClassifier;
  private current: ServerFailureState = { kind: 'failed' };

  constructor(send: SendFn, name: string, options: ServerFailureOptions) {
    super(send, name);

    options.packetsBeforeFailure.forEach((count, index) => {
      if (!Number.isInteger(count) || count <= 0) {
        throw new ConfigurationError(
          `ServerFailure: packetsBeforeFailure[${index}] must be a positive integer, got ${count}`,
          undefined,
          { index, count }
        );
      }
    });

    this.counts = [...options.packetsBeforeFailure];
    this.onlyConsiderTransferChunks = options.onlyConsiderTransferChunks ?? false;
    this.classifier = options.classifier ?? defaultChunkClassifier;

    if (options.startImmediately) {
      this.advance();
    }
  }

  get state(): ServerFailureState {
    return { ...this.current };
  }

  async process(packet: Uint8Array): Promise<void> {
    if (this.onlyConsiderTransferChunks && !this.classifier.classify(packet)) {
      await this.send(packet);
      return;
    }

    const state = this.current;
    switch (state.kind) {
      case 'open':
        await this.forward(packet);
        return;

      case 'forwarding':
        this.current = state.remaining > 1
          ? { kind: 'forwarding', remaining: state.remaining - 1 }
          : { kind: 'failed' };
        if (this.current.kind === 'failed') {
          logger.info(`[${this.name}] simulating server failure`);
        }
        await this.forward(packet);
        return;

      case 'failed':
        this.drop(packet);
        return;
    }
  }

  override handleEvent(event: ProxyEvent): void {
    if (event.type === EventType.TRANSFER_START) {
      this.advance();
    }
  }

  private advance(): void {
    const next = this.counts.shift();
    if (next === undefined) {
      this.current = { kind: 'open' };
      logger.info(`[${this.name}] no failures left, relaying all packets`);
    } else {
      this.current = { kind: 'forwarding', remaining: next };
      logger.info(`[${this.name}] relaying ${next} packets before failure`);
    }
  }
}
