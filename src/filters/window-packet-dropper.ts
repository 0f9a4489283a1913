/**
 * WindowPacketDropper
 *
 * Drops the data chunk at a fixed position within every transfer window. A
 * window starts whenever the receiver sends PARAMETERS_CONTINUE or
 * PARAMETERS_RETRANSMIT. After a retransmit, the window restarts again at
 * the first data chunk carrying the requested offset, so chunks that were
 * still in flight when it was requested do not use up its positions.
 */

import { defaultChunkClassifier, type ChunkClassifier } from '../codec/classifier.js';
import { ChunkType } from '../codec/chunk.js';
import { EventType, type ProxyEvent } from '../events/types.js';
import { logger } from '../utils/logger.js';
import { Filter, requireNonNegativeInteger, type SendFn } from './filter.js';

export interface WindowPacketDropperOptions {
  /** Zero-based position of the data chunk to drop in each window */
  windowPacketToDrop: number;
  classifier?: ChunkClassifier;
}

export class WindowPacketDropper extends Filter {
  private readonly windowPacketToDrop: number;
  private readonly classifier: ChunkClassifier;
  private windowPosition = 0;
  private boundaryOffset: number | null = null;

  constructor(send: SendFn, name: string, options: WindowPacketDropperOptions) {
    super(send, name);
    this.windowPacketToDrop = requireNonNegativeInteger(
      'WindowPacketDropper',
      'windowPacketToDrop',
      options.windowPacketToDrop
    );
    this.classifier = options.classifier ?? defaultChunkClassifier;
  }

  get position(): number {
    return this.windowPosition;
  }

  async process(packet: Uint8Array): Promise<void> {
    const chunk = this.classifier.classify(packet);
    if (chunk?.type !== ChunkType.DATA) {
      await this.send(packet);
      return;
    }

    // The retransmitted window starts at the chunk the receiver asked for.
    if (this.boundaryOffset !== null && chunk.offset === this.boundaryOffset) {
      this.boundaryOffset = null;
      this.windowPosition = 0;
    }

    const position = this.windowPosition++;
    if (position === this.windowPacketToDrop) {
      this.drop(packet);
    } else {
      await this.forward(packet);
    }
  }

  override handleEvent(event: ProxyEvent): void {
    if (event.type !== EventType.PARAMETERS_CONTINUE && event.type !== EventType.PARAMETERS_RETRANSMIT) {
      return;
    }

    this.windowPosition = 0;
    if (event.type === EventType.PARAMETERS_RETRANSMIT) {
      this.boundaryOffset = event.chunk.offset ?? null;
    }
    logger.debug(`[${this.name}] new window`, { boundaryOffset: this.boundaryOffset });
  }
}
