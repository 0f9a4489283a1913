/**
 * EventFilter
 *
 * Watches every packet for transfer milestones and publishes them to an
 * event queue. The stream itself passes through untouched and immediately.
 */

import { defaultChunkClassifier, type ChunkClassifier } from '../codec/classifier.js';
import { ChunkType } from '../codec/chunk.js';
import { createEvent, EventType, type ProxyEvent } from '../events/types.js';
import type { AsyncQueue } from '../utils/async-queue.js';
import { logger } from '../utils/logger.js';
import { Filter, type SendFn } from './filter.js';

export interface EventFilterOptions {
  eventQueue: AsyncQueue<ProxyEvent>;
  classifier?: ChunkClassifier;
}

const EVENT_FOR_CHUNK: Partial<Record<ChunkType, EventType>> = {
  [ChunkType.START]: EventType.TRANSFER_START,
  [ChunkType.PARAMETERS_RETRANSMIT]: EventType.PARAMETERS_RETRANSMIT,
  [ChunkType.PARAMETERS_CONTINUE]: EventType.PARAMETERS_CONTINUE,
};

export class EventFilter extends Filter {
  private readonly queue: AsyncQueue<ProxyEvent>;
  private readonly classifier: ChunkClassifier;

  constructor(send: SendFn, name: string, options: EventFilterOptions) {
    super(send, name);
    this.queue = options.eventQueue;
    this.classifier = options.classifier ?? defaultChunkClassifier;
  }

  async process(packet: Uint8Array): Promise<void> {
    const chunk = this.classifier.classify(packet);
    const eventType = chunk ? EVENT_FOR_CHUNK[chunk.type] : undefined;

    if (chunk && eventType && !this.queue.isClosed) {
      logger.debug(`[${this.name}] publishing ${eventType}`, { offset: chunk.offset, sessionId: chunk.sessionId });
      this.queue.put(createEvent(eventType, chunk));
    }

    await this.send(packet);
  }
}
