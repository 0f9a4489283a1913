/**
 * Filter stack construction
 *
 * A stack is an ordered list of filters for one direction. Each filter's
 * output feeds the next filter's `process`; an EventFilter is always the
 * last stage before the transport sink, so it sees exactly what leaves the
 * proxy.
 */

import type { ChunkClassifier } from '../codec/classifier.js';
import type { FilterConfig } from '../config.js';
import type { EventHandler, ProxyEvent } from '../events/types.js';
import { DataDropper } from '../filters/data-dropper.js';
import { DataTransposer } from '../filters/data-transposer.js';
import { EventFilter } from '../filters/event-filter.js';
import type { Filter, SendFn } from '../filters/filter.js';
import { HdlcPacketizer } from '../filters/hdlc-packetizer.js';
import { KeepDropQueue } from '../filters/keep-drop-queue.js';
import { RateLimiter } from '../filters/rate-limiter.js';
import { ServerFailure } from '../filters/server-failure.js';
import { WindowPacketDropper } from '../filters/window-packet-dropper.js';
import type { AsyncQueue } from '../utils/async-queue.js';

export interface FilterStackOptions {
  classifier?: ChunkClassifier;
}

export interface FilterStack {
  /** Feed raw input here */
  readonly entry: SendFn;
  /** Every stage, first to last, including the trailing EventFilter */
  readonly filters: readonly Filter[];
  /** Stages that receive events dispatched from the opposite direction */
  readonly eventHandlers: readonly EventHandler[];
  /** Flush every stage, first to last, once the input has ended */
  flush(): Promise<void>;
  close(): void;
}

/**
 * Build one filter from its configuration
 */
export function createFilter(
  config: FilterConfig,
  send: SendFn,
  name: string,
  options: FilterStackOptions = {}
): Filter {
  const { classifier } = options;

  switch (config.type) {
    case 'hdlc_packetizer':
      return new HdlcPacketizer(send, name);
    case 'data_dropper':
      return new DataDropper(send, name, { rate: config.rate, seed: config.seed });
    case 'rate_limiter':
      return new RateLimiter(send, name, { rate: config.rate });
    case 'data_transposer':
      return new DataTransposer(send, name, { rate: config.rate, timeout: config.timeout, seed: config.seed });
    case 'server_failure':
      return new ServerFailure(send, name, {
        packetsBeforeFailure: config.packetsBeforeFailure,
        startImmediately: config.startImmediately,
        onlyConsiderTransferChunks: config.onlyConsiderTransferChunks,
        classifier,
      });
    case 'keep_drop_queue':
      return new KeepDropQueue(send, name, {
        pattern: config.pattern,
        onlyConsiderTransferChunks: config.onlyConsiderTransferChunks,
        classifier,
      });
    case 'window_packet_dropper':
      return new WindowPacketDropper(send, name, {
        windowPacketToDrop: config.windowPacketToDrop,
        classifier,
      });
    default: {
      const unreachable: never = config;
      throw new Error(`Unknown filter config: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Build a stack that ends in `sink`, publishing events to `eventQueue`
 */
export function buildFilterStack(
  name: string,
  configs: readonly FilterConfig[],
  sink: SendFn,
  eventQueue: AsyncQueue<ProxyEvent>,
  options: FilterStackOptions = {}
): FilterStack {
  const eventFilter = new EventFilter(sink, `${name}.events`, {
    eventQueue,
    classifier: options.classifier,
  });

  const filters: Filter[] = [eventFilter];
  let next: SendFn = (packet) => eventFilter.process(packet);

  for (let i = configs.length - 1; i >= 0; i--) {
    const config = configs[i];
    if (!config) continue;

    const filter = createFilter(config, next, `${name}.${i}.${config.type}`, options);
    filters.unshift(filter);
    next = (packet) => filter.process(packet);
  }

  const configured = filters.slice(0, -1);

  return {
    entry: next,
    filters,
    eventHandlers: configured,
    flush: async () => {
      for (const filter of filters) {
        await filter.flush();
      }
    },
    close: () => {
      for (const filter of filters) {
        filter.close();
      }
    },
  };
}
