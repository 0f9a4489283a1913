/**
 * Proxy Session
 *
 * One proxied connection: a client socket, the matching server socket, and a
 * filter stack for each direction. Events seen leaving in one direction are
 * dispatched to the filters of the other, so the server's flow-control
 * chunks can drive faults on the client's data and vice versa.
 */

import type { Socket } from 'net';
import type { ChunkClassifier } from '../codec/classifier.js';
import type { FilterStackConfig } from '../config.js';
import { TransportError } from '../errors.js';
import { EventDispatcher } from '../events/dispatcher.js';
import type { ProxyEvent } from '../events/types.js';
import type { SendFn } from '../filters/filter.js';
import type { Direction } from '../types.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { logger } from '../utils/logger.js';
import { buildFilterStack, type FilterStack } from './filter-stack.js';

export interface ProxySessionOptions {
  classifier?: ChunkClassifier;
}

/**
 * Write packets to a socket, waiting for `drain` when its buffer is full
 */
export function socketSink(socket: Socket, label: string): SendFn {
  return (packet) => {
    if (socket.destroyed || !socket.writable) {
      return Promise.reject(new TransportError(`${label}: socket is closed`));
    }
    if (socket.write(packet)) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        socket.off('drain', onDrain);
        socket.off('close', onClose);
      };
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(new TransportError(`${label}: socket closed while draining`));
      };
      socket.on('drain', onDrain);
      socket.on('close', onClose);
    });
  };
}

export class ProxySession {
  private readonly client: Socket;
  private readonly server: Socket;
  private readonly clientEvents = new AsyncQueue<ProxyEvent>();
  private readonly serverEvents = new AsyncQueue<ProxyEvent>();
  private readonly stacks: Record<Direction, FilterStack>;
  private readonly dispatchers: EventDispatcher[];
  private closed = false;

  constructor(client: Socket, server: Socket, filters: FilterStackConfig, options: ProxySessionOptions = {}) {
    this.client = client;
    this.server = server;

    const stackOptions = { classifier: options.classifier };
    this.stacks = {
      client: buildFilterStack(
        'client',
        filters.clientFilterStack,
        socketSink(server, 'client->server'),
        this.clientEvents,
        stackOptions
      ),
      server: buildFilterStack(
        'server',
        filters.serverFilterStack,
        socketSink(client, 'server->client'),
        this.serverEvents,
        stackOptions
      ),
    };

    this.dispatchers = [
      new EventDispatcher('client-events', this.clientEvents, this.stacks.server.eventHandlers),
      new EventDispatcher('server-events', this.serverEvents, this.stacks.client.eventHandlers),
    ];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Relay traffic until both directions have ended, or until a stage or
   * socket fails. Each direction runs until its own end of input; its
   * output is then half-closed. Rejects with the failure, after tearing
   * the session down.
   */
  async run(): Promise<void> {
    for (const dispatcher of this.dispatchers) {
      dispatcher.start();
    }

    const pumps = [
      this.pump(this.client, this.stacks.client, this.server, 'client'),
      this.pump(this.server, this.stacks.server, this.client, 'server'),
    ];
    const dispatching = this.dispatchers.map((dispatcher) => dispatcher.done);

    try {
      await Promise.race([Promise.all(pumps), ...dispatching]);
    } finally {
      this.close();
      const results = await Promise.allSettled([...pumps, ...dispatching]);
      for (const result of results) {
        if (result.status === 'rejected') {
          logger.debug('[Session] stage ended with error', { reason: String(result.reason) });
        }
      }
    }
  }

  /**
   * Tear down: cancel filter timers, stop event delivery, close both sockets
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.stacks.client.close();
    this.stacks.server.close();
    this.clientEvents.close();
    this.serverEvents.close();
    this.client.destroy();
    this.server.destroy();
  }

  /**
   * Feed everything read from `source` through `stack`, one read at a time.
   * On end of input the stack is flushed and `destination` half-closed.
   * Resolves once that is done; rejects if a stage fails or `source` goes
   * away without ending.
   */
  private pump(source: Socket, stack: FilterStack, destination: Socket, direction: Direction): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (source.destroyed) {
        reject(new TransportError(`${direction}: socket closed before relaying`));
        return;
      }

      let inFlight: Promise<void> = Promise.resolve();
      let ended = false;

      const fail = (error: unknown) => {
        source.off('data', onData);
        reject(error);
      };

      const onData = (data: Buffer) => {
        source.pause();
        inFlight = stack.entry(data).then(() => {
          if (!this.closed) source.resume();
        });
        inFlight.catch((error: unknown) => {
          logger.error(`[Session] ${direction} stack failed`, error);
          fail(error);
        });
      };

      const onEnd = () => {
        ended = true;
        logger.debug(`[Session] ${direction} input ended`);
        inFlight
          .then(() => stack.flush())
          .then(() => {
            if (!destination.destroyed) destination.end();
            resolve();
          })
          .catch(fail);
      };

      source.on('data', onData);
      source.once('end', onEnd);
      source.once('close', () => {
        if (!ended) {
          fail(new TransportError(`${direction}: socket closed without ending`));
        }
      });
      source.on('error', (error) => {
        logger.warn(`[Session] ${direction} socket error`, { message: error.message });
        fail(error);
      });
    });
  }
}
