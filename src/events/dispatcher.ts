/**
 * Event Dispatcher
 *
 * Drains an event queue and hands each event to every registered handler,
 * in registration order, before taking the next one. Runs beside packet
 * processing so event delivery never blocks the data path.
 */

import type { AsyncQueue } from '../utils/async-queue.js';
import { logger } from '../utils/logger.js';
import type { EventHandler, ProxyEvent } from './types.js';

export class EventDispatcher {
  private readonly queue: AsyncQueue<ProxyEvent>;
  private readonly handlers: readonly EventHandler[];
  private readonly name: string;
  private loop: Promise<void> | null = null;
  private dispatched = 0;

  constructor(name: string, queue: AsyncQueue<ProxyEvent>, handlers: readonly EventHandler[]) {
    this.name = name;
    this.queue = queue;
    this.handlers = [...handlers];
  }

  /**
   * Start the consumption loop. Calling start twice is a no-op.
   */
  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  /**
   * Close the queue, let the loop deliver what is already queued, and wait
   * for it to finish. Rejects with a handler's error if one threw.
   */
  async stop(): Promise<void> {
    this.queue.close();
    await this.done;
  }

  /**
   * Settles when the loop ends
   */
  get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  get dispatchedCount(): number {
    return this.dispatched;
  }

  private async run(): Promise<void> {
    for (;;) {
      const event = await this.queue.get();
      if (event === undefined) break;

      logger.debug(`[${this.name}] dispatching ${event.type}`, {
        offset: event.chunk.offset,
        sessionId: event.chunk.sessionId,
      });

      for (const handler of this.handlers) {
        handler.handleEvent(event);
      }
      this.dispatched++;
    }
  }
}
