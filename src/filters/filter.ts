/**
 * Filter base
 *
 * A filter consumes one packet at a time and forwards zero or more packets
 * by calling the `send` function it was built with: the next filter's
 * `process`, or the transport write for the last stage.
 */

import type { EventHandler, ProxyEvent } from '../events/types.js';
import { ConfigurationError } from '../errors.js';
import { logger, type PacketAction } from '../utils/logger.js';

export type SendFn = (packet: Uint8Array) => Promise<void>;

export abstract class Filter implements EventHandler {
  protected readonly send: SendFn;
  readonly name: string;

  constructor(send: SendFn, name: string) {
    this.send = send;
    this.name = name;
  }

  /**
   * Consume one packet. Never throws for malformed input; rejects only when
   * forwarding fails.
   */
  abstract process(packet: Uint8Array): Promise<void>;

  /**
   * React to a protocol event. Filters that ignore events keep this no-op.
   */
  handleEvent(_event: ProxyEvent): void {
    // No event-driven state by default.
  }

  /**
   * Forward anything still held back. Called once the input has ended and
   * before the stage's output is closed.
   */
  async flush(): Promise<void> {
    // Nothing held by default.
  }

  /**
   * Cancel outstanding timers and release held packets
   */
  close(): void {
    // Nothing to release by default.
  }

  protected async forward(packet: Uint8Array, action: PacketAction = 'forwarded'): Promise<void> {
    logger.packetAction(this.name, action, packet);
    await this.send(packet);
  }

  protected drop(packet: Uint8Array): void {
    logger.packetAction(this.name, 'dropped', packet);
  }
}

// =============================================================================
// OPTION VALIDATION
// =============================================================================

export function requireRate(filter: string, field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${filter}: ${field} must be within [0, 1], got ${value}`, undefined, {
      filter,
      field,
      value,
    });
  }
  return value;
}

export function requirePositive(filter: string, field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${filter}: ${field} must be positive, got ${value}`, undefined, {
      filter,
      field,
      value,
    });
  }
  return value;
}

export function requireNonNegativeInteger(filter: string, field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${filter}: ${field} must be a non-negative integer, got ${value}`, undefined, {
      filter,
      field,
      value,
    });
  }
  return value;
}
