/**
 * Protocol milestones published by EventFilter and consumed by fault filters.
 */

import type { ChunkDescriptor } from '../codec/chunk.js';

export const EventType = {
  TRANSFER_START: 'transfer_start',
  PARAMETERS_CONTINUE: 'parameters_continue',
  PARAMETERS_RETRANSMIT: 'parameters_retransmit',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export interface ProxyEvent {
  readonly type: EventType;
  readonly chunk: ChunkDescriptor;
}

/**
 * Anything that reacts to dispatched events. Implementations update their
 * own state synchronously and never forward packets from here.
 */
export interface EventHandler {
  readonly name: string;
  handleEvent(event: ProxyEvent): void;
}

export function createEvent(type: EventType, chunk: ChunkDescriptor): ProxyEvent {
  return Object.freeze({ type, chunk: Object.freeze({ ...chunk }) });
}
