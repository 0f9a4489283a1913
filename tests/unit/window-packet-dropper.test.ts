/**
 * WindowPacketDropper Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EventFilter } from '../../src/filters/event-filter.js';
import { WindowPacketDropper } from '../../src/filters/window-packet-dropper.js';
import { ChunkType } from '../../src/codec/chunk.js';
import { defaultChunkClassifier } from '../../src/codec/classifier.js';
import { createEvent, EventType, type ProxyEvent } from '../../src/events/types.js';
import { ConfigurationError } from '../../src/errors.js';
import { AsyncQueue } from '../../src/utils/async-queue.js';
import { RecordingSink } from '../harness/sink.js';
import { bytes, dataFrame, transferFrame } from '../harness/chunks.js';

/**
 * Run a flow-control frame through an EventFilter and return the event it
 * publishes
 */
async function eventFromWire(type: ChunkType): Promise<ProxyEvent> {
  const queue = new AsyncQueue<ProxyEvent>();
  const filter = new EventFilter(new RecordingSink().send, 'events', { eventQueue: queue });
  await filter.process(transferFrame({ type, sessionId: 1 }));
  const event = queue.getNowait();
  if (!event) throw new Error(`no event published for ${type}`);
  return event;
}

function offsetsOf(packets: readonly Uint8Array[]): Array<number | undefined> {
  return packets.map((packet) => defaultChunkClassifier.classify(packet)?.offset);
}

describe('WindowPacketDropper', () => {
  let sink: RecordingSink;

  beforeEach(() => {
    sink = new RecordingSink();
  });

  it('drops the configured position and restarts at the retransmit boundary', async () => {
    const dropper = new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: 1 });

    await dropper.process(dataFrame(0));
    await dropper.process(dataFrame(1));
    dropper.handleEvent(
      createEvent(EventType.PARAMETERS_RETRANSMIT, { type: ChunkType.PARAMETERS_RETRANSMIT, offset: 1 })
    );
    for (const offset of [2, 1, 2, 3]) {
      await dropper.process(dataFrame(offset));
    }

    expect(offsetsOf(sink.packets)).toEqual([0, 2, 1, 3]);
  });

  it('drops the same position in every window when chunks carry no offset', async () => {
    const dropper = new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: 0 });
    const packets = ['1', '2', '3', '4', '5'].map((data) =>
      transferFrame({ type: ChunkType.DATA, sessionId: 1, data: bytes(data) })
    );
    const events = [
      await eventFromWire(ChunkType.PARAMETERS_RETRANSMIT),
      await eventFromWire(ChunkType.PARAMETERS_CONTINUE),
      await eventFromWire(ChunkType.PARAMETERS_RETRANSMIT),
      await eventFromWire(ChunkType.PARAMETERS_CONTINUE),
    ];
    expect(events[0]?.chunk.offset).toBe(0);

    for (const event of events) {
      sink.packets.length = 0;
      for (const packet of packets) {
        await dropper.process(packet);
      }
      expect(sink.packets).toEqual(packets.slice(1));
      dropper.handleEvent(event);
    }
  });

  it('restarts the window at the retransmitted offset', async () => {
    const dropper = new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: 0 });

    await dropper.process(dataFrame(0));
    await dropper.process(dataFrame(1));
    dropper.handleEvent(
      createEvent(EventType.PARAMETERS_RETRANSMIT, { type: ChunkType.PARAMETERS_RETRANSMIT, offset: 1 })
    );
    // offset 2 was in flight; the new window begins at offset 1
    for (const offset of [2, 1, 2]) {
      await dropper.process(dataFrame(offset));
    }

    expect(offsetsOf(sink.packets)).toEqual([1, 2]);
    expect(dropper.position).toBe(2);
  });

  it('starts a new window on PARAMETERS_CONTINUE', async () => {
    const dropper = new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: 0 });

    await dropper.process(dataFrame(0));
    await dropper.process(dataFrame(1));
    expect(dropper.position).toBe(2);

    dropper.handleEvent(
      createEvent(EventType.PARAMETERS_CONTINUE, { type: ChunkType.PARAMETERS_CONTINUE, offset: 2 })
    );
    expect(dropper.position).toBe(0);

    await dropper.process(dataFrame(2));
    await dropper.process(dataFrame(3));

    expect(offsetsOf(sink.packets)).toEqual([1, 3]);
  });

  it('passes non-data packets through without counting them', async () => {
    const dropper = new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: 0 });
    const start = transferFrame({ type: ChunkType.START, sessionId: 1 });

    await dropper.process(bytes('raw'));
    await dropper.process(start);
    await dropper.process(dataFrame(5));

    expect(sink.packets).toEqual([bytes('raw'), start]);
    expect(dropper.position).toBe(1);
  });

  it('ignores TRANSFER_START events', async () => {
    const dropper = new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: 5 });
    await dropper.process(dataFrame(0));

    dropper.handleEvent(createEvent(EventType.TRANSFER_START, { type: ChunkType.START }));

    expect(dropper.position).toBe(1);
  });

  it('rejects a negative or fractional position', () => {
    expect(() => new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: -1 })).toThrow(
      ConfigurationError
    );
    expect(() => new WindowPacketDropper(sink.send, 'window', { windowPacketToDrop: 0.5 })).toThrow(
      'WindowPacketDropper: windowPacketToDrop must be a non-negative integer, got 0.5'
    );
  });
});
