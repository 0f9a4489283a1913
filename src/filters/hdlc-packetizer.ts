/**
 * HdlcPacketizer
 *
 * Turns the raw socket byte stream into packets: one per HDLC frame, passed
 * on exactly as encoded. Frames that fail their checks are forwarded too;
 * only the downstream filters decide what to do with them.
 */

import { HdlcFrameDecoder } from '../codec/hdlc.js';
import { logger } from '../utils/logger.js';
import { Filter, type SendFn } from './filter.js';

export class HdlcPacketizer extends Filter {
  private readonly decoder = new HdlcFrameDecoder();

  constructor(send: SendFn, name: string) {
    super(send, name);
  }

  async process(data: Uint8Array): Promise<void> {
    for (const frame of this.decoder.process(data)) {
      if (frame.status !== 'ok') {
        logger.debug(`[${this.name}] passing through ${frame.status} frame`, { bytes: frame.rawEncoded.length });
      }
      await this.send(frame.rawEncoded);
    }
  }
}
