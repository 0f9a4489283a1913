/**
 * HDLC framing
 *
 * Frames on the wire look like:
 *
 *   FLAG | escape(address varint | control | payload | FCS) | FLAG
 *
 * The address is a one-terminated varint (7 bits per byte in bits 7..1,
 * bit 0 set on the last byte) and the FCS is the little-endian CRC-32 of the
 * unescaped address, control and payload bytes.
 */

import { HDLC } from '../constants.js';
import { crc32 } from './crc32.js';

export type FrameStatus = 'ok' | 'fcs_mismatch' | 'frame_too_short' | 'bad_address' | 'framing_error';

export interface HdlcFrame {
  /** Bytes exactly as they appeared on the wire, including flags */
  rawEncoded: Uint8Array;
  status: FrameStatus;
  address: number;
  control: number;
  /** Payload between the control byte and the FCS */
  data: Uint8Array;
}

type DecoderState = 'interframe' | 'frame' | 'frame_escape';

function escapeInto(out: number[], bytes: Iterable<number>): void {
  for (const byte of bytes) {
    if (byte === HDLC.FLAG || byte === HDLC.ESCAPE) {
      out.push(HDLC.ESCAPE, byte ^ HDLC.ESCAPE_XOR);
    } else {
      out.push(byte);
    }
  }
}

/**
 * Encode an address as a one-terminated varint
 */
export function encodeAddress(address: number): number[] {
  if (!Number.isInteger(address) || address < 0) {
    throw new RangeError(`Invalid HDLC address: ${address}`);
  }

  const out: number[] = [];
  let remaining = address;
  do {
    out.push((remaining % 128) << 1);
    remaining = Math.floor(remaining / 128);
  } while (remaining > 0);
  out[out.length - 1] = (out[out.length - 1] ?? 0) | 0x01;
  return out;
}

/**
 * Decode a one-terminated varint address
 *
 * @returns The address and the number of bytes it used, or null if the
 * bytes never terminate within the allowed length
 */
export function decodeAddress(bytes: Uint8Array): { address: number; length: number } | null {
  let address = 0;
  let multiplier = 1;
  const limit = Math.min(bytes.length, HDLC.MAX_ADDRESS_BYTES);

  for (let i = 0; i < limit; i++) {
    const byte = bytes[i] ?? 0;
    address += (byte >> 1) * multiplier;
    if (byte & 0x01) {
      return { address, length: i + 1 };
    }
    multiplier *= 128;
  }
  return null;
}

/**
 * Build an unnumbered-information frame carrying `payload`
 */
export function encodeUiFrame(address: number, payload: Uint8Array): Uint8Array {
  const body = [...encodeAddress(address), HDLC.UI_FRAME_CONTROL, ...payload];
  const fcs = crc32(Uint8Array.from(body));
  const fcsBytes = [fcs & 0xff, (fcs >>> 8) & 0xff, (fcs >>> 16) & 0xff, (fcs >>> 24) & 0xff];

  const out: number[] = [HDLC.FLAG];
  escapeInto(out, body);
  escapeInto(out, fcsBytes);
  out.push(HDLC.FLAG);
  return Uint8Array.from(out);
}

/**
 * Streaming HDLC decoder. Feed it arbitrary slices of the byte stream; it
 * returns every frame that a delimiter completed. Bytes seen before the
 * first flag come back as a `framing_error` frame so that nothing read
 * from the wire is silently discarded.
 */
export class HdlcFrameDecoder {
  private state: DecoderState = 'interframe';
  private raw: number[] = [];
  private decoded: number[] = [];

  process(data: Uint8Array): HdlcFrame[] {
    const frames: HdlcFrame[] = [];
    for (const byte of data) {
      const frame = this.processByte(byte);
      if (frame) frames.push(frame);
    }
    return frames;
  }

  /**
   * Bytes received since the last completed frame
   */
  get bufferedBytes(): number {
    return this.raw.length;
  }

  private processByte(byte: number): HdlcFrame | null {
    switch (this.state) {
      case 'interframe':
        if (byte === HDLC.FLAG) {
          const garbage = this.raw.length > 0 ? this.finish('framing_error', false) : null;
          this.state = 'frame';
          return garbage;
        }
        this.raw.push(byte);
        return null;

      case 'frame':
        if (byte === HDLC.FLAG) {
          // Back-to-back flags delimit nothing.
          if (this.raw.length === 0) return null;
          return this.finish(this.check(), true);
        }
        this.raw.push(byte);
        if (byte === HDLC.ESCAPE) {
          this.state = 'frame_escape';
        } else {
          this.decoded.push(byte);
        }
        return null;

      case 'frame_escape':
        if (byte === HDLC.FLAG) {
          const frame = this.finish('framing_error', true);
          this.state = 'frame';
          return frame;
        }
        this.raw.push(byte);
        {
          const unescaped = byte ^ HDLC.ESCAPE_XOR;
          if (unescaped === HDLC.FLAG || unescaped === HDLC.ESCAPE) {
            this.decoded.push(unescaped);
            this.state = 'frame';
          } else {
            // Invalid escape: discard until the next flag, keeping the
            // opening flag so the raw bytes still reach the wire intact.
            this.raw.unshift(HDLC.FLAG);
            this.state = 'interframe';
          }
        }
        return null;
    }
  }

  private check(): FrameStatus {
    if (this.decoded.length < HDLC.MIN_FRAME_SIZE) {
      return 'frame_too_short';
    }

    const body = Uint8Array.from(this.decoded.slice(0, -HDLC.FCS_SIZE));
    const fcs = this.decoded.slice(-HDLC.FCS_SIZE);
    const expected = ((fcs[0] ?? 0) | ((fcs[1] ?? 0) << 8) | ((fcs[2] ?? 0) << 16) | ((fcs[3] ?? 0) << 24)) >>> 0;
    if (crc32(body) !== expected) {
      return 'fcs_mismatch';
    }
    const address = decodeAddress(body);
    if (!address || address.length >= body.length) {
      return 'bad_address';
    }
    return 'ok';
  }

  private finish(status: FrameStatus, delimited: boolean): HdlcFrame {
    const rawEncoded = delimited
      ? Uint8Array.from([HDLC.FLAG, ...this.raw, HDLC.FLAG])
      : Uint8Array.from(this.raw);

    let address = 0;
    let control = 0;
    let data = new Uint8Array(0);

    if (status === 'ok') {
      const body = Uint8Array.from(this.decoded.slice(0, -HDLC.FCS_SIZE));
      const decodedAddress = decodeAddress(body);
      if (decodedAddress) {
        address = decodedAddress.address;
        control = body[decodedAddress.length] ?? 0;
        data = body.slice(decodedAddress.length + 1);
      }
    }

    this.raw = [];
    this.decoded = [];
    return { rawEncoded, status, address, control, data };
  }
}

/**
 * Decode a packet that must hold exactly one valid frame
 *
 * @returns The frame, or null for anything else
 */
export function decodeSingleFrame(packet: Uint8Array): HdlcFrame | null {
  const frames = new HdlcFrameDecoder().process(packet);
  if (frames.length !== 1) return null;
  const frame = frames[0];
  return frame && frame.status === 'ok' ? frame : null;
}
