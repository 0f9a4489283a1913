/**
 * HDLC framing tests
 *
 * Tests cover:
 * - Address varint encoding
 * - UI frame encoding with byte stuffing
 * - Streaming decode across arbitrary slices
 * - Frame checks (FCS, length) and bytes outside frames
 */

import { describe, it, expect } from 'vitest';
import {
  decodeAddress,
  decodeSingleFrame,
  encodeAddress,
  encodeUiFrame,
  HdlcFrameDecoder,
} from '../../src/codec/hdlc.js';
import { bytes } from '../harness/chunks.js';

function concat(...parts: Uint8Array[]): Uint8Array {
  return Uint8Array.from(parts.flatMap((part) => Array.from(part)));
}

describe('HDLC', () => {
  describe('addresses', () => {
    it('encodes small addresses in one byte with the terminator bit set', () => {
      expect(encodeAddress(0)).toEqual([0x01]);
      expect(encodeAddress(73)).toEqual([0x93]);
    });

    it('spreads larger addresses across bytes', () => {
      expect(encodeAddress(128)).toEqual([0x00, 0x03]);
      expect(decodeAddress(Uint8Array.of(0x00, 0x03))).toEqual({ address: 128, length: 2 });
    });

    it('returns null for an address that never terminates', () => {
      expect(decodeAddress(Uint8Array.of(0x02, 0x04))).toBeNull();
    });

    it('rejects negative addresses', () => {
      expect(() => encodeAddress(-1)).toThrow(RangeError);
    });
  });

  describe('encodeUiFrame', () => {
    it('wraps address, control and payload in flags', () => {
      const frame = encodeUiFrame(73, bytes('hi'));

      expect(frame[0]).toBe(0x7e);
      expect(frame[frame.length - 1]).toBe(0x7e);
      expect(Array.from(frame.subarray(1, 5))).toEqual([0x93, 0x03, 0x68, 0x69]);
    });

    it('escapes flag and escape bytes in the payload', () => {
      const frame = encodeUiFrame(73, Uint8Array.of(0x7e, 0x7d));

      expect(Array.from(frame.subarray(3, 7))).toEqual([0x7d, 0x5e, 0x7d, 0x5d]);
    });
  });

  describe('HdlcFrameDecoder', () => {
    it('decodes a frame and keeps its raw encoding', () => {
      const frame = encodeUiFrame(73, bytes('hello'));

      const [decoded, ...rest] = new HdlcFrameDecoder().process(frame);

      expect(rest).toEqual([]);
      expect(decoded?.status).toBe('ok');
      expect(decoded?.address).toBe(73);
      expect(decoded?.control).toBe(0x03);
      expect(decoded?.data).toEqual(bytes('hello'));
      expect(decoded?.rawEncoded).toEqual(frame);
    });

    it('unescapes stuffed payload bytes', () => {
      const frame = encodeUiFrame(5, Uint8Array.of(0x7e, 0x01, 0x7d));

      const frames = new HdlcFrameDecoder().process(frame);

      expect(frames.map((f) => f.status)).toEqual(['ok']);
      expect(frames[0]?.data).toEqual(Uint8Array.of(0x7e, 0x01, 0x7d));
    });

    it('completes a frame split across reads', () => {
      const frame = encodeUiFrame(73, bytes('split me'));
      const decoder = new HdlcFrameDecoder();

      expect(decoder.process(frame.subarray(0, 6))).toEqual([]);
      expect(decoder.bufferedBytes).toBe(5);

      const frames = decoder.process(frame.subarray(6));
      expect(frames).toHaveLength(1);
      expect(frames[0]?.rawEncoded).toEqual(frame);
    });

    it('returns bytes before the first flag as a framing error', () => {
      const frame = encodeUiFrame(73, bytes('ok'));

      const frames = new HdlcFrameDecoder().process(concat(bytes('xy'), frame));

      expect(frames.map((f) => f.status)).toEqual(['framing_error', 'ok']);
      expect(frames[0]?.rawEncoded).toEqual(bytes('xy'));
      expect(frames[1]?.rawEncoded).toEqual(frame);
    });

    it('ignores back-to-back flags', () => {
      const frame = encodeUiFrame(73, bytes('ok'));

      const frames = new HdlcFrameDecoder().process(concat(Uint8Array.of(0x7e, 0x7e), frame));

      expect(frames.map((f) => f.status)).toEqual(['ok']);
    });

    it('reports a corrupted frame as an FCS mismatch', () => {
      const frame = encodeUiFrame(73, bytes('hello'));
      frame[3] = 0x6a;

      const frames = new HdlcFrameDecoder().process(frame);

      expect(frames.map((f) => f.status)).toEqual(['fcs_mismatch']);
      expect(frames[0]?.rawEncoded).toEqual(frame);
    });

    it('reports a frame smaller than address, control and FCS as too short', () => {
      const frames = new HdlcFrameDecoder().process(Uint8Array.of(0x7e, 0x93, 0x03, 0x7e));

      expect(frames.map((f) => f.status)).toEqual(['frame_too_short']);
    });

    it('reports a flag right after an escape as a framing error', () => {
      const frames = new HdlcFrameDecoder().process(Uint8Array.of(0x7e, 0x93, 0x7d, 0x7e));

      expect(frames.map((f) => f.status)).toEqual(['framing_error']);
      expect(frames[0]?.rawEncoded).toEqual(Uint8Array.of(0x7e, 0x93, 0x7d, 0x7e));
    });

    it('decodes consecutive frames from one read', () => {
      const first = encodeUiFrame(73, bytes('one'));
      const second = encodeUiFrame(73, bytes('two'));

      const frames = new HdlcFrameDecoder().process(concat(first, second));

      expect(frames.map((f) => f.data)).toEqual([bytes('one'), bytes('two')]);
    });
  });

  describe('decodeSingleFrame', () => {
    it('returns the frame for a packet holding exactly one valid frame', () => {
      expect(decodeSingleFrame(encodeUiFrame(73, bytes('x')))?.data).toEqual(bytes('x'));
    });

    it('returns null for two frames, raw bytes or a bad frame', () => {
      const frame = encodeUiFrame(73, bytes('x'));
      const corrupted = Uint8Array.from(frame);
      corrupted[3] = 0x79;

      expect(decodeSingleFrame(concat(frame, frame))).toBeNull();
      expect(decodeSingleFrame(bytes('plain text'))).toBeNull();
      expect(decodeSingleFrame(corrupted)).toBeNull();
    });
  });
});
