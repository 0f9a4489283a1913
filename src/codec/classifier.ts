/**
 * Packet classification for fault filters
 */

import { decodeChunk, decodeRpcPacket, type ChunkDescriptor } from './chunk.js';
import { decodeSingleFrame } from './hdlc.js';

/**
 * Decides whether a packet is a transfer chunk. Must never throw: anything
 * that cannot be decoded is simply not a chunk.
 */
export interface ChunkClassifier {
  classify(packet: Uint8Array): ChunkDescriptor | null;
}

/**
 * Classifies packets that are exactly one HDLC frame wrapping an RPC packet
 * whose payload is a transfer chunk.
 */
export class TransferChunkClassifier implements ChunkClassifier {
  classify(packet: Uint8Array): ChunkDescriptor | null {
    const frame = decodeSingleFrame(packet);
    if (!frame) return null;

    const rpcPacket = decodeRpcPacket(frame.data);
    if (!rpcPacket?.payload || rpcPacket.payload.length === 0) return null;

    return decodeChunk(rpcPacket.payload);
  }
}

export const defaultChunkClassifier: ChunkClassifier = new TransferChunkClassifier();
