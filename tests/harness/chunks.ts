/**
 * Helpers for building wire-format transfer traffic in tests.
 */

import { encodeUiFrame } from '../../src/codec/hdlc.js';
import { ChunkType, loadTransferSchemas } from '../../src/codec/chunk.js';

/** HDLC address used by the RPC channel in tests */
export const RPC_ADDRESS = 73;

export interface TestChunk {
  type?: ChunkType;
  offset?: number;
  sessionId?: number;
  transferId?: number;
  pendingBytes?: number;
  data?: Uint8Array;
}

export function encodeChunk(chunk: TestChunk): Uint8Array {
  const { chunk: Chunk } = loadTransferSchemas();
  const message = Chunk.fromObject({
    ...(chunk.type !== undefined ? { type: chunk.type } : {}),
    ...(chunk.offset !== undefined ? { offset: chunk.offset } : {}),
    ...(chunk.sessionId !== undefined ? { sessionId: chunk.sessionId } : {}),
    ...(chunk.transferId !== undefined ? { transferId: chunk.transferId } : {}),
    ...(chunk.pendingBytes !== undefined ? { pendingBytes: chunk.pendingBytes } : {}),
    ...(chunk.data !== undefined ? { data: chunk.data } : {}),
  });
  return Chunk.encode(message).finish();
}

export function encodeRpcPacket(payload: Uint8Array, type = 'SERVER_STREAM'): Uint8Array {
  const { rpcPacket: RpcPacket } = loadTransferSchemas();
  const message = RpcPacket.fromObject({
    type,
    channelId: 101,
    serviceId: 1001,
    methodId: 100001,
    payload,
  });
  return RpcPacket.encode(message).finish();
}

/**
 * A complete HDLC frame carrying an RPC packet carrying `chunk`
 */
export function transferFrame(chunk: TestChunk): Uint8Array {
  return encodeUiFrame(RPC_ADDRESS, encodeRpcPacket(encodeChunk(chunk)));
}

/**
 * A data chunk frame at `offset` with a one-byte payload
 */
export function dataFrame(offset: number, sessionId = 1): Uint8Array {
  return transferFrame({ type: ChunkType.DATA, offset, sessionId, data: Uint8Array.of(offset & 0xff) });
}

/**
 * A framed RPC request that carries no transfer chunk
 */
export function plainRpcFrame(): Uint8Array {
  return encodeUiFrame(RPC_ADDRESS, encodeRpcPacket(new Uint8Array(0), 'REQUEST'));
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
