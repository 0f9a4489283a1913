/**
 * RPC packet and transfer chunk decoding
 *
 * The message schemas live in `proto/` and are loaded at run time with
 * protobufjs. Decoded messages are validated with zod before anything else
 * in the proxy sees them.
 */

import { join } from 'path';
import { fileURLToPath } from 'url';
import protobuf from 'protobufjs';
import type { Type } from 'protobufjs';
import { z } from 'zod';

const PROTO_DIR = fileURLToPath(new URL('../../proto/', import.meta.url));

export const ChunkType = {
  DATA: 'DATA',
  START: 'START',
  PARAMETERS_RETRANSMIT: 'PARAMETERS_RETRANSMIT',
  PARAMETERS_CONTINUE: 'PARAMETERS_CONTINUE',
  COMPLETION: 'COMPLETION',
  COMPLETION_ACK: 'COMPLETION_ACK',
  START_ACK: 'START_ACK',
  START_ACK_CONFIRMATION: 'START_ACK_CONFIRMATION',
} as const;

export type ChunkType = (typeof ChunkType)[keyof typeof ChunkType];

/**
 * What the proxy needs to know about a transfer chunk
 */
export interface ChunkDescriptor {
  type: ChunkType;
  offset?: number;
  sessionId?: number;
}

export interface TransferSchemas {
  rpcPacket: Type;
  chunk: Type;
}

let schemas: TransferSchemas | null = null;

/**
 * Load (once) the RpcPacket and Chunk message types
 */
export function loadTransferSchemas(): TransferSchemas {
  if (!schemas) {
    const root = protobuf.loadSync([
      join(PROTO_DIR, 'rpc_packet.proto'),
      join(PROTO_DIR, 'transfer.proto'),
    ]);
    schemas = {
      rpcPacket: root.lookupType('rpc.internal.RpcPacket'),
      chunk: root.lookupType('transfer.Chunk'),
    };
  }
  return schemas;
}

const RpcPacketSchema = z.object({
  type: z.string().optional(),
  channelId: z.number().int().nonnegative().optional(),
  serviceId: z.number().int().nonnegative().optional(),
  methodId: z.number().int().nonnegative().optional(),
  payload: z.instanceof(Uint8Array).optional(),
});

export type RpcPacket = z.infer<typeof RpcPacketSchema>;

const RawChunkSchema = z.object({
  transferId: z.number().int().nonnegative().optional(),
  pendingBytes: z.number().int().nonnegative().optional(),
  offset: z.number().int().nonnegative().optional(),
  type: z.nativeEnum(ChunkType).optional(),
  sessionId: z.number().int().nonnegative().optional(),
});

const TO_OBJECT_OPTIONS = { longs: Number, enums: String } as const;

function decodeMessage(type: Type, bytes: Uint8Array): Record<string, unknown> | null {
  try {
    return type.toObject(type.decode(bytes), TO_OBJECT_OPTIONS);
  } catch {
    // Not this message type.
    return null;
  }
}

/**
 * Decode an RPC packet, or return null if the bytes are not one
 */
export function decodeRpcPacket(bytes: Uint8Array): RpcPacket | null {
  const raw = decodeMessage(loadTransferSchemas().rpcPacket, bytes);
  if (!raw) return null;

  const parsed = RpcPacketSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Decode a transfer chunk, or return null if the bytes are not one
 *
 * A chunk without an explicit type is a legacy chunk: it asks for data
 * (PARAMETERS_RETRANSMIT) when it carries pending_bytes and is DATA
 * otherwise. The legacy transfer_id stands in for a missing session id.
 */
export function decodeChunk(bytes: Uint8Array): ChunkDescriptor | null {
  const raw = decodeMessage(loadTransferSchemas().chunk, bytes);
  if (!raw) return null;

  const parsed = RawChunkSchema.safeParse(raw);
  if (!parsed.success) return null;

  const chunk = parsed.data;
  const type = chunk.type
    ?? (chunk.pendingBytes !== undefined ? ChunkType.PARAMETERS_RETRANSMIT : ChunkType.DATA);
  const sessionId = chunk.sessionId ?? chunk.transferId;

  return {
    type,
    offset: chunk.offset ?? 0,
    ...(sessionId !== undefined ? { sessionId } : {}),
  };
}
