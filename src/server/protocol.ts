/**
 * JSON-RPC 2.0 envelope for the /mcp endpoint
 */

import { z } from 'zod';

export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type RpcId = string | number | null;

export const rpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0').default('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).default(null),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).default({}),
});

export type RpcRequest = z.output<typeof rpcRequestSchema>;

export const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).default({}),
});

export interface RpcSuccess<T> {
  jsonrpc: '2.0';
  id: RpcId;
  result: T;
}

export interface RpcFailure {
  jsonrpc: '2.0';
  id: RpcId;
  error: { code: number; message: string };
}

export function rpcResult<T>(id: RpcId, result: T): RpcSuccess<T> {
  return { jsonrpc: '2.0', id, result };
}

export function rpcError(id: RpcId, code: number, message: string): RpcFailure {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

// Best-effort id recovery from an envelope that failed validation
export function idOf(body: unknown): RpcId {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const id = body.id;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return null;
}
