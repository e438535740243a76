/**
 * JSON-RPC 2.0 message shapes used by the remote tool protocol.
 *
 * Only what the server needs: client requests and notifications in, results
 * and errors out. Batches are not accepted.
 */
import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';

export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

export const ERROR_CODES = {
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

const idSchema = z.union([z.string(), z.number()]);

/**
 * A request (with id) or a notification (without).
 */
export const jsonRpcMessageSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: idSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

export type JsonRpcId = z.infer<typeof idSchema>;
export type JsonRpcMessage = z.infer<typeof jsonRpcMessageSchema>;

export interface JsonRpcSuccess {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId | null;
  error: {
    code: number;
    message: string;
  };
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/**
 * Thrown by method handlers to answer with a JSON-RPC error object.
 */
export class JsonRpcError extends Error {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'JsonRpcError';
    this.code = code;
  }
}

export function success(id: JsonRpcId, result: unknown): JsonRpcSuccess {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function failure(id: JsonRpcId | null, code: number, message: string): JsonRpcFailure {
  return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
}
