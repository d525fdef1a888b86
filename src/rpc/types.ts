/**
 * JSON-RPC 2.0 wire types
 *
 * Requests are built by callers; responses are validated with zod and
 * classified into a tagged union so that every consumer handles the
 * result / error / anomaly cases explicitly.
 */

import { z } from 'zod';

export const RPC_METHODS = {
  blockNumber: 'eth_blockNumber',
  getBlockByNumber: 'eth_getBlockByNumber',
  call: 'eth_call',
} as const;

/**
 * One RPC target. Frozen once built and shared read-only by every component.
 */
export interface Endpoint {
  readonly url: string;
  readonly timeoutMs: number;
  /** Total attempts per physical call, including the first */
  readonly maxRetries: number;
  readonly retryDelayMs: number;
}

export interface RpcRequest {
  /** Unique within one batch */
  id: number;
  method: string;
  params: readonly unknown[];
}

export interface RpcErrorObject {
  code?: number;
  message: string;
  data?: unknown;
}

export type RpcResponse =
  | { kind: 'result'; id: number; result: unknown }
  | { kind: 'error'; id: number; error: RpcErrorObject }
  | { kind: 'anomaly'; id: number; reason: string };

const RpcErrorSchema = z.object({
  code: z.number().int().optional(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const RpcEnvelopeSchema = z
  .object({
    jsonrpc: z.literal('2.0').optional(),
    id: z.union([z.number(), z.string(), z.null()]),
    result: z.unknown().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type RpcEnvelope = z.infer<typeof RpcEnvelopeSchema>;

function toErrorObject(error: unknown): RpcErrorObject {
  const parsed = RpcErrorSchema.safeParse(error);
  return parsed.success ? parsed.data : { message: JSON.stringify(error) };
}

/**
 * Classifies an envelope whose id is already known to be an integer.
 * An envelope carrying both `result` and `error`, or neither, is an anomaly.
 * `result: null` counts as present.
 */
export function classifyEnvelope(id: number, envelope: RpcEnvelope): RpcResponse {
  const hasResult = envelope.result !== undefined;
  const hasError = envelope.error !== undefined && envelope.error !== null;

  if (hasResult && hasError) {
    return { kind: 'anomaly', id, reason: 'response carries both result and error' };
  }
  if (hasError) {
    return { kind: 'error', id, error: toErrorObject(envelope.error) };
  }
  if (hasResult) {
    return { kind: 'result', id, result: envelope.result };
  }
  return { kind: 'anomaly', id, reason: 'response carries neither result nor error' };
}

export function toPayload(request: RpcRequest) {
  return {
    jsonrpc: '2.0' as const,
    id: request.id,
    method: request.method,
    params: request.params,
  };
}
