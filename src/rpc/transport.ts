/**
 * JSON-RPC transport over HTTP POST
 *
 * Every physical call gets the same policy: up to `endpoint.maxRetries`
 * attempts with a backoff delay between them. Exhaustion is returned as
 * Unavailable; nothing network-related is thrown to callers.
 */

import axios from 'axios';
import type { Unavailable } from '../types/snapshot.js';
import { describeTransportError, getErrorMessage } from '../utils/errors.js';
import { type Logger, createLogger } from '../utils/logger.js';
import { type BackoffStrategy, type Sleep, fixedBackoff, sleep as defaultSleep } from './backoff.js';
import { unavailable } from './outcome.js';
import {
  type Endpoint,
  RpcEnvelopeSchema,
  type RpcRequest,
  type RpcResponse,
  classifyEnvelope,
  toPayload,
} from './types.js';

export interface JsonRpcTransport {
  execute(request: RpcRequest): Promise<RpcResponse | Unavailable>;
  /**
   * Responses come back in whatever order the server chose; correlate by id.
   */
  executeBatch(requests: readonly RpcRequest[]): Promise<RpcResponse[] | Unavailable>;
}

export interface RpcTransportOptions {
  /** Defaults to a fixed delay of `endpoint.retryDelayMs` */
  backoff?: BackoffStrategy;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * A body that is not a JSON-RPC envelope. Counts as a failed attempt.
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export class RpcTransport implements JsonRpcTransport {
  private readonly backoff: BackoffStrategy;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: Endpoint,
    options: RpcTransportOptions = {},
  ) {
    this.backoff = options.backoff ?? fixedBackoff(endpoint.retryDelayMs);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('rpc-transport');
  }

  async execute(request: RpcRequest): Promise<RpcResponse | Unavailable> {
    return this.send<RpcResponse>(`RPC call ${request.method}`, toPayload(request), (data) => {
      const parsed = RpcEnvelopeSchema.safeParse(data);
      if (!parsed.success) {
        throw new MalformedResponseError(`Invalid JSON-RPC response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
      }
      const envelope = parsed.data;
      if (envelope.id !== request.id) {
        return {
          kind: 'anomaly',
          id: request.id,
          reason: `response id ${JSON.stringify(envelope.id)} does not match request id ${request.id}`,
        };
      }
      return classifyEnvelope(request.id, envelope);
    });
  }

  async executeBatch(requests: readonly RpcRequest[]): Promise<RpcResponse[] | Unavailable> {
    if (requests.length === 0) {
      return [];
    }

    return this.send<RpcResponse[]>(`Batch RPC call (${requests.length} requests)`, requests.map(toPayload), (data) => {
      if (!Array.isArray(data)) {
        throw new MalformedResponseError('Batch response is not an array');
      }
      return this.parseBatch(data);
    });
  }

  private parseBatch(entries: unknown[]): RpcResponse[] {
    const responses: RpcResponse[] = [];
    for (const entry of entries) {
      const parsed = RpcEnvelopeSchema.safeParse(entry);
      if (!parsed.success) {
        this.logger.warn({ entry }, 'Dropping malformed batch response entry');
        continue;
      }
      const { id } = parsed.data;
      if (typeof id !== 'number' || !Number.isInteger(id)) {
        this.logger.warn({ id }, 'Dropping batch response entry with non-integer id');
        continue;
      }
      responses.push(classifyEnvelope(id, parsed.data));
    }
    return responses;
  }

  /**
   * POSTs `payload` and hands the body to `parse`; a thrown error from either
   * step fails the attempt.
   */
  private async send<T>(label: string, payload: unknown, parse: (data: unknown) => T): Promise<T | Unavailable> {
    const maxAttempts = this.endpoint.maxRetries;
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await axios.post(this.endpoint.url, payload, {
          timeout: this.endpoint.timeoutMs,
          headers: { 'Content-Type': 'application/json' },
        });
        return parse(response.data);
      } catch (error) {
        lastReason = error instanceof MalformedResponseError ? getErrorMessage(error) : describeTransportError(error);
        this.logger.warn({ attempt, maxAttempts, error: lastReason }, `${label} failed (attempt ${attempt}/${maxAttempts})`);
        if (attempt < maxAttempts) {
          await this.sleep(this.backoff(attempt));
        }
      }
    }

    this.logger.error({ attempts: maxAttempts, error: lastReason }, `${label} unavailable after ${maxAttempts} attempts`);
    return unavailable(`${label} failed after ${maxAttempts} attempts: ${lastReason}`);
  }
}
