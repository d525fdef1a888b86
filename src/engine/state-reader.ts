/**
 * Batched contract reads at a historical block
 *
 * All queries go out as one JSON-RPC batch of eth_call requests. Responses
 * are matched back by id (the query's position), never by order. If any
 * entry cannot be decoded the whole batch is sent again; after the last
 * attempt the final mapping is returned as-is.
 */

import { type BackoffStrategy, type Sleep, fixedBackoff, sleep as defaultSleep } from '../rpc/backoff.js';
import { decodeCallResult, toQuantity } from '../rpc/hex.js';
import { isUnavailable, unavailable } from '../rpc/outcome.js';
import type { JsonRpcTransport } from '../rpc/transport.js';
import { RPC_METHODS, type RpcRequest, type RpcResponse } from '../rpc/types.js';
import type { Query, QueryResult, QueryValue } from '../types/snapshot.js';
import { type Logger, createLogger } from '../utils/logger.js';
import { validateQuerySet } from '../utils/validation.js';

export const DEFAULT_BATCH_MAX_RETRIES = 3;
export const DEFAULT_BATCH_RETRY_DELAY_MS = 1_000;

export interface BatchStateReaderOptions {
  /** Whole-batch attempts, including the first */
  maxRetries?: number;
  retryDelayMs?: number;
  /** Overrides the fixed `retryDelayMs` policy */
  backoff?: BackoffStrategy;
  sleep?: Sleep;
  logger?: Logger;
}

export function buildCallRequests(blockNumber: bigint, queries: readonly Query[]): RpcRequest[] {
  const blockTag = toQuantity(blockNumber);
  return queries.map((query, index) => ({
    id: index,
    method: RPC_METHODS.call,
    params: [{ to: query.contractAddress, data: query.callData }, blockTag],
  }));
}

function decodeResponse(response: RpcResponse): QueryValue {
  switch (response.kind) {
    case 'result': {
      const value = decodeCallResult(response.result);
      return value ?? unavailable(`undecodable result: ${JSON.stringify(response.result)}`);
    }
    case 'error':
      return unavailable(`RPC error: ${response.error.message}`);
    case 'anomaly':
      return unavailable(response.reason);
  }
}

/**
 * Maps batch responses onto queries by id. Missing or duplicated ids make
 * that query Unavailable; ids matching no query are ignored.
 */
export function decodeBatch(
  queries: readonly Query[],
  responses: readonly RpcResponse[],
  logger: Logger,
): QueryResult {
  const byId = new Map<number, RpcResponse>();
  const duplicated = new Set<number>();

  for (const response of responses) {
    if (response.id < 0 || response.id >= queries.length) {
      logger.warn({ id: response.id }, 'Ignoring response with unmatched id');
      continue;
    }
    if (byId.has(response.id)) {
      logger.warn({ id: response.id, query: queries[response.id].name }, 'Duplicate response id');
      duplicated.add(response.id);
      continue;
    }
    byId.set(response.id, response);
  }

  return Object.fromEntries(
    queries.map((query, id): [string, QueryValue] => {
      const response = byId.get(id);
      if (duplicated.has(id)) {
        return [query.name, unavailable(`duplicate responses for id ${id}`)];
      }
      if (!response) {
        return [query.name, unavailable(`no response for id ${id}`)];
      }
      return [query.name, decodeResponse(response)];
    }),
  );
}

export class BatchStateReader {
  private readonly maxRetries: number;
  private readonly backoff: BackoffStrategy;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(
    private readonly transport: JsonRpcTransport,
    options: BatchStateReaderOptions = {},
  ) {
    this.maxRetries = options.maxRetries ?? DEFAULT_BATCH_MAX_RETRIES;
    this.backoff = options.backoff ?? fixedBackoff(options.retryDelayMs ?? DEFAULT_BATCH_RETRY_DELAY_MS);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('state-reader');
  }

  /**
   * Read every query at `blockNumber`. Values are raw integers; entries that
   * stay undecodable after the last attempt are Unavailable.
   *
   * @throws ValidationError if the query set is invalid
   */
  async readAll(blockNumber: bigint, queries: readonly Query[]): Promise<QueryResult> {
    validateQuerySet(queries);
    if (queries.length === 0) {
      return {};
    }

    const requests = buildCallRequests(blockNumber, queries);
    let result: QueryResult = {};

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      result = await this.readOnce(queries, requests);
      const missing = Object.keys(result).filter((name) => isUnavailable(result[name]));
      if (missing.length === 0) {
        return result;
      }

      this.logger.warn(
        { blockNumber: blockNumber.toString(), attempt, maxAttempts: this.maxRetries, missing },
        'Batch read incomplete',
      );
      if (attempt < this.maxRetries) {
        await this.sleep(this.backoff(attempt));
      }
    }

    this.logger.error({ blockNumber: blockNumber.toString() }, 'Batch read still incomplete after retries');
    return result;
  }

  private async readOnce(queries: readonly Query[], requests: readonly RpcRequest[]): Promise<QueryResult> {
    const responses = await this.transport.executeBatch(requests);
    if (isUnavailable(responses)) {
      return Object.fromEntries(queries.map((query): [string, QueryValue] => [query.name, responses]));
    }
    return decodeBatch(queries, responses, this.logger);
  }
}
