/**
 * RPC module - JSON-RPC transport, wire types and hex codecs
 */

export {
  RpcTransport,
  MalformedResponseError,
  type JsonRpcTransport,
  type RpcTransportOptions,
} from './transport.js';
export {
  RPC_METHODS,
  classifyEnvelope,
  toPayload,
  type Endpoint,
  type RpcRequest,
  type RpcResponse,
  type RpcErrorObject,
} from './types.js';
export { createEndpoint, DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY_MS, DEFAULT_TIMEOUT_MS, type EndpointOptions } from './endpoint.js';
export {
  createBackoff,
  exponentialBackoff,
  fixedBackoff,
  sleep,
  type BackoffKind,
  type BackoffStrategy,
  type ExponentialBackoffOptions,
  type Sleep,
} from './backoff.js';
export { decodeCallResult, parseQuantity, toQuantity } from './hex.js';
export { isUnavailable, unavailable } from './outcome.js';
export { TOTAL_SUPPLY_CALLDATA, totalSupplyQuery } from './abi.js';
