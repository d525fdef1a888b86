/**
 * Date → block resolution by binary search over block numbers.
 *
 * Finds the latest block whose UTC date is on or before the target date
 * using only eth_blockNumber and eth_getBlockByNumber. Block timestamps are
 * assumed monotonically non-decreasing.
 *
 * NOTE: Several blocks usually share a calendar date. The first block the
 * search lands on with exactly the target date is returned, which is not
 * necessarily the first or last block of that day. When no probed block
 * falls on the target date, the latest earlier block seen on the search
 * path is returned.
 */

import { z } from 'zod';
import { parseQuantity, toQuantity } from '../rpc/hex.js';
import { isUnavailable, unavailable } from '../rpc/outcome.js';
import type { JsonRpcTransport } from '../rpc/transport.js';
import { RPC_METHODS, type RpcResponse } from '../rpc/types.js';
import type { BlockRef, BlockResolution, NotFound, Unavailable } from '../types/snapshot.js';
import { type CalendarDate, parseCalendarDate, toCalendarDate } from '../utils/calendar.js';
import { type Logger, createLogger } from '../utils/logger.js';

const BlockHeaderSchema = z.object({
  timestamp: z.string(),
});

// 9999-12-31T23:59:59Z; later instants no longer render as YYYY-MM-DD
const MAX_TIMESTAMP_SECONDS = 253_402_300_799n;

type Payload = { kind: 'payload'; value: unknown } | Unavailable;

export interface BlockTimestampResolverOptions {
  logger?: Logger;
}

/**
 * Reads the payload of a single-call response, folding RPC errors and
 * anomalies into Unavailable.
 */
function unwrapResult(response: RpcResponse | Unavailable): Payload {
  switch (response.kind) {
    case 'unavailable':
      return response;
    case 'result':
      return { kind: 'payload', value: response.result };
    case 'error':
      return unavailable(`RPC error: ${response.error.message}`);
    case 'anomaly':
      return unavailable(response.reason);
  }
}

export class BlockTimestampResolver {
  private readonly logger: Logger;

  constructor(
    private readonly transport: JsonRpcTransport,
    options: BlockTimestampResolverOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('block-resolver');
  }

  /**
   * Resolve a calendar date (YYYY-MM-DD, UTC) or the UTC day of a Date.
   *
   * Any failed oracle read ends the search with NotFound; no partial
   * progress is kept between calls.
   *
   * @throws ValidationError if the date is malformed
   */
  async resolve(target: CalendarDate | Date): Promise<BlockResolution> {
    const targetDate = parseCalendarDate(target);

    const head = await this.getLatestBlockNumber();
    if (isUnavailable(head)) {
      return this.notFound(targetDate, `latest block number unavailable: ${head.reason}`);
    }

    let low = 0n;
    let high = head;
    let candidate: BlockRef | undefined;

    while (low <= high) {
      const mid = (low + high) / 2n;
      const block = await this.getBlock(mid);
      if (isUnavailable(block)) {
        return this.notFound(targetDate, `block ${mid} unavailable: ${block.reason}`);
      }

      this.logger.debug(
        { targetDate, block: mid.toString(), blockDate: block.date, low: low.toString(), high: high.toString() },
        'Search step',
      );

      if (block.date === targetDate) {
        return block;
      }
      if (block.date < targetDate) {
        candidate = block;
        low = mid + 1n;
      } else {
        high = mid - 1n;
      }
    }

    if (!candidate) {
      return this.notFound(targetDate, `no block on or before ${targetDate}`);
    }
    return candidate;
  }

  private async getLatestBlockNumber(): Promise<bigint | Unavailable> {
    const response = await this.transport.execute({ id: 1, method: RPC_METHODS.blockNumber, params: [] });
    const payload = unwrapResult(response);
    if (payload.kind === 'unavailable') {
      return payload;
    }

    const head = parseQuantity(payload.value);
    return head === undefined ? unavailable(`invalid block number: ${JSON.stringify(payload.value)}`) : head;
  }

  private async getBlock(blockNumber: bigint): Promise<BlockRef | Unavailable> {
    const response = await this.transport.execute({
      id: 1,
      method: RPC_METHODS.getBlockByNumber,
      params: [toQuantity(blockNumber), false],
    });
    const payload = unwrapResult(response);
    if (payload.kind === 'unavailable') {
      return payload;
    }
    if (payload.value === null) {
      return unavailable(`block ${blockNumber} not found`);
    }

    const header = BlockHeaderSchema.safeParse(payload.value);
    const seconds = header.success ? parseQuantity(header.data.timestamp) : undefined;
    if (seconds === undefined || seconds > MAX_TIMESTAMP_SECONDS) {
      return unavailable(`block ${blockNumber} has no valid timestamp`);
    }

    const timestampUtc = new Date(Number(seconds) * 1000);
    return { kind: 'block', number: blockNumber, timestampUtc, date: toCalendarDate(timestampUtc) };
  }

  private notFound(targetDate: CalendarDate, reason: string): NotFound {
    this.logger.warn({ targetDate, reason }, 'No block resolved for date');
    return { kind: 'not-found', reason };
  }
}
