/**
 * Daily snapshot collection
 *
 * Walks a date range one day at a time: resolve the day to a block, read
 * every query at that block, scale by decimals. A day whose block cannot be
 * resolved, or whose values stay Unavailable, is skipped and reported.
 */

import { formatUnits } from 'viem';
import { isUnavailable } from '../rpc/outcome.js';
import type { BlockResolution, Query, QueryResult } from '../types/snapshot.js';
import { type CalendarDate, dateRange } from '../utils/calendar.js';
import { type Logger, createLogger } from '../utils/logger.js';

export interface BlockResolver {
  resolve(target: CalendarDate | Date): Promise<BlockResolution>;
}

export interface StateReader {
  readAll(blockNumber: bigint, queries: readonly Query[]): Promise<QueryResult>;
}

export interface SnapshotValue {
  raw: bigint;
  /** `raw` divided by 10^decimals, as a decimal string */
  scaled: string;
}

export interface SnapshotRow {
  date: CalendarDate;
  block: bigint;
  blockTimestamp: Date;
  values: Record<string, SnapshotValue>;
}

export interface SkippedDate {
  date: CalendarDate;
  reason: 'block-not-found' | 'values-unavailable';
  detail: string;
}

export interface CollectionReport {
  rows: SnapshotRow[];
  skipped: SkippedDate[];
}

export interface CollectDailyValuesParams {
  resolver: BlockResolver;
  reader: StateReader;
  queries: readonly Query[];
  startDate: CalendarDate;
  endDate: CalendarDate;
  logger?: Logger;
}

export async function collectDailyValues({
  resolver,
  reader,
  queries,
  startDate,
  endDate,
  logger = createLogger('collector'),
}: CollectDailyValuesParams): Promise<CollectionReport> {
  const report: CollectionReport = { rows: [], skipped: [] };

  for (const date of dateRange(startDate, endDate)) {
    logger.info({ date }, 'Fetching data for date');

    const resolution = await resolver.resolve(date);
    if (resolution.kind === 'not-found') {
      logger.warn({ date, reason: resolution.reason }, 'No block found, skipping date');
      report.skipped.push({ date, reason: 'block-not-found', detail: resolution.reason });
      continue;
    }

    const result = await reader.readAll(resolution.number, queries);
    const entries: [string, SnapshotValue][] = [];
    const missing: string[] = [];
    for (const query of queries) {
      const raw = Object.hasOwn(result, query.name) ? result[query.name] : undefined;
      if (raw === undefined || isUnavailable(raw)) {
        missing.push(query.name);
        continue;
      }
      entries.push([query.name, { raw, scaled: formatUnits(raw, query.decimals) }]);
    }

    if (missing.length > 0) {
      logger.warn({ date, block: resolution.number.toString(), missing }, 'Values unavailable, skipping date');
      report.skipped.push({ date, reason: 'values-unavailable', detail: missing.join(', ') });
      continue;
    }

    report.rows.push({
      date,
      block: resolution.number,
      blockTimestamp: resolution.timestampUtc,
      values: Object.fromEntries(entries),
    });
  }

  logger.info({ rows: report.rows.length, skipped: report.skipped.length }, 'Collection complete');
  return report;
}

/**
 * JSON rendering with bigints as decimal strings.
 */
export function serializeReport(report: CollectionReport): string {
  return JSON.stringify(report, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value), 2);
}
