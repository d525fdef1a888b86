import type { Hex } from 'viem';
import type { CalendarDate } from '../utils/calendar.js';

/**
 * A value that could not be obtained after the retry budget ran out.
 * Returned, never thrown.
 */
export interface Unavailable {
  readonly kind: 'unavailable';
  readonly reason: string;
}

/**
 * Latest block found on or before a target date.
 */
export interface BlockRef {
  readonly kind: 'block';
  readonly number: bigint;
  readonly timestampUtc: Date;
  /** UTC calendar date of `timestampUtc` */
  readonly date: CalendarDate;
}

export interface NotFound {
  readonly kind: 'not-found';
  readonly reason: string;
}

export type BlockResolution = BlockRef | NotFound;

/**
 * One contract read, evaluated with eth_call at a historical block.
 */
export interface Query {
  /** Unique within a query set; key of the result mapping */
  name: string;
  contractAddress: string;
  callData: Hex;
  /** Applied only when presenting values; reads return raw integers */
  decimals: number;
}

export type QueryValue = bigint | Unavailable;

export type QueryResult = Readonly<Record<string, QueryValue>>;
