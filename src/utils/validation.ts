/**
 * Query-set validation.
 * Runs before a batch is built so ids and names stay one-to-one.
 */

import { isHex } from 'viem';
import type { Query } from '../types/index.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function validateQuery(query: Query): void {
  if (query.name.trim() === '') {
    throw new ValidationError('Query name must not be empty', 'name');
  }
  if (!isHex(query.contractAddress) || query.contractAddress.length <= 2) {
    throw new ValidationError(
      `Invalid contract address for ${query.name}: "${query.contractAddress}"`,
      'contractAddress'
    );
  }
  if (!isHex(query.callData) || query.callData.length < 10) {
    throw new ValidationError(
      `Invalid call data for ${query.name}: "${query.callData}". Expected at least a 4-byte selector`,
      'callData'
    );
  }
  if (!Number.isInteger(query.decimals) || query.decimals < 0) {
    throw new ValidationError(`Invalid decimals for ${query.name}: ${query.decimals}`, 'decimals');
  }
}

/**
 * Validates every query and rejects duplicate names.
 */
export function validateQuerySet(queries: readonly Query[]): void {
  const seen = new Set<string>();
  for (const query of queries) {
    validateQuery(query);
    if (seen.has(query.name)) {
      throw new ValidationError(`Duplicate query name: "${query.name}"`, 'name');
    }
    seen.add(query.name);
  }
}
