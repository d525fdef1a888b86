import { type Hex, hexToBigInt, isHex, numberToHex } from 'viem';

/**
 * Encodes a block number or other quantity as minimal 0x-hex ("0x0" for zero).
 */
export function toQuantity(value: bigint): Hex {
  return numberToHex(value);
}

/**
 * Parses a non-empty 0x-hex string as an unsigned integer.
 * Returns undefined for anything else, including "0x".
 */
export function parseQuantity(value: unknown): bigint | undefined {
  if (!isHex(value) || value.length <= 2) {
    return undefined;
  }
  return hexToBigInt(value);
}

const ZERO_SENTINELS: ReadonlySet<string> = new Set(['0x', '0x0']);

/**
 * Decodes an eth_call return value as a big-endian unsigned integer.
 *
 * `null`, "0x" and "0x0" are how these calls report zero and decode to 0n.
 * Undefined means the value is present but not hex (a decode failure).
 */
export function decodeCallResult(value: unknown): bigint | undefined {
  if (value === null) {
    return 0n;
  }
  if (typeof value === 'string' && ZERO_SENTINELS.has(value)) {
    return 0n;
  }
  return parseQuantity(value);
}
