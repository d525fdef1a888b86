/**
 * ERC-20 read encoding
 *
 * Only `totalSupply()` is needed by default; any other zero-argument view
 * returning uint256 can be supplied as raw call data in the query file.
 */

import { encodeFunctionData, erc20Abi, type Hex } from 'viem';
import type { Query } from '../types/snapshot.js';

/** `totalSupply()` selector, 0x18160ddd */
export const TOTAL_SUPPLY_CALLDATA: Hex = encodeFunctionData({
  abi: erc20Abi,
  functionName: 'totalSupply',
});

export function totalSupplyQuery(name: string, contractAddress: string, decimals: number): Query {
  return { name, contractAddress, callData: TOTAL_SUPPLY_CALLDATA, decimals };
}
