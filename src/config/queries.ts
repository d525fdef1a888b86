/**
 * Query-set file loading
 *
 * The file is a JSON array of `{ name, contract, decimals, callData? }`;
 * `callData` defaults to `totalSupply()`.
 */

import { readFile } from "node:fs/promises";
import { type Hex, isAddress, isHex } from "viem";
import { z } from "zod";
import { TOTAL_SUPPLY_CALLDATA } from "../rpc/abi.js";
import type { Query } from "../types/snapshot.js";
import { ConfigError, getErrorMessage } from "../utils/errors.js";

const QueryEntrySchema = z.object({
  name: z.string().min(1),
  contract: z.string().refine((value) => isAddress(value, { strict: false }), {
    message: "Expected a 20-byte 0x-prefixed address",
  }),
  decimals: z.number().int().min(0),
  callData: z.custom<Hex>((value) => isHex(value) && value.length >= 10, {
    message: "Expected 0x-prefixed call data with at least a 4-byte selector",
  }).optional(),
});

const QueryFileSchema = z
  .array(QueryEntrySchema)
  .min(1)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate query name: "${entry.name}"`,
          path: [index, "name"],
        });
      }
      seen.add(entry.name);
    });
  });

/**
 * @throws ConfigError if the data is not a valid query set
 */
export function parseQueries(data: unknown): Query[] {
  const result = QueryFileSchema.safeParse(data);
  if (!result.success) {
    const issues: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const path = issue.path.join(".") || "(root)";
      issues[path] = [...(issues[path] ?? []), issue.message];
    }
    throw new ConfigError("Invalid query set", issues);
  }

  return result.data.map((entry) => ({
    name: entry.name,
    contractAddress: entry.contract,
    callData: entry.callData ?? TOTAL_SUPPLY_CALLDATA,
    decimals: entry.decimals,
  }));
}

export async function loadQueries(filePath: string): Promise<Query[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot read query file ${filePath}: ${getErrorMessage(error)}`);
  }
  return parseQueries(data);
}
