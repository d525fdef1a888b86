#!/usr/bin/env node
/**
 * Daily total-supply snapshots
 *
 * Resolves each day from `today - LOOKBACK_DAYS` through today (UTC) to a
 * block, reads the configured queries at that block and prints the report
 * as JSON on stdout. Diagnostics go to the logger.
 */

import { BlockTimestampResolver } from "./blocks/resolver.js";
import { loadConfig } from "./config/index.js";
import { loadQueries } from "./config/queries.js";
import { BatchStateReader, collectDailyValues, serializeReport } from "./engine/index.js";
import { RpcTransport, createBackoff, createEndpoint } from "./rpc/index.js";
import { addDays, createLogger, getErrorMessage, setLogLevel, toCalendarDate } from "./utils/index.js";

const logger = createLogger("supply-snapshots");

const start = async () => {
  try {
    const config = loadConfig();
    setLogLevel(config.log.level);

    const queries = await loadQueries(config.queriesFile);
    const endpoint = createEndpoint(config.rpc);
    const transport = new RpcTransport(endpoint, {
      backoff: createBackoff(config.rpc.backoff, config.rpc.retryDelayMs, config.rpc.maxRetryDelayMs),
    });
    const resolver = new BlockTimestampResolver(transport);
    const reader = new BatchStateReader(transport, {
      maxRetries: config.batch.maxRetries,
      retryDelayMs: config.batch.retryDelayMs,
    });

    const endDate = toCalendarDate(new Date());
    const startDate = addDays(endDate, -config.lookbackDays);
    logger.info({ startDate, endDate, queries: queries.map((query) => query.name) }, "Collecting snapshots");

    const report = await collectDailyValues({ resolver, reader, queries, startDate, endDate });
    process.stdout.write(`${serializeReport(report)}\n`);
  } catch (error: unknown) {
    logger.error({ error: getErrorMessage(error) }, "Failed to collect snapshots");
    process.exitCode = 1;
  }
};

void start();
