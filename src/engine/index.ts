/**
 * Engine - batched state reads and the daily collection loop
 */

export {
  BatchStateReader,
  buildCallRequests,
  decodeBatch,
  DEFAULT_BATCH_MAX_RETRIES,
  DEFAULT_BATCH_RETRY_DELAY_MS,
  type BatchStateReaderOptions,
} from './state-reader.js';
export {
  collectDailyValues,
  serializeReport,
  type BlockResolver,
  type StateReader,
  type SnapshotRow,
  type SnapshotValue,
  type SkippedDate,
  type CollectionReport,
  type CollectDailyValuesParams,
} from './collector.js';
