export type {
  Unavailable,
  BlockRef,
  NotFound,
  BlockResolution,
  Query,
  QueryValue,
  QueryResult,
} from './snapshot.js';
