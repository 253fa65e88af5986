/**
 * Batch Operations
 *
 * Chunked BatchGetItem/BatchWriteItem execution with resubmission of
 * unprocessed entries, and the scoped batch writer.
 */

export { chunk, chunkBySize } from './chunker.js';
export { calculateBackoff, sleep } from './backoff.js';
export type { BatchRetryConfig, SleepFn } from './backoff.js';
export {
  BatchExecutor,
  DEFAULT_BATCH_RETRY_CONFIG,
  MAX_BATCH_GET_ITEMS,
  MAX_BATCH_WRITE_ITEMS,
  MAX_BATCH_WRITE_BYTES,
  writeRequestSize,
} from './executor.js';
export type { BatchExecutorOptions, BatchGetOptions } from './executor.js';
export { BatchWriter } from './writer.js';
