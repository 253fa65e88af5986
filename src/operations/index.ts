/**
 * Query and scan read path
 */

export { buildQueryInput, buildScanInput } from './query.js';
export type { ReadTarget, ReadOptions, QueryOptions, ScanOptions } from './query.js';
export { ResultIterator } from './result-iterator.js';
export type { Page, PageFetcher, ResultIteratorOptions } from './result-iterator.js';
