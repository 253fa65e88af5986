/**
 * Batch executor: BatchGetItem and BatchWriteItem with chunking and
 * resubmission of store-reported unprocessed entries.
 */

import type { KeysAndAttributes, WriteRequest } from '@aws-sdk/client-dynamodb';

import type { WireItem } from '../codec/index.js';
import { estimateItemSize } from '../codec/index.js';
import { BatchIncompleteError } from '../error/index.js';
import type { Logger } from '../observability/index.js';
import { MapperMetricNames, NoopLogger, NoopMetricsCollector } from '../observability/index.js';
import type { MetricsCollector } from '../observability/index.js';
import type { DynamoDBTransport } from '../transport/index.js';
import { calculateBackoff, sleep as defaultSleep } from './backoff.js';
import type { BatchRetryConfig, SleepFn } from './backoff.js';
import { chunk, chunkBySize } from './chunker.js';

/**
 * Maximum number of keys in a single BatchGetItem request.
 */
export const MAX_BATCH_GET_ITEMS = 100;

/**
 * Maximum number of requests in a single BatchWriteItem request.
 */
export const MAX_BATCH_WRITE_ITEMS = 25;

/**
 * Maximum BatchWriteItem request payload (16 MiB).
 */
export const MAX_BATCH_WRITE_BYTES = 16 * 1024 * 1024;

export const DEFAULT_BATCH_RETRY_CONFIG: BatchRetryConfig = {
  maxRetries: 3,
  baseDelayMs: 100,
  maxDelayMs: 5000,
};

export interface BatchExecutorOptions {
  retry?: Partial<BatchRetryConfig>;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Replaces the timer-based sleep between resubmissions */
  sleep?: SleepFn;
}

export interface BatchGetOptions {
  consistentRead?: boolean;
  /** Attribute names to return */
  attributesToGet?: readonly string[];
}

/**
 * Estimated payload of one write request
 */
export function writeRequestSize(request: WriteRequest): number {
  const document: WireItem = request.PutRequest?.Item ?? request.DeleteRequest?.Key ?? {};
  return estimateItemSize(document);
}

/**
 * Runs batch reads and writes against one transport.
 *
 * Chunks are submitted one after another; the retries of a chunk complete
 * before the next chunk starts. Entries are never deduplicated.
 */
export class BatchExecutor {
  private readonly retry: BatchRetryConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly sleep: SleepFn;

  constructor(
    private readonly transport: DynamoDBTransport,
    options: BatchExecutorOptions = {}
  ) {
    this.retry = { ...DEFAULT_BATCH_RETRY_CONFIG, ...options.retry };
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Reads documents by key, yielding them as each response arrives.
   *
   * @throws {BatchIncompleteError} With the keys still unprocessed once the
   *   retry ceiling is reached
   *
   * @example
   * ```typescript
   * for await (const document of executor.getAll('Thread', keys)) {
   *   console.log(document);
   * }
   * ```
   */
  async *getAll(
    tableName: string,
    keys: readonly WireItem[],
    options: BatchGetOptions = {}
  ): AsyncGenerator<WireItem, void, undefined> {
    const keyChunks = chunk(keys, MAX_BATCH_GET_ITEMS);

    for (let index = 0; index < keyChunks.length; index++) {
      let remaining: WireItem[] = keyChunks[index];
      let attempt = 0;

      while (remaining.length > 0 && attempt <= this.retry.maxRetries) {
        if (attempt > 0) {
          await this.backoff('BatchGetItem', tableName, attempt, remaining.length);
        }

        const request: KeysAndAttributes = {
          Keys: remaining,
          ConsistentRead: options.consistentRead,
        };
        if (options.attributesToGet && options.attributesToGet.length > 0) {
          request.ProjectionExpression = options.attributesToGet.map((_, i) => `#p${i}`).join(', ');
          request.ExpressionAttributeNames = Object.fromEntries(
            options.attributesToGet.map((name, i) => [`#p${i}`, name])
          );
        }

        const response = await this.transport.batchGetItem({
          RequestItems: { [tableName]: request },
        });
        attempt++;

        const documents = response.Responses?.[tableName] ?? [];
        this.metrics.incrementCounter(MapperMetricNames.ITEMS_RETURNED, documents.length, {
          operation: 'BatchGetItem',
          table: tableName,
        });
        for (const document of documents) {
          yield document;
        }

        remaining = response.UnprocessedKeys?.[tableName]?.Keys ?? [];
        this.recordUnprocessed('BatchGetItem', tableName, remaining.length);
      }

      if (remaining.length > 0) {
        throw this.incomplete('BatchGetItem', tableName, remaining, keyChunks.slice(index + 1).flat(), attempt);
      }
    }
  }

  /**
   * Submits put and delete requests.
   *
   * Chunks hold at most 25 requests and 16 MiB of estimated payload. Chunks
   * written before a failure stay written.
   *
   * @throws {BatchIncompleteError} With the requests still unprocessed once
   *   the retry ceiling is reached, and those never submitted
   */
  async writeAll(tableName: string, requests: readonly WriteRequest[]): Promise<void> {
    const requestChunks = chunkBySize(requests, MAX_BATCH_WRITE_ITEMS, MAX_BATCH_WRITE_BYTES, writeRequestSize);

    for (let index = 0; index < requestChunks.length; index++) {
      let remaining: WriteRequest[] = requestChunks[index];
      let attempt = 0;

      while (remaining.length > 0 && attempt <= this.retry.maxRetries) {
        if (attempt > 0) {
          await this.backoff('BatchWriteItem', tableName, attempt, remaining.length);
        }

        const response = await this.transport.batchWriteItem({
          RequestItems: { [tableName]: remaining },
        });
        attempt++;

        remaining = response.UnprocessedItems?.[tableName] ?? [];
        this.recordUnprocessed('BatchWriteItem', tableName, remaining.length);
      }

      if (remaining.length > 0) {
        throw this.incomplete(
          'BatchWriteItem',
          tableName,
          remaining,
          requestChunks.slice(index + 1).flat(),
          attempt
        );
      }
    }

    this.logger.debug('BatchWriteItem completed', {
      tableName,
      requests: requests.length,
      chunks: requestChunks.length,
    });
  }

  private async backoff(operation: string, tableName: string, retry: number, pending: number): Promise<void> {
    const delay = calculateBackoff(retry, this.retry);
    this.logger.warn(`Retrying unprocessed ${operation} entries`, {
      tableName,
      pending,
      attempt: retry,
      maxRetries: this.retry.maxRetries,
      delayMs: delay,
    });
    await this.sleep(delay);
  }

  private recordUnprocessed(operation: string, tableName: string, count: number): void {
    if (count > 0) {
      this.metrics.incrementCounter(MapperMetricNames.BATCH_UNPROCESSED, count, {
        operation,
        table: tableName,
      });
    }
  }

  private incomplete<T>(
    operation: string,
    tableName: string,
    unprocessed: T[],
    notAttempted: T[],
    attempts: number
  ): BatchIncompleteError<T> {
    this.logger.error(`${operation} incomplete`, {
      tableName,
      unprocessed: unprocessed.length,
      notAttempted: notAttempted.length,
      attempts,
    });
    return new BatchIncompleteError(operation, unprocessed, notAttempted, attempts);
  }
}
