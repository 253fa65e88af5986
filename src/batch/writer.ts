/**
 * Scoped batch writer for one model.
 */

import type { WriteRequest } from '@aws-sdk/client-dynamodb';

import type { AttributeMap } from '../attributes/index.js';
import { encodeItem, keyOf } from '../codec/index.js';
import { MapperError } from '../error/index.js';
import type { Schema } from '../schema/index.js';
import { MAX_BATCH_WRITE_ITEMS } from './executor.js';
import type { BatchExecutor } from './executor.js';

/**
 * Collects puts and deletes for one table and submits them in batches.
 *
 * Pending requests are flushed automatically when 25 are queued. Requests
 * are not deduplicated, and version attributes are neither checked nor
 * incremented.
 *
 * @example
 * ```typescript
 * const writer = Thread.batchWrite();
 * for (const item of items) {
 *   await writer.save(item);
 * }
 * await writer.close();
 * ```
 */
export class BatchWriter<T extends object> {
  private pending: WriteRequest[] = [];
  private closed = false;

  constructor(
    private readonly schema: Schema<AttributeMap>,
    private readonly executor: BatchExecutor
  ) {}

  /** Requests queued and not yet submitted */
  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Queues a put of the item
   */
  async save(item: T): Promise<void> {
    this.assertOpen();
    this.pending.push({ PutRequest: { Item: encodeItem(this.schema, item) } });
    await this.flushIfFull();
  }

  /**
   * Queues a delete of the item's key
   */
  async delete(item: T): Promise<void> {
    this.assertOpen();
    this.pending.push({ DeleteRequest: { Key: keyOf(this.schema, item) } });
    await this.flushIfFull();
  }

  /**
   * Submits every pending request
   */
  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    const requests = this.pending;
    this.pending = [];
    await this.executor.writeAll(this.schema.tableName, requests);
  }

  /**
   * Flushes and rejects further requests
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  private async flushIfFull(): Promise<void> {
    if (this.pending.length >= MAX_BATCH_WRITE_ITEMS) {
      await this.flush();
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new MapperError({
        code: 'BatchWriterClosed',
        message: `Batch writer for ${this.schema.tableName} is closed`,
      });
    }
  }
}
