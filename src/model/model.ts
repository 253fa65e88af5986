/**
 * Model
 *
 * Item operations for one model bound to a transport: CRUD with optimistic
 * versioning, queries and scans, batch reads and writes, table management.
 */

import type { ReturnValuesOnConditionCheckFailure } from '@aws-sdk/client-dynamodb';

import type { AnyAttribute, AttributeMap, ItemOf, KeyValue } from '../attributes/index.js';
import { BatchWriter } from '../batch/index.js';
import type { BatchExecutor, BatchGetOptions } from '../batch/index.js';
import { decodeItem, encodeItem, encodeKey, keyOf } from '../codec/index.js';
import type { WireItem } from '../codec/index.js';
import {
  BuildError,
  ItemNotFoundError,
  isConditionalCheckFailure,
  isResourceNotFound,
  mapConditionalError,
} from '../error/index.js';
import type { ConditionalWriteContext } from '../error/index.js';
import { andMaybe, ExpressionAttributes, renderCondition, renderUpdate } from '../expressions/index.js';
import type { Condition, UpdateAction } from '../expressions/index.js';
import { logError, logOperation, MapperMetricNames } from '../observability/index.js';
import type { Logger, MetricsCollector } from '../observability/index.js';
import { buildQueryInput, buildScanInput, ResultIterator } from '../operations/index.js';
import type { Page, QueryOptions, ReadTarget, ScanOptions } from '../operations/index.js';
import { buildCreateTableInput } from '../schema/index.js';
import type { CreateTableOptions, Schema } from '../schema/index.js';
import type { DynamoDBTransport } from '../transport/index.js';
import { applyVersion, planDelete, planSave, planUpdate } from '../version/index.js';
import type { VersionPlan } from '../version/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators shared by every model of a mapper
 */
export interface ModelContext {
  transport: DynamoDBTransport;
  executor: BatchExecutor;
  logger: Logger;
  metrics: MetricsCollector;
}

/**
 * Options of conditional writes
 */
export interface WriteOptions {
  /** Additional condition, combined with the version check */
  condition?: Condition;
  /**
   * `ALL_OLD` attaches the stored item to the raised ConditionalCheckError
   * as `rawItem`; decode it with `Model.fromRaw`.
   */
  returnValuesOnConditionFailure?: ReturnValuesOnConditionCheckFailure;
}

export interface GetOptions {
  consistentRead?: boolean;
  /** Attribute names to return; must include the key attributes */
  attributesToGet?: readonly string[];
}

export interface ModelQueryOptions extends QueryOptions {
  /** Secondary index to query */
  index?: string;
}

export interface ModelScanOptions extends ScanOptions {
  /** Secondary index to scan */
  index?: string;
}

/**
 * Hash key value, or hash and range key values
 */
export type KeyInput = KeyValue | readonly [KeyValue, KeyValue];

/**
 * Reads against one secondary index
 */
export interface IndexReader<T> {
  query(hashValue: KeyValue, options?: QueryOptions): ResultIterator<T>;
  scan(options?: ScanOptions): ResultIterator<T>;
}

function isCompositeKey(key: KeyInput): key is readonly [KeyValue, KeyValue] {
  return Array.isArray(key);
}

function elapsed(start: number): number {
  return Date.now() - start;
}

// ============================================================================
// Model
// ============================================================================

/**
 * Operations on the items of one model.
 *
 * @example
 * ```typescript
 * const threads = mapper.model(Thread);
 * const thread = threads.create({ forum: 'forum-1', subject: 'Welcome' });
 * await threads.save(thread);
 * await threads.update(thread, [Thread.schema.attributes.views.increment()]);
 * ```
 */
export class Model<A extends AttributeMap> {
  private readonly transport: DynamoDBTransport;
  private readonly executor: BatchExecutor;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(
    public readonly schema: Schema<A>,
    context: ModelContext
  ) {
    this.transport = context.transport;
    this.executor = context.executor;
    this.logger = context.logger;
    this.metrics = context.metrics;
  }

  get tableName(): string {
    return this.schema.tableName;
  }

  // --------------------------------------------------------------------------
  // Items
  // --------------------------------------------------------------------------

  /**
   * Builds an item in memory: defaults are applied to absent attributes and
   * the result is validated against the schema. Nothing is written.
   *
   * @throws {MarshalError} When a required attribute is missing or of the wrong type
   */
  create(values: Partial<ItemOf<A>>): ItemOf<A> {
    const draft: Record<string, unknown> = { ...values };
    const attributes: AttributeMap = this.schema.attributes;
    for (const name of this.schema.attributeNames) {
      const attribute: AnyAttribute = attributes[name];
      const current = draft[name];
      if ((current === undefined || current === null) && attribute.hasDefault) {
        draft[name] = attribute.getDefault();
      }
    }
    return decodeItem(this.schema, encodeItem(this.schema, draft));
  }

  /**
   * Decodes a stored document, such as the `rawItem` of a
   * ConditionalCheckError. The document may be partial: key attributes are
   * not required.
   *
   * @example
   * ```typescript
   * try {
   *   await threads.save(thread, { returnValuesOnConditionFailure: 'ALL_OLD' });
   * } catch (error) {
   *   if (error instanceof VersionConflictError && error.rawItem) {
   *     const stored = threads.fromRaw(error.rawItem);
   *   }
   * }
   * ```
   */
  fromRaw(document: WireItem): Partial<ItemOf<A>> {
    return decodeItem(this.schema, document, { requireKeys: false });
  }

  /**
   * Writes the whole item.
   *
   * With a version attribute, a first save writes version 1 and a later save
   * requires the stored version to match the item's; the item's version is
   * advanced on success.
   *
   * @throws {VersionConflictError} When the stored version differs
   * @throws {ConditionalCheckError} When `options.condition` fails
   */
  async save(item: ItemOf<A>, options: WriteOptions = {}): Promise<void> {
    const plan = planSave(this.schema, item);
    const document = encodeItem(this.schema, item);
    const { version } = this.schema;
    if (version && plan.nextVersion !== undefined) {
      const wire = version.serialize(plan.nextVersion);
      if (wire !== undefined) {
        document[version.name] = wire;
      }
    }

    const attributes = new ExpressionAttributes();
    const condition = andMaybe(plan.condition, options.condition);

    await this.instrument(
      'PutItem',
      () =>
        this.transport.putItem({
          TableName: this.tableName,
          Item: document,
          ConditionExpression: condition ? renderCondition(condition, attributes) : undefined,
          ExpressionAttributeNames: attributes.names,
          ExpressionAttributeValues: attributes.values,
          ReturnValuesOnConditionCheckFailure: options.returnValuesOnConditionFailure,
        }),
      this.conditionalContext('PutItem', plan)
    );

    applyVersion(this.schema, item, plan);
  }

  /**
   * Applies update actions to the stored item and writes the resulting
   * attribute values back onto `item`. Attributes the update removed are
   * removed from `item`.
   *
   * With a version attribute, the update requires the stored version to
   * match the item's and advances it.
   *
   * @example
   * ```typescript
   * const { views, tags } = Thread.schema.attributes;
   * await threads.update(thread, [views.increment(), tags.add(new Set(['faq']))]);
   * ```
   *
   * @throws {BuildError} When the actions are empty or touch an attribute twice
   * @throws {VersionConflictError} When the stored version differs
   */
  async update(item: ItemOf<A>, actions: readonly UpdateAction[], options: WriteOptions = {}): Promise<void> {
    const plan = planUpdate(this.schema, item);
    const allActions = plan.action ? [...actions, plan.action] : [...actions];

    const attributes = new ExpressionAttributes();
    const updateExpression = renderUpdate(allActions, attributes);
    const condition = andMaybe(plan.condition, options.condition);
    const conditionExpression = condition ? renderCondition(condition, attributes) : undefined;

    const output = await this.instrument(
      'UpdateItem',
      () =>
        this.transport.updateItem({
          TableName: this.tableName,
          Key: keyOf(this.schema, item),
          UpdateExpression: updateExpression,
          ConditionExpression: conditionExpression,
          ExpressionAttributeNames: attributes.names,
          ExpressionAttributeValues: attributes.values,
          ReturnValues: 'ALL_NEW',
          ReturnValuesOnConditionCheckFailure: options.returnValuesOnConditionFailure,
        }),
      this.conditionalContext('UpdateItem', plan)
    );

    applyVersion(this.schema, item, plan);
    if (output.Attributes) {
      this.replaceAttributes(item, decodeItem(this.schema, output.Attributes));
    }
  }

  /**
   * Deletes the stored item, conditioned on its version when one is held
   *
   * @throws {VersionConflictError} When the stored version differs
   */
  async delete(item: ItemOf<A>, options: WriteOptions = {}): Promise<void> {
    const plan = planDelete(this.schema, item);
    const attributes = new ExpressionAttributes();
    const condition = andMaybe(plan.condition, options.condition);

    await this.instrument(
      'DeleteItem',
      () =>
        this.transport.deleteItem({
          TableName: this.tableName,
          Key: keyOf(this.schema, item),
          ConditionExpression: condition ? renderCondition(condition, attributes) : undefined,
          ExpressionAttributeNames: attributes.names,
          ExpressionAttributeValues: attributes.values,
          ReturnValuesOnConditionCheckFailure: options.returnValuesOnConditionFailure,
        }),
      this.conditionalContext('DeleteItem', plan)
    );
  }

  /**
   * Reads one item by key.
   *
   * @throws {ItemNotFoundError} When no item has the key
   */
  async get(hashValue: KeyValue, rangeValue?: KeyValue, options: GetOptions = {}): Promise<ItemOf<A>> {
    const document = await this.getDocument(encodeKey(this.schema, hashValue, rangeValue), options);
    return decodeItem(this.schema, document);
  }

  /**
   * Reloads every attribute of `item` from the store
   *
   * @throws {ItemNotFoundError} When the item no longer exists
   */
  async refresh(item: ItemOf<A>, options: Pick<GetOptions, 'consistentRead'> = {}): Promise<void> {
    const document = await this.getDocument(keyOf(this.schema, item), options);
    this.replaceAttributes(item, decodeItem(this.schema, document));
  }

  // --------------------------------------------------------------------------
  // Queries and scans
  // --------------------------------------------------------------------------

  /**
   * Items with the given hash key, optionally narrowed by a range key
   * condition and a filter. Pages are read lazily as the result is iterated.
   *
   * @example
   * ```typescript
   * const { subject, views } = Thread.schema.attributes;
   * for await (const thread of threads.query('forum-1', {
   *   rangeKeyCondition: subject.beginsWith('re:'),
   *   filter: views.gt(10),
   * })) {
   *   console.log(thread.subject);
   * }
   * ```
   */
  query(hashValue: KeyValue, options: ModelQueryOptions = {}): ResultIterator<ItemOf<A>> {
    const target = this.readTarget(options.index);
    const input = buildQueryInput(target, hashValue, options);

    return this.iterate(target, options, async (exclusiveStartKey, limit) => {
      const output = await this.instrument('Query', () =>
        this.transport.query({ ...input, ExclusiveStartKey: exclusiveStartKey, Limit: limit })
      );
      return this.page('Query', output.Items, output.LastEvaluatedKey, output.ScannedCount);
    });
  }

  /**
   * Every item of the table, or of one segment of a parallel scan. The whole
   * table is read whatever the filter.
   */
  scan(options: ModelScanOptions = {}): ResultIterator<ItemOf<A>> {
    const target = this.readTarget(options.index);
    const input = buildScanInput(target, options);

    return this.iterate(target, options, async (exclusiveStartKey, limit) => {
      const output = await this.instrument('Scan', () =>
        this.transport.scan({ ...input, ExclusiveStartKey: exclusiveStartKey, Limit: limit })
      );
      return this.page('Scan', output.Items, output.LastEvaluatedKey, output.ScannedCount);
    });
  }

  /**
   * Queries and scans against a secondary index
   *
   * @throws {BuildError} When the model declares no such index
   */
  index(name: string): IndexReader<ItemOf<A>> {
    this.readTarget(name);
    return {
      query: (hashValue, options = {}) => this.query(hashValue, { ...options, index: name }),
      scan: (options = {}) => this.scan({ ...options, index: name }),
    };
  }

  // --------------------------------------------------------------------------
  // Batches
  // --------------------------------------------------------------------------

  /**
   * Reads items by key in batches of 100, yielding them in the order the
   * store returns them. Keys the store leaves unprocessed are resubmitted.
   *
   * @throws {BatchIncompleteError} When keys remain unprocessed after the last retry
   */
  async *batchGet(keys: readonly KeyInput[], options: BatchGetOptions = {}): AsyncGenerator<ItemOf<A>, void, undefined> {
    const encoded = keys.map((key) =>
      isCompositeKey(key) ? encodeKey(this.schema, key[0], key[1]) : encodeKey(this.schema, key)
    );
    const start = Date.now();
    let returned = 0;

    try {
      for await (const document of this.executor.getAll(this.tableName, encoded, options)) {
        returned++;
        yield decodeItem(this.schema, document);
      }
    } catch (error) {
      this.recordFailure('BatchGetItem', error);
      throw error;
    }

    this.recordSuccess('BatchGetItem', start, { keys: encoded.length, returned });
  }

  /**
   * Opens a batch writer. Version attributes are ignored by batch writes.
   */
  batchWrite(): BatchWriter<ItemOf<A>> {
    return new BatchWriter<ItemOf<A>>(this.schema, this.executor);
  }

  /**
   * Runs `fn` with a batch writer and flushes pending requests when it
   * returns or throws. Requests flushed before a failure stay written.
   *
   * @example
   * ```typescript
   * await threads.withBatchWrite(async (writer) => {
   *   for (const thread of imported) {
   *     await writer.save(thread);
   *   }
   * });
   * ```
   */
  async withBatchWrite<R>(fn: (writer: BatchWriter<ItemOf<A>>) => Promise<R>): Promise<R> {
    const writer = this.batchWrite();
    let result: R;
    try {
      result = await fn(writer);
    } catch (error) {
      try {
        await writer.close();
      } catch (flushError) {
        throw new AggregateError(
          [error, flushError],
          `Batch write on ${this.tableName} failed and its pending requests could not be flushed`
        );
      }
      throw error;
    }
    await writer.close();
    return result;
  }

  // --------------------------------------------------------------------------
  // Table
  // --------------------------------------------------------------------------

  /**
   * Creates the model's table with its key schema and indexes
   */
  async createTable(options: CreateTableOptions = {}): Promise<void> {
    const input = buildCreateTableInput(this.schema, options);
    await this.instrument('CreateTable', () => this.transport.createTable(input));
  }

  /**
   * Whether the model's table exists
   */
  async exists(): Promise<boolean> {
    return await this.instrument('DescribeTable', async () => {
      try {
        await this.transport.describeTable({ TableName: this.tableName });
        return true;
      } catch (error) {
        if (isResourceNotFound(error)) {
          return false;
        }
        throw error;
      }
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async getDocument(key: WireItem, options: GetOptions): Promise<WireItem> {
    const attributes = new ExpressionAttributes();
    const projection = options.attributesToGet?.map((name) => attributes.nameFor(name)).join(', ');

    const output = await this.instrument('GetItem', () =>
      this.transport.getItem({
        TableName: this.tableName,
        Key: key,
        ConsistentRead: options.consistentRead,
        ProjectionExpression: projection || undefined,
        ExpressionAttributeNames: attributes.names,
      })
    );

    if (output.Item === undefined) {
      throw new ItemNotFoundError(this.tableName, key);
    }
    return output.Item;
  }

  private replaceAttributes(target: ItemOf<A>, source: ItemOf<A>): void {
    for (const name of Object.keys(target)) {
      if (!Object.hasOwn(source, name)) {
        Reflect.deleteProperty(target, name);
      }
    }
    for (const [name, value] of Object.entries(source)) {
      Reflect.set(target, name, value);
    }
  }

  private readTarget(indexName: string | undefined): ReadTarget {
    if (indexName === undefined) {
      return {
        tableName: this.tableName,
        hashKey: this.schema.hashKey,
        rangeKey: this.schema.rangeKey,
      };
    }

    const index = Object.hasOwn(this.schema.indexes, indexName) ? this.schema.indexes[indexName] : undefined;
    if (index === undefined) {
      throw new BuildError(`Model ${this.tableName} has no index named '${indexName}'`);
    }
    return {
      tableName: this.tableName,
      indexName,
      hashKey: index.hashKey,
      rangeKey: index.rangeKey,
    };
  }

  private iterate(
    target: ReadTarget,
    options: ModelQueryOptions | ModelScanOptions,
    fetchPage: (exclusiveStartKey: WireItem | undefined, limit: number | undefined) => Promise<Page>
  ): ResultIterator<ItemOf<A>> {
    // Resume keys carry the table key and, on an index, the index key
    const keyNames = new Set<string>();
    for (const attribute of [this.schema.hashKey, this.schema.rangeKey, target.hashKey, target.rangeKey]) {
      if (attribute) {
        keyNames.add(attribute.name);
      }
    }

    return new ResultIterator(fetchPage, (document) => decodeItem(this.schema, document), {
      limit: options.limit,
      pageSize: options.pageSize,
      exclusiveStartKey: options.exclusiveStartKey,
      keyOf: (document) => {
        const key: WireItem = {};
        for (const name of keyNames) {
          if (Object.hasOwn(document, name)) {
            key[name] = document[name];
          }
        }
        return key;
      },
    });
  }

  private page(
    operation: string,
    items: WireItem[] | undefined,
    lastEvaluatedKey: WireItem | undefined,
    scannedCount: number | undefined
  ): Page {
    const documents = items ?? [];
    this.metrics.incrementCounter(MapperMetricNames.ITEMS_RETURNED, documents.length, {
      operation,
      table: this.tableName,
    });
    return { items: documents, lastEvaluatedKey, scannedCount };
  }

  private conditionalContext(operation: string, plan: VersionPlan): ConditionalWriteContext {
    return {
      tableName: this.tableName,
      operation,
      versionChecked: plan.condition !== undefined,
      expectedVersion: plan.expectedVersion,
    };
  }

  /**
   * Runs one store call with logging and metrics. Conditional-check failures
   * of writes are mapped onto ConditionalCheckError or VersionConflictError.
   */
  private async instrument<R>(
    operation: string,
    call: () => Promise<R>,
    conditional?: ConditionalWriteContext
  ): Promise<R> {
    const start = Date.now();
    try {
      const result = await call();
      this.recordSuccess(operation, start);
      return result;
    } catch (error) {
      if (conditional && isConditionalCheckFailure(error)) {
        this.metrics.incrementCounter(MapperMetricNames.CONDITIONAL_CHECK_FAILURES, 1, {
          operation,
          table: this.tableName,
        });
      }
      const mapped = conditional ? mapConditionalError(error, conditional) : error;
      this.recordFailure(operation, mapped);
      throw mapped;
    }
  }

  private recordSuccess(operation: string, start: number, extra?: Record<string, unknown>): void {
    const durationMs = elapsed(start);
    this.metrics.incrementCounter(MapperMetricNames.OPERATIONS_TOTAL, 1, {
      operation,
      table: this.tableName,
      status: 'success',
    });
    this.metrics.recordHistogram(MapperMetricNames.OPERATION_DURATION, durationMs, {
      operation,
      table: this.tableName,
    });
    logOperation(this.logger, operation, this.tableName, durationMs, extra);
  }

  private recordFailure(operation: string, error: unknown): void {
    this.metrics.incrementCounter(MapperMetricNames.ERRORS, 1, {
      operation,
      table: this.tableName,
      error: error instanceof Error ? error.name : 'unknown',
    });
    logError(this.logger, operation, this.tableName, error);
  }
}
