/**
 * Query and scan request building.
 */

import type { QueryCommandInput, ScanCommandInput } from '@aws-sdk/client-dynamodb';

import type { AnyAttribute } from '../attributes/index.js';
import type { WireItem } from '../codec/index.js';
import { BuildError } from '../error/index.js';
import { ExpressionAttributes, renderCondition } from '../expressions/index.js';
import type { Condition } from '../expressions/index.js';

/**
 * Key attributes of the table or index being read
 */
export interface ReadTarget {
  tableName: string;
  indexName?: string;
  hashKey: AnyAttribute;
  rangeKey?: AnyAttribute;
}

export interface ReadOptions {
  /** Condition applied after items are read; items it drops are still charged */
  filter?: Condition;
  /** Maximum number of items returned in total */
  limit?: number;
  /** Items requested per page */
  pageSize?: number;
  consistentRead?: boolean;
  /** Attribute names to return */
  attributesToGet?: readonly string[];
  /** Resume after this key */
  exclusiveStartKey?: WireItem;
}

export interface QueryOptions extends ReadOptions {
  /** Condition on the range key: =, <, <=, >, >=, between or beginsWith */
  rangeKeyCondition?: Condition;
  /** Ascending range key order when true (default) */
  scanIndexForward?: boolean;
}

export interface ScanOptions extends ReadOptions {
  /** Segment of a parallel scan, with totalSegments */
  segment?: number;
  totalSegments?: number;
}

function assertRangeKeyCondition(condition: Condition, target: ReadTarget): void {
  const { rangeKey } = target;
  if (rangeKey === undefined) {
    throw new BuildError(`${describe(target)} has no range key to apply a range key condition to`);
  }

  switch (condition.kind) {
    case 'comparison':
      if (condition.operator === '<>') {
        throw new BuildError('Range key conditions cannot use <>');
      }
      break;
    case 'between':
    case 'beginsWith':
      break;
    default:
      throw new BuildError(`Range key conditions cannot use ${condition.kind}`);
  }

  if (condition.path.name !== rangeKey.name) {
    throw new BuildError(
      `Range key condition references '${condition.path.name}', expected range key '${rangeKey.name}'`
    );
  }
}

function describe(target: ReadTarget): string {
  return target.indexName ? `Index ${target.indexName}` : `Table ${target.tableName}`;
}

function projection(names: readonly string[] | undefined, attributes: ExpressionAttributes): string | undefined {
  if (!names || names.length === 0) {
    return undefined;
  }
  return names.map((name) => attributes.nameFor(name)).join(', ');
}

/**
 * Builds a Query request: hash key equality, optional range key condition,
 * optional filter.
 *
 * @example
 * ```typescript
 * buildQueryInput(target, 'forum-1', { rangeKeyCondition: subject.beginsWith('set') });
 * // KeyConditionExpression: '#a0 = :v0 AND begins_with(#a1, :v1)'
 * ```
 */
export function buildQueryInput(target: ReadTarget, hashValue: unknown, options: QueryOptions = {}): QueryCommandInput {
  const attributes = new ExpressionAttributes();

  const keyConditions = [renderCondition(target.hashKey.eq(hashValue), attributes)];
  if (options.rangeKeyCondition) {
    assertRangeKeyCondition(options.rangeKeyCondition, target);
    keyConditions.push(renderCondition(options.rangeKeyCondition, attributes));
  }

  const filterExpression = options.filter ? renderCondition(options.filter, attributes) : undefined;
  const projectionExpression = projection(options.attributesToGet, attributes);

  return {
    TableName: target.tableName,
    IndexName: target.indexName,
    KeyConditionExpression: keyConditions.join(' AND '),
    FilterExpression: filterExpression,
    ProjectionExpression: projectionExpression,
    ExpressionAttributeNames: attributes.names,
    ExpressionAttributeValues: attributes.values,
    ScanIndexForward: options.scanIndexForward ?? true,
    ConsistentRead: options.consistentRead,
  };
}

/**
 * Builds a Scan request. A scan reads, and is charged for, every item in the
 * table or segment whatever the filter.
 */
export function buildScanInput(target: ReadTarget, options: ScanOptions = {}): ScanCommandInput {
  const { segment, totalSegments } = options;
  if ((segment === undefined) !== (totalSegments === undefined)) {
    throw new BuildError('segment and totalSegments must be given together');
  }
  if (segment !== undefined && totalSegments !== undefined) {
    if (!Number.isInteger(totalSegments) || totalSegments < 1) {
      throw new BuildError('totalSegments must be a positive integer');
    }
    if (!Number.isInteger(segment) || segment < 0 || segment >= totalSegments) {
      throw new BuildError(`segment must be an integer from 0 to ${totalSegments - 1}`);
    }
  }

  const attributes = new ExpressionAttributes();
  const filterExpression = options.filter ? renderCondition(options.filter, attributes) : undefined;
  const projectionExpression = projection(options.attributesToGet, attributes);

  return {
    TableName: target.tableName,
    IndexName: target.indexName,
    FilterExpression: filterExpression,
    ProjectionExpression: projectionExpression,
    ExpressionAttributeNames: attributes.names,
    ExpressionAttributeValues: attributes.values,
    ConsistentRead: options.consistentRead,
    Segment: segment,
    TotalSegments: totalSegments,
  };
}
