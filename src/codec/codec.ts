/**
 * Item Codec
 *
 * Converts items to and from stored documents using a schema.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import type { AnyAttribute, AttributeMap, ItemOf } from '../attributes/index.js';
import { DecodeError, MarshalError } from '../error/index.js';
import type { Schema } from '../schema/index.js';

/**
 * Stored document: attribute name to wire value
 */
export type WireItem = Record<string, AttributeValue>;

const WIRE_TAGS = new Set(['S', 'N', 'B', 'SS', 'NS', 'BS', 'M', 'L', 'NULL', 'BOOL']);

/**
 * Checks whether a value has the shape of a single wire value
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length === 1 && WIRE_TAGS.has(keys[0]);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

/**
 * Encodes an item into a stored document.
 *
 * Absent nullable attributes are omitted; attributes unknown to the schema
 * are written back only when they already hold a wire value.
 *
 * @throws {MarshalError} When a key or non-nullable attribute has no value
 */
export function encodeItem(schema: Schema<AttributeMap>, item: object): WireItem {
  const document: WireItem = {};

  for (const name of schema.attributeNames) {
    const attribute = schema.attributes[name];
    const value: unknown = Reflect.get(item, name);
    if (isAbsent(value)) {
      if (!attribute.nullable) {
        throw new MarshalError(name, 'a value is required');
      }
      continue;
    }
    const wire = attribute.serialize(value);
    if (wire === undefined) {
      if (!attribute.nullable) {
        throw new MarshalError(name, 'an empty value cannot be stored');
      }
      continue;
    }
    document[name] = wire;
  }

  for (const [name, value] of Object.entries(item)) {
    if (!Object.hasOwn(schema.attributes, name) && isAttributeValue(value)) {
      document[name] = value;
    }
  }

  return document;
}

export interface DecodeOptions {
  /**
   * Reject documents without every key attribute. Disable it for partial
   * documents, such as the prior state returned by a failed condition.
   * @default true
   */
  requireKeys?: boolean;
}

/**
 * Decodes a stored document into an item.
 *
 * Attributes the schema does not declare are kept on the item as their raw
 * wire values.
 *
 * @throws {DecodeError} When a key attribute is missing and keys are required
 * @throws {UnmarshalError} When a wire value carries the wrong tag
 */
export function decodeItem<A extends AttributeMap>(
  schema: Schema<A>,
  document: WireItem,
  options: DecodeOptions = {}
): ItemOf<A> {
  const requireKeys = options.requireKeys ?? true;
  const item: Record<string, unknown> = {};
  const attributes: AttributeMap = schema.attributes;

  for (const name of schema.attributeNames) {
    const attribute = attributes[name];
    const wire = Object.hasOwn(document, name) ? document[name] : undefined;
    if (wire === undefined || wire.NULL === true) {
      if (requireKeys && attribute.isKey) {
        throw new DecodeError(`Stored item of ${schema.tableName} is missing key attribute '${name}'`, {
          tableName: schema.tableName,
          attribute: name,
        });
      }
      continue;
    }
    item[name] = attribute.deserialize(wire);
  }

  for (const [name, wire] of Object.entries(document)) {
    if (!Object.hasOwn(attributes, name)) {
      item[name] = wire;
    }
  }

  return item as ItemOf<A>;
}

function encodeKeyValue(attribute: AnyAttribute, value: unknown, role: string): AttributeValue {
  if (isAbsent(value)) {
    throw new MarshalError(attribute.name, `${role} key value is required`);
  }
  const wire = attribute.serialize(value);
  if (wire === undefined) {
    throw new MarshalError(attribute.name, `${role} key value cannot be empty`);
  }
  return wire;
}

/**
 * Encodes a primary key from its hash and range values
 *
 * @throws {MarshalError} When a key value is missing or of the wrong type
 */
export function encodeKey(schema: Schema<AttributeMap>, hash: unknown, range?: unknown): WireItem {
  const key: WireItem = {
    [schema.hashKey.name]: encodeKeyValue(schema.hashKey, hash, 'hash'),
  };
  if (schema.rangeKey) {
    key[schema.rangeKey.name] = encodeKeyValue(schema.rangeKey, range, 'range');
  } else if (!isAbsent(range)) {
    throw new MarshalError(schema.hashKey.name, `table ${schema.tableName} has no range key`);
  }
  return key;
}

/**
 * Encodes the primary key of an item
 */
export function keyOf(schema: Schema<AttributeMap>, item: object): WireItem {
  const range = schema.rangeKey ? Reflect.get(item, schema.rangeKey.name) : undefined;
  return encodeKey(schema, Reflect.get(item, schema.hashKey.name), range);
}

/**
 * Extracts the primary key attributes from a stored document
 */
export function keyOfDocument(schema: Schema<AttributeMap>, document: WireItem): WireItem {
  const key: WireItem = {};
  for (const attribute of [schema.hashKey, schema.rangeKey]) {
    if (attribute && Object.hasOwn(document, attribute.name)) {
      key[attribute.name] = document[attribute.name];
    }
  }
  return key;
}

/**
 * Estimates the stored size of a document in bytes, following the store's
 * sizing rules closely enough for request payload limits.
 */
export function estimateItemSize(document: WireItem): number {
  let size = 0;
  for (const [name, value] of Object.entries(document)) {
    size += Buffer.byteLength(name, 'utf8') + estimateValueSize(value);
  }
  return size;
}

function estimateValueSize(value: AttributeValue): number {
  if (value.S !== undefined) {
    return Buffer.byteLength(value.S, 'utf8');
  }
  if (value.N !== undefined) {
    return Math.ceil(value.N.length / 2) + 1;
  }
  if (value.B !== undefined) {
    return value.B.byteLength;
  }
  if (value.BOOL !== undefined || value.NULL !== undefined) {
    return 1;
  }
  if (value.SS !== undefined) {
    return value.SS.reduce((sum, s) => sum + Buffer.byteLength(s, 'utf8'), 0);
  }
  if (value.NS !== undefined) {
    return value.NS.reduce((sum, n) => sum + Math.ceil(n.length / 2) + 1, 0);
  }
  if (value.BS !== undefined) {
    return value.BS.reduce((sum, b) => sum + b.byteLength, 0);
  }
  if (value.L !== undefined) {
    return 3 + value.L.reduce((sum, element) => sum + 1 + estimateValueSize(element), 0);
  }
  if (value.M !== undefined) {
    return 3 + estimateItemSize(value.M) + Object.keys(value.M).length;
  }
  return 0;
}
