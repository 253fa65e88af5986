/**
 * Attribute Descriptors
 */

export { Attribute, tagOf } from './attribute.js';
export type {
  AttributeOptions,
  AnyAttribute,
  AttributeMap,
  ItemOf,
  KeyValue,
  ValueOf,
} from './attribute.js';

export {
  StringAttribute,
  NumberAttribute,
  BinaryAttribute,
  BooleanAttribute,
  DateTimeAttribute,
  TTLAttribute,
  formatDateTime,
  parseDateTime,
} from './scalar.js';
export type { BinaryAttributeOptions } from './scalar.js';

export { SetAttribute, StringSetAttribute, NumberSetAttribute, BinarySetAttribute } from './sets.js';

export { ListAttribute, MapAttribute, JsonAttribute } from './document.js';
export type { ListAttributeOptions } from './document.js';

export { VersionAttribute } from './version.js';
