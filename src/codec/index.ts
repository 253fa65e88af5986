export {
  encodeItem,
  decodeItem,
  encodeKey,
  keyOf,
  keyOfDocument,
  estimateItemSize,
  isAttributeValue,
} from './codec.js';
export type { DecodeOptions, WireItem } from './codec.js';
