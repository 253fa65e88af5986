/**
 * Model layer
 */

export { defineModel, ModelDefinition } from './definition.js';
export type { ExtensionDefinition } from './definition.js';
export { Model } from './model.js';
export type {
  ModelContext,
  WriteOptions,
  GetOptions,
  ModelQueryOptions,
  ModelScanOptions,
  KeyInput,
  IndexReader,
} from './model.js';
