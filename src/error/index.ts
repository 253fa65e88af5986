/**
 * Error Handling
 *
 * Error classes and error handling utilities for mapper operations.
 */

export { MapperError } from './error.js';
export type { MapperErrorCode, MapperErrorOptions } from './error.js';

// Error categories
export {
  SchemaError,
  ConfigurationError,
  MarshalError,
  UnmarshalError,
  DecodeError,
  BuildError,
  ConditionalCheckError,
  VersionConflictError,
  BatchIncompleteError,
  ItemNotFoundError,
} from './categories.js';

// Error mapping
export { mapConditionalError, isConditionalCheckFailure, isResourceNotFound } from './mapper.js';
export type { ConditionalWriteContext } from './mapper.js';
