import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import { MapperError } from './error.js';
import type { MapperErrorCode } from './error.js';

/**
 * Error thrown when a model or index definition is invalid.
 * Raised once, at definition time.
 */
export class SchemaError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'SchemaError',
      message,
      details,
    });
    this.name = 'SchemaError';
  }
}

/**
 * Error thrown when the client is misconfigured
 * (e.g., invalid region, invalid endpoint, invalid retry settings)
 */
export class ConfigurationError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ConfigurationError',
      message,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a native value cannot be converted to its wire form
 */
export class MarshalError extends MapperError {
  constructor(attribute: string, message: string) {
    super({
      code: 'MarshalError',
      message: `Cannot serialize attribute '${attribute}': ${message}`,
      details: { attribute },
    });
    this.name = 'MarshalError';
  }
}

/**
 * Error thrown when a wire value does not carry the tag an attribute expects
 */
export class UnmarshalError extends MapperError {
  constructor(attribute: string, expected: string, actual: string) {
    super({
      code: 'UnmarshalError',
      message: `Cannot deserialize attribute '${attribute}': expected ${expected}, got ${actual}`,
      details: { attribute, expected, actual },
    });
    this.name = 'UnmarshalError';
  }
}

/**
 * Error thrown when a stored document cannot be turned into an item
 */
export class DecodeError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'DecodeError',
      message,
      details,
    });
    this.name = 'DecodeError';
  }
}

/**
 * Error thrown for a malformed condition or update expression
 */
export class BuildError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'BuildError',
      message,
      details,
    });
    this.name = 'BuildError';
  }
}

/**
 * Error thrown when a conditional write is rejected by the store
 */
export class ConditionalCheckError extends MapperError {
  /**
   * The item as stored when the condition failed, exactly as returned by the
   * store. Present only when the caller asked for it.
   */
  public readonly rawItem?: Record<string, AttributeValue>;

  constructor(
    message: string,
    options: { rawItem?: Record<string, AttributeValue>; originalError?: Error; code?: MapperErrorCode } = {}
  ) {
    super({
      code: options.code ?? 'ConditionalCheckFailed',
      message,
      originalError: options.originalError,
    });
    this.name = 'ConditionalCheckError';
    this.rawItem = options.rawItem;
  }
}

/**
 * Error thrown when a version-checked write finds a different stored version
 */
export class VersionConflictError extends ConditionalCheckError {
  /** Version the write expected to find; undefined when it expected none */
  public readonly expectedVersion?: number;

  constructor(
    tableName: string,
    expectedVersion: number | undefined,
    options: { rawItem?: Record<string, AttributeValue>; originalError?: Error } = {}
  ) {
    const expected = expectedVersion === undefined ? 'no stored version' : `version ${expectedVersion}`;
    super(`Version conflict on table ${tableName}: expected ${expected}`, {
      ...options,
      code: 'VersionConflict',
    });
    this.name = 'VersionConflictError';
    this.expectedVersion = expectedVersion;
  }
}

/**
 * Error thrown when a batch still has unprocessed entries after the retry
 * ceiling is reached
 *
 * @template T - Type of the batch entries (keys or write requests)
 */
export class BatchIncompleteError<T = unknown> extends MapperError {
  /** Entries the store kept reporting as unprocessed */
  public readonly unprocessed: T[];

  /** Entries from later chunks that were never submitted */
  public readonly notAttempted: T[];

  constructor(operation: string, unprocessed: T[], notAttempted: T[], attempts: number) {
    super({
      code: 'BatchIncomplete',
      message:
        `${operation}: ${unprocessed.length} entries still unprocessed after ${attempts} attempts` +
        (notAttempted.length > 0 ? `, ${notAttempted.length} entries not attempted` : ''),
      details: { operation, attempts },
    });
    this.name = 'BatchIncompleteError';
    this.unprocessed = unprocessed;
    this.notAttempted = notAttempted;
  }
}

/**
 * Error for item not found
 */
export class ItemNotFoundError extends MapperError {
  constructor(tableName: string, key: Record<string, unknown>) {
    super({
      code: 'ItemNotFound',
      message: `Item not found in ${tableName} with key: ${JSON.stringify(key)}`,
      details: { tableName, key },
    });
    this.name = 'ItemNotFoundError';
  }
}
