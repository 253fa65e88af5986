/**
 * Maps store errors raised by conditional writes onto the mapper's error types.
 */

import { ConditionalCheckFailedException, ResourceNotFoundException } from '@aws-sdk/client-dynamodb';

import { ConditionalCheckError, VersionConflictError } from './categories.js';

/**
 * Context of the write that raised the error
 */
export interface ConditionalWriteContext {
  tableName: string;
  operation: string;
  /** Whether the write's condition included a version check */
  versionChecked?: boolean;
  /** Stored version the write was conditioned on */
  expectedVersion?: number;
}

/**
 * Type guard for the store's conditional-check failure.
 *
 * Errors that crossed a realm boundary (e.g., a mocked client) are matched by name.
 */
export function isConditionalCheckFailure(error: unknown): error is ConditionalCheckFailedException {
  if (error instanceof ConditionalCheckFailedException) {
    return true;
  }
  return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

/**
 * Type guard for the store's missing-table error
 */
export function isResourceNotFound(error: unknown): error is ResourceNotFoundException {
  if (error instanceof ResourceNotFoundException) {
    return true;
  }
  return error instanceof Error && error.name === 'ResourceNotFoundException';
}

/**
 * Reinterprets a conditional-check failure as ConditionalCheckError, or as
 * VersionConflictError when the write carried a version check. Every other
 * error is returned unchanged.
 */
export function mapConditionalError(error: unknown, context: ConditionalWriteContext): unknown {
  if (!isConditionalCheckFailure(error)) {
    return error;
  }

  const rawItem = error.Item;

  if (context.versionChecked) {
    return new VersionConflictError(context.tableName, context.expectedVersion, {
      rawItem,
      originalError: error,
    });
  }

  return new ConditionalCheckError(
    `Conditional check failed for ${context.operation} on table ${context.tableName}`,
    { rawItem, originalError: error }
  );
}
