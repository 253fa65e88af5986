/**
 * Tests for error types and conditional-failure mapping
 */

import { ConditionalCheckFailedException, ResourceNotFoundException } from '@aws-sdk/client-dynamodb';

import {
  BatchIncompleteError,
  ConditionalCheckError,
  isConditionalCheckFailure,
  isResourceNotFound,
  MapperError,
  mapConditionalError,
  SchemaError,
  VersionConflictError,
} from '../index.js';

function conditionalFailure(): ConditionalCheckFailedException {
  return new ConditionalCheckFailedException({
    message: 'The conditional request failed',
    $metadata: {},
    Item: { id: { S: 'a' }, version: { N: '4' } },
  });
}

describe('MapperError', () => {
  it('should render code and retryability', () => {
    const error = new MapperError({ code: 'BatchWriterClosed', message: 'writer closed', isRetryable: true });

    expect(error.toString()).toBe('[BatchWriterClosed] writer closed [retryable]');
    expect(new SchemaError('bad model').toString()).toBe('[SchemaError] bad model');
  });

  it('should serialize to JSON', () => {
    const error = new SchemaError('bad model', { attribute: 'id' });

    expect(error.toJSON()).toEqual({
      name: 'SchemaError',
      code: 'SchemaError',
      message: 'bad model',
      isRetryable: false,
      details: { attribute: 'id' },
    });
  });

  it('should expose the mapped error as its cause', () => {
    const original = new Error('conditional request failed');
    const error = new ConditionalCheckError('Conditional check failed for PutItem on table Thread', {
      originalError: original,
    });

    expect(error.cause).toBe(original);
    expect(error.toJSON()).toMatchObject({ code: 'ConditionalCheckFailed', cause: 'conditional request failed' });
  });
});

describe('VersionConflictError', () => {
  it('should describe the expected version', () => {
    expect(new VersionConflictError('Thread', 3).message).toBe('Version conflict on table Thread: expected version 3');
    expect(new VersionConflictError('Thread', undefined).message).toBe(
      'Version conflict on table Thread: expected no stored version'
    );
  });

  it('should be a conditional check error', () => {
    const error = new VersionConflictError('Thread', 3);

    expect(error).toBeInstanceOf(ConditionalCheckError);
    expect(error.code).toBe('VersionConflict');
    expect(error.name).toBe('VersionConflictError');
  });
});

describe('BatchIncompleteError', () => {
  it('should count unprocessed and unattempted entries', () => {
    const error = new BatchIncompleteError('BatchGetItem', [{ id: 'a' }], [], 4);

    expect(error.message).toBe('BatchGetItem: 1 entries still unprocessed after 4 attempts');
    expect(error.unprocessed).toEqual([{ id: 'a' }]);
    expect(error.notAttempted).toEqual([]);
  });
});

describe('mapConditionalError', () => {
  it('should map a version-checked failure to a version conflict', () => {
    const original = conditionalFailure();
    const mapped = mapConditionalError(original, {
      tableName: 'Thread',
      operation: 'PutItem',
      versionChecked: true,
      expectedVersion: 3,
    });

    expect(mapped).toBeInstanceOf(VersionConflictError);
    expect(mapped).toMatchObject({
      expectedVersion: 3,
      rawItem: { id: { S: 'a' }, version: { N: '4' } },
      originalError: original,
    });
  });

  it('should map other conditional failures to ConditionalCheckError', () => {
    const mapped = mapConditionalError(conditionalFailure(), { tableName: 'Thread', operation: 'DeleteItem' });

    expect(mapped).toBeInstanceOf(ConditionalCheckError);
    expect(mapped).not.toBeInstanceOf(VersionConflictError);
    expect(mapped).toMatchObject({
      code: 'ConditionalCheckFailed',
      message: 'Conditional check failed for DeleteItem on table Thread',
    });
  });

  it('should return unrelated errors unchanged', () => {
    const error = new Error('network down');
    expect(mapConditionalError(error, { tableName: 'Thread', operation: 'PutItem', versionChecked: true })).toBe(
      error
    );
  });
});

describe('error guards', () => {
  it('should recognize store errors by class or name', () => {
    const renamed = new Error('conditional request failed');
    renamed.name = 'ConditionalCheckFailedException';

    expect(isConditionalCheckFailure(conditionalFailure())).toBe(true);
    expect(isConditionalCheckFailure(renamed)).toBe(true);
    expect(isConditionalCheckFailure(new Error('other'))).toBe(false);
    expect(isResourceNotFound(new ResourceNotFoundException({ message: 'missing', $metadata: {} }))).toBe(true);
    expect(isResourceNotFound('ResourceNotFoundException')).toBe(false);
  });
});
