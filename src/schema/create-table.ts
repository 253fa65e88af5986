/**
 * CreateTable request derived from a schema.
 */

import type {
  AttributeDefinition,
  CreateTableCommandInput,
  KeySchemaElement,
  Projection,
  ScalarAttributeType,
} from '@aws-sdk/client-dynamodb';

import type { AnyAttribute } from '../attributes/index.js';
import { SchemaError } from '../error/index.js';
import type { IndexDescriptor, ProvisionedThroughput, Schema } from './schema.js';

export interface CreateTableOptions {
  /** Defaults to PAY_PER_REQUEST, or PROVISIONED when throughput is given */
  billingMode?: 'PAY_PER_REQUEST' | 'PROVISIONED';
  /** Table throughput; required for PROVISIONED billing */
  provisioning?: ProvisionedThroughput;
}

/**
 * Builds the CreateTable request for a schema: key schema, attribute
 * definitions for every table and index key, and index projections.
 */
export function buildCreateTableInput(schema: Schema<unknown>, options: CreateTableOptions = {}): CreateTableCommandInput {
  const billingMode = options.billingMode ?? (options.provisioning ? 'PROVISIONED' : 'PAY_PER_REQUEST');
  if (billingMode === 'PROVISIONED' && options.provisioning === undefined) {
    throw new SchemaError(`Table ${schema.tableName} uses PROVISIONED billing but has no provisioning`);
  }

  const definitions = new Map<string, AttributeDefinition>();
  const define = (attribute: AnyAttribute): void => {
    definitions.set(attribute.name, {
      AttributeName: attribute.name,
      AttributeType: scalarType(attribute),
    });
  };

  define(schema.hashKey);
  if (schema.rangeKey) {
    define(schema.rangeKey);
  }

  const locals = Object.values(schema.indexes).filter((index) => index.kind === 'local');
  const globals = Object.values(schema.indexes).filter((index) => index.kind === 'global');
  for (const index of [...locals, ...globals]) {
    define(index.hashKey);
    if (index.rangeKey) {
      define(index.rangeKey);
    }
  }

  const input: CreateTableCommandInput = {
    TableName: schema.tableName,
    KeySchema: keySchema(schema.hashKey, schema.rangeKey),
    AttributeDefinitions: [...definitions.values()],
    BillingMode: billingMode,
  };

  if (billingMode === 'PROVISIONED' && options.provisioning) {
    input.ProvisionedThroughput = throughput(options.provisioning);
  }

  if (locals.length > 0) {
    input.LocalSecondaryIndexes = locals.map((index) => ({
      IndexName: index.name,
      KeySchema: keySchema(index.hashKey, index.rangeKey),
      Projection: projection(index),
    }));
  }

  if (globals.length > 0) {
    input.GlobalSecondaryIndexes = globals.map((index) => {
      const provisioning = index.provisioning ?? options.provisioning;
      return {
        IndexName: index.name,
        KeySchema: keySchema(index.hashKey, index.rangeKey),
        Projection: projection(index),
        ...(billingMode === 'PROVISIONED' && provisioning
          ? { ProvisionedThroughput: throughput(provisioning) }
          : {}),
      };
    });
  }

  return input;
}

function keySchema(hashKey: AnyAttribute, rangeKey?: AnyAttribute): KeySchemaElement[] {
  const elements: KeySchemaElement[] = [{ AttributeName: hashKey.name, KeyType: 'HASH' }];
  if (rangeKey) {
    elements.push({ AttributeName: rangeKey.name, KeyType: 'RANGE' });
  }
  return elements;
}

function projection(index: IndexDescriptor): Projection {
  if (index.projection === 'INCLUDE') {
    return { ProjectionType: 'INCLUDE', NonKeyAttributes: [...index.include] };
  }
  return { ProjectionType: index.projection };
}

function throughput(provisioning: ProvisionedThroughput): {
  ReadCapacityUnits: number;
  WriteCapacityUnits: number;
} {
  return {
    ReadCapacityUnits: provisioning.readCapacityUnits,
    WriteCapacityUnits: provisioning.writeCapacityUnits,
  };
}

function scalarType(attribute: AnyAttribute): ScalarAttributeType {
  switch (attribute.wireType) {
    case 'S':
    case 'N':
    case 'B':
      return attribute.wireType;
    default:
      throw new SchemaError(`Key attribute '${attribute.name}' must be a String, Number or Binary attribute`);
  }
}
