/**
 * DynamoDB Model Mapper
 *
 * Typed models over DynamoDB tables: attribute marshalling, condition and
 * update expressions, optimistic versioning and batched reads and writes.
 *
 * @module dynamodb-model-mapper
 */

// ============================================================================
// Client and Models
// ============================================================================

export { DynamoDBMapper, createSdkTransport } from './client/index.js';

export { defineModel, ModelDefinition, Model } from './model/index.js';
export type {
  ExtensionDefinition,
  ModelContext,
  WriteOptions,
  GetOptions,
  ModelQueryOptions,
  ModelScanOptions,
  KeyInput,
  IndexReader,
} from './model/index.js';

// ============================================================================
// Attributes
// ============================================================================

export {
  Attribute,
  StringAttribute,
  NumberAttribute,
  BinaryAttribute,
  BooleanAttribute,
  DateTimeAttribute,
  TTLAttribute,
  SetAttribute,
  StringSetAttribute,
  NumberSetAttribute,
  BinarySetAttribute,
  ListAttribute,
  MapAttribute,
  JsonAttribute,
  VersionAttribute,
  formatDateTime,
  parseDateTime,
} from './attributes/index.js';
export type {
  AttributeOptions,
  BinaryAttributeOptions,
  ListAttributeOptions,
  AnyAttribute,
  AttributeMap,
  ItemOf,
  KeyValue,
  ValueOf,
} from './attributes/index.js';

// ============================================================================
// Schema
// ============================================================================

export { registerSchema, buildCreateTableInput } from './schema/index.js';
export type {
  Schema,
  SchemaDefinition,
  IndexDefinition,
  IndexDescriptor,
  ProjectionType,
  ProvisionedThroughput,
  CreateTableOptions,
} from './schema/index.js';

// ============================================================================
// Expressions
// ============================================================================

export { and, or, not, compileCondition, compileUpdate, ExpressionAttributes } from './expressions/index.js';
export type { Condition, UpdateAction, CompiledExpression } from './expressions/index.js';

// ============================================================================
// Codec and Versioning
// ============================================================================

export { encodeItem, decodeItem, encodeKey } from './codec/index.js';
export type { WireItem } from './codec/index.js';
export { planSave, planUpdate, planDelete } from './version/index.js';
export type { VersionPlan } from './version/index.js';

// ============================================================================
// Reads and Batches
// ============================================================================

export { ResultIterator } from './operations/index.js';
export type { QueryOptions, ScanOptions, ReadOptions } from './operations/index.js';
export { BatchExecutor, BatchWriter } from './batch/index.js';
export type { BatchRetryConfig, BatchExecutorOptions, BatchGetOptions } from './batch/index.js';

// ============================================================================
// Configuration
// ============================================================================

export { MapperConfigBuilder, loadConfigFromEnv, validateConfig } from './config/index.js';
export type { MapperConfig, CredentialsConfig } from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  MapperError,
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
} from './error/index.js';

// ============================================================================
// Transport and Observability
// ============================================================================

export { SdkTransport } from './transport/index.js';
export type { DynamoDBTransport } from './transport/index.js';
export { ConsoleLogger, NoopLogger, InMemoryMetricsCollector, NoopMetricsCollector } from './observability/index.js';
export type { Logger, LogLevel, MetricsCollector } from './observability/index.js';
