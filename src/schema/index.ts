export { registerSchema } from './schema.js';
export type {
  Schema,
  SchemaDefinition,
  IndexDefinition,
  IndexDescriptor,
  Merge,
  ProjectionType,
  ProvisionedThroughput,
} from './schema.js';

export { buildCreateTableInput } from './create-table.js';
export type { CreateTableOptions } from './create-table.js';
