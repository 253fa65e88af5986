/**
 * Schema Registry
 *
 * Validates and freezes a model's attribute map, key designation, version
 * attribute and secondary indexes.
 */

import { SchemaError } from '../error/index.js';
import type { AnyAttribute, AttributeMap } from '../attributes/index.js';

export type ProjectionType = 'ALL' | 'KEYS_ONLY' | 'INCLUDE';

export interface ProvisionedThroughput {
  readCapacityUnits: number;
  writeCapacityUnits: number;
}

/**
 * Secondary index as declared on a model
 */
export interface IndexDefinition<K extends string = string> {
  kind: 'local' | 'global';
  hashKey: K;
  rangeKey?: K;
  /** Defaults to ALL */
  projection?: ProjectionType;
  /** Non-key attributes copied into the index; INCLUDE projections only */
  include?: K[];
  /** Global indexes on provisioned tables */
  provisioning?: ProvisionedThroughput;
}

/**
 * Validated secondary index
 */
export interface IndexDescriptor {
  readonly name: string;
  readonly kind: 'local' | 'global';
  readonly hashKey: AnyAttribute;
  readonly rangeKey?: AnyAttribute;
  readonly projection: ProjectionType;
  readonly include: readonly string[];
  readonly provisioning?: ProvisionedThroughput;
}

export interface SchemaDefinition<A, K extends string = Extract<keyof A, string>> {
  tableName: string;
  attributes: A;
  /** Secondary indexes; a child schema inherits its parent's and may redefine them by name */
  indexes?: Record<string, IndexDefinition<K>>;
}

/**
 * Registered, immutable schema
 */
export interface Schema<A> {
  readonly tableName: string;
  readonly attributes: Readonly<A>;
  /** Attribute names in declaration order, parent first */
  readonly attributeNames: readonly string[];
  readonly hashKey: AnyAttribute;
  readonly rangeKey?: AnyAttribute;
  readonly version?: AnyAttribute;
  readonly indexes: Readonly<Record<string, IndexDescriptor>>;
}

/**
 * Attribute map of a child schema: the child's attributes override the
 * parent's by name.
 */
export type Merge<P, A> = Omit<P, keyof A> & A;

const KEY_WIRE_TYPES = new Set(['S', 'N', 'B']);

/**
 * Registers a schema, optionally derived from a parent.
 *
 * The merged attribute map keeps the parent's order with new names appended.
 * Every attribute is bound to its name and frozen.
 *
 * @throws {SchemaError} When the definition is invalid
 *
 * @example
 * ```typescript
 * const schema = registerSchema({
 *   tableName: 'Thread',
 *   attributes: {
 *     forum: new StringAttribute({ hashKey: true }),
 *     subject: new StringAttribute({ rangeKey: true }),
 *     views: new NumberAttribute({ default: 0 }),
 *   },
 * });
 * ```
 */
export function registerSchema<A extends AttributeMap>(definition: SchemaDefinition<A>): Schema<A>;
export function registerSchema<P extends AttributeMap, A extends AttributeMap>(
  definition: SchemaDefinition<A, Extract<keyof P | keyof A, string>>,
  parent: Schema<P>
): Schema<Merge<P, A>>;
export function registerSchema(
  definition: SchemaDefinition<AttributeMap>,
  parent?: Schema<AttributeMap>
): Schema<unknown> {
  const { tableName } = definition;
  if (!tableName) {
    throw new SchemaError('Table name is required');
  }

  const attributes: AttributeMap = { ...parent?.attributes, ...definition.attributes };
  const attributeNames = Object.keys(attributes);

  const seen = new Map<AnyAttribute, string>();
  for (const name of attributeNames) {
    const attribute = attributes[name];
    const other = seen.get(attribute);
    if (other !== undefined) {
      throw new SchemaError(`Attribute '${name}' is the same descriptor as '${other}'`, { attribute: name });
    }
    seen.set(attribute, name);
    if (attribute.isBound && attribute.name !== name) {
      throw new SchemaError(`Attribute '${attribute.name}' cannot be registered again as '${name}'`, {
        attribute: attribute.name,
        name,
      });
    }
  }

  const hashKeys = attributeNames.filter((name) => attributes[name].isHashKey);
  if (hashKeys.length !== 1) {
    throw new SchemaError(`The model must have exactly one hash key attribute, found ${hashKeys.length}`, {
      hashKeys,
    });
  }
  const rangeKeys = attributeNames.filter((name) => attributes[name].isRangeKey);
  if (rangeKeys.length > 1) {
    throw new SchemaError(`The model has more than one range key attribute: ${rangeKeys.join(', ')}`);
  }
  const versions = attributeNames.filter((name) => attributes[name].isVersion);
  if (versions.length > 1) {
    throw new SchemaError(`The model has more than one Version attribute: ${versions.join(', ')}`);
  }

  for (const name of [...hashKeys, ...rangeKeys]) {
    const attribute = attributes[name];
    if (attribute.isHashKey && attribute.isRangeKey) {
      throw new SchemaError(`Attribute '${name}' cannot be both hash key and range key`);
    }
    if (attribute.nullable) {
      throw new SchemaError(`Key attribute '${name}' cannot be nullable`);
    }
    if (attribute.isVersion) {
      throw new SchemaError(`Version attribute '${name}' cannot be a key`);
    }
    assertKeyType(name, attribute);
  }

  const hashKey = attributes[hashKeys[0]];
  const rangeKey = rangeKeys.length === 1 ? attributes[rangeKeys[0]] : undefined;
  const version = versions.length === 1 ? attributes[versions[0]] : undefined;

  const indexDefinitions: Record<string, IndexDefinition> = {
    ...(parent ? inheritedIndexes(parent) : {}),
    ...definition.indexes,
  };
  const indexes: Record<string, IndexDescriptor> = {};
  for (const [indexName, index] of Object.entries(indexDefinitions)) {
    indexes[indexName] = buildIndex(indexName, index, attributes, hashKey);
  }

  for (const name of attributeNames) {
    attributes[name].bindName(name);
  }

  return Object.freeze({
    tableName,
    attributes: Object.freeze(attributes),
    attributeNames: Object.freeze(attributeNames),
    hashKey,
    rangeKey,
    version,
    indexes: Object.freeze(indexes),
  });
}

function inheritedIndexes(parent: Schema<AttributeMap>): Record<string, IndexDefinition> {
  const definitions: Record<string, IndexDefinition> = {};
  for (const [indexName, index] of Object.entries(parent.indexes)) {
    definitions[indexName] = {
      kind: index.kind,
      hashKey: index.hashKey.name,
      rangeKey: index.rangeKey?.name,
      projection: index.projection,
      include: [...index.include],
      provisioning: index.provisioning,
    };
  }
  return definitions;
}

function buildIndex(
  indexName: string,
  index: IndexDefinition,
  attributes: AttributeMap,
  tableHashKey: AnyAttribute
): IndexDescriptor {
  const lookup = (name: string, role: string): AnyAttribute => {
    const attribute = Object.hasOwn(attributes, name) ? attributes[name] : undefined;
    if (attribute === undefined) {
      throw new SchemaError(`Index '${indexName}' ${role} '${name}' is not a declared attribute`, {
        index: indexName,
      });
    }
    assertKeyType(name, attribute);
    return attribute;
  };

  const hashKey = lookup(index.hashKey, 'hash key');
  const rangeKey = index.rangeKey !== undefined ? lookup(index.rangeKey, 'range key') : undefined;

  if (index.kind === 'local') {
    if (hashKey !== tableHashKey) {
      throw new SchemaError(`Local index '${indexName}' must use the table hash key`, { index: indexName });
    }
    if (rangeKey === undefined) {
      throw new SchemaError(`Local index '${indexName}' requires a range key`, { index: indexName });
    }
    if (index.provisioning !== undefined) {
      throw new SchemaError(`Local index '${indexName}' cannot have its own provisioning`, { index: indexName });
    }
  }

  const projection = index.projection ?? 'ALL';
  const include = index.include ?? [];
  if (projection === 'INCLUDE' && include.length === 0) {
    throw new SchemaError(`Index '${indexName}' has an INCLUDE projection without attributes`, {
      index: indexName,
    });
  }
  if (projection !== 'INCLUDE' && include.length > 0) {
    throw new SchemaError(`Index '${indexName}' lists included attributes without an INCLUDE projection`, {
      index: indexName,
    });
  }
  for (const name of include) {
    if (!Object.hasOwn(attributes, name)) {
      throw new SchemaError(`Index '${indexName}' includes undeclared attribute '${name}'`, { index: indexName });
    }
  }

  return Object.freeze({
    name: indexName,
    kind: index.kind,
    hashKey,
    rangeKey,
    projection,
    include: Object.freeze([...include]),
    provisioning: index.provisioning,
  });
}

function assertKeyType(name: string, attribute: AnyAttribute): void {
  if (!KEY_WIRE_TYPES.has(attribute.wireType)) {
    throw new SchemaError(`Key attribute '${name}' must be a String, Number or Binary attribute`, {
      attribute: name,
      wireType: attribute.wireType,
    });
  }
}
