/**
 * Model definitions: a registered schema not yet bound to a transport.
 */

import type { AttributeMap } from '../attributes/index.js';
import { registerSchema } from '../schema/index.js';
import type { IndexDefinition, Merge, Schema, SchemaDefinition } from '../schema/index.js';

/**
 * Attributes and indexes added by a derived model
 */
export interface ExtensionDefinition<P extends AttributeMap, A extends AttributeMap> {
  /** Defaults to the parent's table */
  tableName?: string;
  attributes: A;
  indexes?: Record<string, IndexDefinition<Extract<keyof P | keyof A, string>>>;
}

/**
 * A validated, immutable model schema.
 *
 * Bind it to a mapper with `mapper.model(definition)`.
 */
export class ModelDefinition<A extends AttributeMap> {
  constructor(public readonly schema: Schema<A>) {}

  get tableName(): string {
    return this.schema.tableName;
  }

  /**
   * Derives a child model. The child's attributes override the parent's by
   * name, and the parent's indexes are inherited.
   *
   * @example
   * ```typescript
   * const AuditedThread = Thread.extend({
   *   attributes: { editedBy: new StringAttribute({ nullable: true }) },
   * });
   * ```
   */
  extend<B extends AttributeMap>(definition: ExtensionDefinition<A, B>): ModelDefinition<Merge<A, B>> {
    const schema = registerSchema<A, B>(
      {
        tableName: definition.tableName ?? this.schema.tableName,
        attributes: definition.attributes,
        indexes: definition.indexes,
      },
      this.schema
    );
    return new ModelDefinition(schema);
  }
}

/**
 * Registers a model schema.
 *
 * @throws {SchemaError} When the definition is invalid
 *
 * @example
 * ```typescript
 * const Thread = defineModel({
 *   tableName: 'Thread',
 *   attributes: {
 *     forum: new StringAttribute({ hashKey: true }),
 *     subject: new StringAttribute({ rangeKey: true }),
 *     views: new NumberAttribute({ default: 0 }),
 *     tags: new StringSetAttribute(),
 *     version: new VersionAttribute(),
 *   },
 *   indexes: {
 *     byViews: { kind: 'local', hashKey: 'forum', rangeKey: 'views', projection: 'KEYS_ONLY' },
 *   },
 * });
 * ```
 */
export function defineModel<A extends AttributeMap>(definition: SchemaDefinition<A>): ModelDefinition<A> {
  return new ModelDefinition(registerSchema(definition));
}
