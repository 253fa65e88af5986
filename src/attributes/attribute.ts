/**
 * Attribute Descriptors
 *
 * Base class for typed attributes. An attribute marshals one native value to
 * and from its tagged wire form and builds the conditions and update actions
 * that reference it.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import { BuildError, SchemaError, UnmarshalError } from '../error/index.js';
import type { AttributePath, ComparisonOperator, Condition, WireType } from '../expressions/condition.js';
import type { UpdateAction } from '../expressions/update.js';

/**
 * Options shared by every attribute type
 */
export interface AttributeOptions<T, N extends boolean> {
  /** Marks the table's partition key */
  hashKey?: boolean;
  /** Marks the table's sort key */
  rangeKey?: boolean;
  /** Whether the attribute may be absent from an item */
  nullable?: N;
  /** Value, or factory of values, applied by `Model.create` when unset */
  default?: T | (() => T);
}

function isFactory<T>(value: T | (() => T)): value is () => T {
  return typeof value === 'function';
}

/**
 * Typed attribute descriptor.
 *
 * @template T - Native value type
 * @template N - Whether the attribute is nullable (optional on items)
 * @template E - Element type accepted by `contains` (never when unsupported)
 */
export abstract class Attribute<T, N extends boolean = false, E = never> implements AttributePath {
  /** Native value type; type-level only */
  declare readonly _type: T;
  /** Nullability; type-level only */
  declare readonly _nullable: N;

  abstract readonly wireType: WireType;

  readonly isHashKey: boolean;
  readonly isRangeKey: boolean;
  readonly nullable: boolean;

  private readonly defaultFactory?: () => T;
  private boundName?: string;

  constructor(options: AttributeOptions<T, N> = {}) {
    this.isHashKey = options.hashKey ?? false;
    this.isRangeKey = options.rangeKey ?? false;
    this.nullable = options.nullable ?? this.nullableByDefault;

    const defaultValue = options.default;
    if (defaultValue !== undefined) {
      this.defaultFactory = isFactory(defaultValue) ? defaultValue : () => defaultValue;
    }
  }

  /** Nullability when the options leave it unset */
  protected get nullableByDefault(): boolean {
    return false;
  }

  get isVersion(): boolean {
    return false;
  }

  get isKey(): boolean {
    return this.isHashKey || this.isRangeKey;
  }

  /**
   * Name the attribute was registered under
   *
   * @throws {BuildError} When the attribute is not registered with a model
   */
  get name(): string {
    if (this.boundName === undefined) {
      throw new BuildError(`${this.constructor.name} is not registered with a model`);
    }
    return this.boundName;
  }

  get isBound(): boolean {
    return this.boundName !== undefined;
  }

  /**
   * Binds the attribute to its name and freezes it.
   *
   * @internal Called by the schema registry
   */
  bindName(name: string): void {
    if (this.boundName === name) {
      return;
    }
    if (this.boundName !== undefined) {
      throw new SchemaError(
        `Attribute '${this.boundName}' cannot be registered again as '${name}'`,
        { attribute: this.boundName, name }
      );
    }
    this.boundName = name;
    Object.freeze(this);
  }

  /** Label used in error messages */
  protected get label(): string {
    return this.boundName ?? this.constructor.name;
  }

  get hasDefault(): boolean {
    return this.defaultFactory !== undefined;
  }

  /** Resolves the default value, calling the factory when there is one */
  getDefault(): T | undefined {
    return this.defaultFactory?.();
  }

  /**
   * Converts a native value to its wire form. Returns undefined when the value
   * has no storable form (an empty set).
   *
   * @throws {MarshalError} On a runtime type mismatch
   */
  abstract serialize(value: T): AttributeValue | undefined;

  /**
   * Converts a wire value to its native form.
   *
   * @throws {UnmarshalError} When the wire value carries the wrong tag
   */
  abstract deserialize(value: AttributeValue): T;

  /**
   * Serializes one element for `contains`. Attributes without elements reject it.
   */
  protected serializeElement(_value: E): AttributeValue {
    throw new BuildError(`contains() is not supported on ${this.wireType} attribute '${this.label}'`);
  }

  // ==========================================================================
  // Conditions
  // ==========================================================================

  eq(value: T): Condition {
    return this.compare('=', value);
  }

  ne(value: T): Condition {
    return this.compare('<>', value);
  }

  lt(value: T): Condition {
    return this.compare('<', value);
  }

  le(value: T): Condition {
    return this.compare('<=', value);
  }

  gt(value: T): Condition {
    return this.compare('>', value);
  }

  ge(value: T): Condition {
    return this.compare('>=', value);
  }

  between(lower: T, upper: T): Condition {
    return Object.freeze({
      kind: 'between',
      path: this,
      lower: this.operand(lower),
      upper: this.operand(upper),
    });
  }

  isIn(...values: T[]): Condition {
    if (values.length === 0) {
      throw new BuildError(`IN on '${this.label}' requires at least one value`);
    }
    return Object.freeze({
      kind: 'in',
      path: this,
      values: Object.freeze(values.map((v) => this.operand(v))),
    });
  }

  exists(): Condition {
    return Object.freeze({ kind: 'exists', path: this });
  }

  notExists(): Condition {
    return Object.freeze({ kind: 'notExists', path: this });
  }

  /**
   * begins_with(attribute, prefix). String and Binary attributes only.
   */
  beginsWith(prefix: T): Condition {
    if (this.wireType !== 'S' && this.wireType !== 'B') {
      throw new BuildError(`beginsWith() requires a String or Binary attribute, '${this.label}' is ${this.wireType}`);
    }
    return Object.freeze({ kind: 'beginsWith', path: this, value: this.operand(prefix) });
  }

  /**
   * contains(attribute, value). String, Binary, set and list attributes only.
   */
  contains(value: E): Condition {
    return Object.freeze({ kind: 'contains', path: this, value: this.serializeElement(value) });
  }

  // ==========================================================================
  // Update actions
  // ==========================================================================

  /**
   * SET attribute = value. A null value, or one without a storable form
   * (an empty set), removes the attribute instead.
   *
   * @example
   * ```typescript
   * Thread.attributes.tags.set(new Set()); // REMOVE #a0
   * ```
   */
  set(value: T | null | undefined): UpdateAction {
    this.assertUpdatable('set');
    const wire = value === null || value === undefined ? undefined : this.serialize(value);
    if (wire === undefined) {
      return this.remove();
    }
    return Object.freeze({ kind: 'set', path: this, value: wire });
  }

  /**
   * SET attribute = if_not_exists(attribute, value)
   */
  setIfNotExists(value: T): UpdateAction {
    this.assertUpdatable('setIfNotExists');
    return Object.freeze({ kind: 'setIfNotExists', path: this, value: this.operand(value) });
  }

  /**
   * REMOVE attribute. Only nullable attributes can be removed.
   */
  remove(): UpdateAction {
    this.assertUpdatable('remove');
    if (!this.nullable) {
      throw new BuildError(`Attribute '${this.label}' is not nullable and cannot be removed`);
    }
    return Object.freeze({ kind: 'remove', path: this });
  }

  /**
   * ADD attribute value. Number and set attributes only.
   */
  add(value: T): UpdateAction {
    this.assertUpdatable('add');
    if (!['N', 'SS', 'NS', 'BS'].includes(this.wireType)) {
      throw new BuildError(`add() requires a Number or set attribute, '${this.label}' is ${this.wireType}`);
    }
    return Object.freeze({ kind: 'add', path: this, value: this.operand(value) });
  }

  /**
   * DELETE attribute value. Set attributes only.
   */
  delete(value: T): UpdateAction {
    this.assertUpdatable('delete');
    if (!['SS', 'NS', 'BS'].includes(this.wireType)) {
      throw new BuildError(`delete() requires a set attribute, '${this.label}' is ${this.wireType}`);
    }
    return Object.freeze({ kind: 'delete', path: this, value: this.operand(value) });
  }

  /**
   * SET attribute = attribute + amount. Number attributes only; a negative
   * amount decrements.
   */
  increment(amount: number = 1): UpdateAction {
    this.assertUpdatable('increment');
    if (this.wireType !== 'N') {
      throw new BuildError(`increment() requires a Number attribute, '${this.label}' is ${this.wireType}`);
    }
    if (!Number.isFinite(amount)) {
      throw new BuildError(`increment() on '${this.label}' requires a finite amount`);
    }
    return Object.freeze({ kind: 'increment', path: this, value: { N: String(amount) } });
  }

  /**
   * SET attribute = list_append(attribute, values). List attributes only.
   */
  listAppend(values: T): UpdateAction {
    this.assertUpdatable('listAppend');
    this.assertList('listAppend');
    return Object.freeze({ kind: 'listAppend', path: this, value: this.operand(values) });
  }

  /**
   * SET attribute = list_append(values, attribute). List attributes only.
   */
  listPrepend(values: T): UpdateAction {
    this.assertUpdatable('listPrepend');
    this.assertList('listPrepend');
    return Object.freeze({ kind: 'listPrepend', path: this, value: this.operand(values) });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private compare(operator: ComparisonOperator, value: T): Condition {
    return Object.freeze({ kind: 'comparison', operator, path: this, value: this.operand(value) });
  }

  /** Serializes an expression operand; operands must have a storable form */
  protected operand(value: T): AttributeValue {
    const wire = this.serialize(value);
    if (wire === undefined) {
      throw new BuildError(`Empty value cannot be used as an operand of '${this.label}'`);
    }
    return wire;
  }

  private assertUpdatable(action: string): void {
    if (this.isKey) {
      throw new BuildError(`${action}() cannot update key attribute '${this.label}'`);
    }
  }

  private assertList(action: string): void {
    if (this.wireType !== 'L') {
      throw new BuildError(`${action}() requires a List attribute, '${this.label}' is ${this.wireType}`);
    }
  }
}

/**
 * Attribute of any native type
 */
export type AnyAttribute = Attribute<unknown, boolean, unknown>;

/**
 * Attribute map of a model
 */
export type AttributeMap = Record<string, AnyAttribute>;

/** Native type of an attribute */
export type ValueOf<X> = X extends Attribute<infer T, boolean, unknown> ? T : never;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type RequiredKeys<A extends AttributeMap> = {
  [K in keyof A]: [A[K]['_nullable']] extends [false] ? K : never;
}[keyof A];

type OptionalKeys<A extends AttributeMap> = Exclude<keyof A, RequiredKeys<A>>;

/**
 * Item type of an attribute map: non-nullable attributes are required,
 * nullable ones optional.
 */
export type ItemOf<A extends AttributeMap> = Simplify<
  { [K in RequiredKeys<A>]: ValueOf<A[K]> } & { [K in OptionalKeys<A>]?: ValueOf<A[K]> }
>;

/**
 * Key values accepted for hash and range keys. Dates are the values of
 * DateTime and TTL keys.
 */
export type KeyValue = string | number | Uint8Array | Date;

/**
 * Parses the decimal text of a stored number. Values beyond the safe integer
 * range cannot be represented without rounding and are rejected.
 *
 * @throws {UnmarshalError} When the text is not a finite number or out of range
 */
export function parseWireNumber(label: string, text: string): number {
  const parsed = Number(text);
  if (text.trim() === '' || !Number.isFinite(parsed)) {
    throw new UnmarshalError(label, 'a finite number', JSON.stringify(text));
  }
  if (Math.abs(parsed) > Number.MAX_SAFE_INTEGER) {
    throw new UnmarshalError(label, 'a number within the safe integer range', JSON.stringify(text));
  }
  return parsed;
}

/**
 * Returns the wire tag carried by a value, for error messages
 */
export function tagOf(value: AttributeValue): string {
  const entry = Object.entries(value).find(([, v]) => v !== undefined);
  return entry?.[0] ?? 'empty value';
}
