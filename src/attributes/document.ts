/**
 * Document attribute types: lists, free-form maps and JSON text.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { convertToAttr, convertToNative } from '@aws-sdk/util-dynamodb';
import type { marshallOptions } from '@aws-sdk/util-dynamodb';

import { MarshalError, UnmarshalError } from '../error/index.js';
import { Attribute, tagOf } from './attribute.js';
import type { AttributeOptions } from './attribute.js';

const MARSHALL_OPTIONS: marshallOptions = {
  removeUndefinedValues: true,
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ListAttributeOptions<V, N extends boolean> extends AttributeOptions<V[], N> {
  /** Element attribute; elements are marshalled generically when omitted */
  of?: Attribute<V, boolean, unknown>;
}

/**
 * List of values, optionally typed by an element attribute.
 *
 * @example
 * ```typescript
 * const scores = new ListAttribute({ of: new NumberAttribute() });
 * scores.serialize([1, 2]); // { L: [{ N: '1' }, { N: '2' }] }
 * ```
 */
export class ListAttribute<V = unknown, N extends boolean = false> extends Attribute<V[], N, V> {
  readonly wireType = 'L' as const;
  private readonly element?: Attribute<V, boolean, unknown>;

  constructor(options: ListAttributeOptions<V, N> = {}) {
    super(options);
    this.element = options.of;
  }

  serialize(value: V[]): AttributeValue {
    if (!Array.isArray(value)) {
      throw new MarshalError(this.label, `expected an array, got ${typeof value}`);
    }
    return { L: value.map((element, index) => this.serializeAt(element, index)) };
  }

  deserialize(value: AttributeValue): V[] {
    if (value.L === undefined) {
      throw new UnmarshalError(this.label, 'L', tagOf(value));
    }
    return value.L.map((element) => this.deserializeElement(element));
  }

  protected override serializeElement(value: V): AttributeValue {
    return this.serializeAt(value, 0);
  }

  private serializeAt(element: V, index: number): AttributeValue {
    if (this.element !== undefined) {
      const wire = this.element.serialize(element);
      if (wire === undefined) {
        throw new MarshalError(this.label, `element ${index} has no storable value`);
      }
      return wire;
    }
    try {
      return convertToAttr(element, MARSHALL_OPTIONS);
    } catch (error) {
      throw new MarshalError(this.label, `element ${index}: ${describeError(error)}`);
    }
  }

  private deserializeElement(element: AttributeValue): V {
    if (this.element !== undefined) {
      return this.element.deserialize(element);
    }
    return convertToNative(element);
  }
}

/**
 * Free-form map of native values
 */
export class MapAttribute<
  V extends Record<string, unknown> = Record<string, unknown>,
  N extends boolean = false,
> extends Attribute<V, N> {
  readonly wireType = 'M' as const;

  serialize(value: V): AttributeValue {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      throw new MarshalError(this.label, 'expected a plain object');
    }
    let wire: AttributeValue;
    try {
      wire = convertToAttr(value, MARSHALL_OPTIONS);
    } catch (error) {
      throw new MarshalError(this.label, describeError(error));
    }
    if (wire.M === undefined) {
      throw new MarshalError(this.label, `expected a map, got ${tagOf(wire)}`);
    }
    return wire;
  }

  deserialize(value: AttributeValue): V {
    if (value.M === undefined) {
      throw new UnmarshalError(this.label, 'M', tagOf(value));
    }
    return convertToNative(value);
  }
}

/**
 * Value stored as JSON text in a String attribute
 */
export class JsonAttribute<V = unknown, N extends boolean = false> extends Attribute<V, N> {
  readonly wireType = 'S' as const;

  serialize(value: V): AttributeValue {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      throw new MarshalError(this.label, describeError(error));
    }
    if (text === undefined) {
      throw new MarshalError(this.label, 'value has no JSON representation');
    }
    return { S: text };
  }

  deserialize(value: AttributeValue): V {
    if (value.S === undefined) {
      throw new UnmarshalError(this.label, 'S', tagOf(value));
    }
    try {
      return JSON.parse(value.S);
    } catch {
      throw new UnmarshalError(this.label, 'JSON text', JSON.stringify(value.S));
    }
  }
}
