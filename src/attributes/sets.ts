/**
 * Set attribute types. The store rejects empty sets, so an empty set has no
 * wire form: it is omitted on save and removed on update.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import { MarshalError, UnmarshalError } from '../error/index.js';
import { Attribute, parseWireNumber, tagOf } from './attribute.js';

export abstract class SetAttribute<E, N extends boolean> extends Attribute<Set<E>, N, E> {
  protected override get nullableByDefault(): boolean {
    return true;
  }

  serialize(value: Set<E>): AttributeValue | undefined {
    if (!(value instanceof Set)) {
      throw new MarshalError(this.label, `expected a Set, got ${typeof value}`);
    }
    if (value.size === 0) {
      return undefined;
    }
    const elements = [...value];
    elements.forEach((element) => this.checkElement(element));
    return this.wrapSet(elements);
  }

  protected override serializeElement(value: E): AttributeValue {
    this.checkElement(value);
    return this.wrapElement(value);
  }

  /** @throws {MarshalError} When the element cannot be stored in the set */
  protected abstract checkElement(element: E): void;

  protected abstract wrapSet(elements: E[]): AttributeValue;

  protected abstract wrapElement(element: E): AttributeValue;
}

export class StringSetAttribute<N extends boolean = true> extends SetAttribute<string, N> {
  readonly wireType = 'SS' as const;

  protected checkElement(element: string): void {
    if (typeof element !== 'string') {
      throw new MarshalError(this.label, `set elements must be strings, got ${typeof element}`);
    }
    if (element === '') {
      throw new MarshalError(this.label, 'set elements cannot be empty strings');
    }
  }

  protected wrapSet(elements: string[]): AttributeValue {
    return { SS: elements };
  }

  protected wrapElement(element: string): AttributeValue {
    return { S: element };
  }

  deserialize(value: AttributeValue): Set<string> {
    if (value.SS === undefined) {
      throw new UnmarshalError(this.label, 'SS', tagOf(value));
    }
    return new Set(value.SS);
  }
}

export class NumberSetAttribute<N extends boolean = true> extends SetAttribute<number, N> {
  readonly wireType = 'NS' as const;

  protected checkElement(element: number): void {
    if (typeof element !== 'number' || !Number.isFinite(element)) {
      throw new MarshalError(this.label, `set elements must be finite numbers, got ${String(element)}`);
    }
  }

  protected wrapSet(elements: number[]): AttributeValue {
    return { NS: elements.map(String) };
  }

  protected wrapElement(element: number): AttributeValue {
    return { N: String(element) };
  }

  deserialize(value: AttributeValue): Set<number> {
    if (value.NS === undefined) {
      throw new UnmarshalError(this.label, 'NS', tagOf(value));
    }
    return new Set(value.NS.map((text) => parseWireNumber(this.label, text)));
  }
}

export class BinarySetAttribute<N extends boolean = true> extends SetAttribute<Uint8Array, N> {
  readonly wireType = 'BS' as const;

  protected checkElement(element: Uint8Array): void {
    if (!(element instanceof Uint8Array)) {
      throw new MarshalError(this.label, `set elements must be Uint8Array, got ${typeof element}`);
    }
    if (element.length === 0) {
      throw new MarshalError(this.label, 'set elements cannot be empty binaries');
    }
  }

  protected wrapSet(elements: Uint8Array[]): AttributeValue {
    return { BS: elements };
  }

  protected wrapElement(element: Uint8Array): AttributeValue {
    return { B: element };
  }

  deserialize(value: AttributeValue): Set<Uint8Array> {
    if (value.BS === undefined) {
      throw new UnmarshalError(this.label, 'BS', tagOf(value));
    }
    return new Set(value.BS.map((b) => new Uint8Array(b)));
  }
}
