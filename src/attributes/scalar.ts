/**
 * Scalar attribute types: String, Number, Binary, Boolean, date-times and TTL.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import { MarshalError, UnmarshalError } from '../error/index.js';
import { Attribute, parseWireNumber, tagOf } from './attribute.js';
import type { AttributeOptions } from './attribute.js';

export class StringAttribute<N extends boolean = false> extends Attribute<string, N, string> {
  readonly wireType = 'S' as const;

  serialize(value: string): AttributeValue {
    if (typeof value !== 'string') {
      throw new MarshalError(this.label, `expected a string, got ${typeof value}`);
    }
    return { S: value };
  }

  deserialize(value: AttributeValue): string {
    if (value.S === undefined) {
      throw new UnmarshalError(this.label, 'S', tagOf(value));
    }
    return value.S;
  }

  protected override serializeElement(value: string): AttributeValue {
    return this.serialize(value);
  }
}

export class NumberAttribute<N extends boolean = false> extends Attribute<number, N> {
  readonly wireType = 'N' as const;

  serialize(value: number): AttributeValue {
    if (typeof value !== 'number') {
      throw new MarshalError(this.label, `expected a number, got ${typeof value}`);
    }
    if (!Number.isFinite(value)) {
      throw new MarshalError(this.label, `${value} is not a finite number`);
    }
    return { N: String(value) };
  }

  deserialize(value: AttributeValue): number {
    if (value.N === undefined) {
      throw new UnmarshalError(this.label, 'N', tagOf(value));
    }
    return parseWireNumber(this.label, value.N);
  }
}

export interface BinaryAttributeOptions<N extends boolean> extends AttributeOptions<Uint8Array, N> {
  /**
   * Store the base64 text of the value as the binary payload, the layout used
   * by tables written with older clients. Fixed for the attribute's lifetime.
   */
  legacyEncoding?: boolean;
}

export class BinaryAttribute<N extends boolean = false> extends Attribute<Uint8Array, N, Uint8Array> {
  readonly wireType = 'B' as const;
  readonly legacyEncoding: boolean;

  constructor(options: BinaryAttributeOptions<N> = {}) {
    super(options);
    this.legacyEncoding = options.legacyEncoding ?? false;
  }

  serialize(value: Uint8Array): AttributeValue {
    if (!(value instanceof Uint8Array)) {
      throw new MarshalError(this.label, `expected a Uint8Array, got ${typeof value}`);
    }
    if (this.legacyEncoding) {
      return { B: new Uint8Array(Buffer.from(Buffer.from(value).toString('base64'), 'utf8')) };
    }
    return { B: value };
  }

  deserialize(value: AttributeValue): Uint8Array {
    if (value.B === undefined) {
      throw new UnmarshalError(this.label, 'B', tagOf(value));
    }
    if (this.legacyEncoding) {
      return new Uint8Array(Buffer.from(Buffer.from(value.B).toString('utf8'), 'base64'));
    }
    return new Uint8Array(value.B);
  }

  protected override serializeElement(value: Uint8Array): AttributeValue {
    return this.serialize(value);
  }
}

export class BooleanAttribute<N extends boolean = false> extends Attribute<boolean, N> {
  readonly wireType = 'BOOL' as const;

  serialize(value: boolean): AttributeValue {
    if (typeof value !== 'boolean') {
      throw new MarshalError(this.label, `expected a boolean, got ${typeof value}`);
    }
    return { BOOL: value };
  }

  deserialize(value: AttributeValue): boolean {
    if (value.BOOL === undefined) {
      throw new UnmarshalError(this.label, 'BOOL', tagOf(value));
    }
    return value.BOOL;
  }
}

const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{6})\+0000$/;

/**
 * UTC timestamp stored as `YYYY-MM-DDTHH:MM:SS.ffffff+0000`, which sorts
 * lexicographically in time order. Sub-millisecond digits are always zero.
 */
export class DateTimeAttribute<N extends boolean = false> extends Attribute<Date, N> {
  readonly wireType = 'S' as const;

  serialize(value: Date): AttributeValue {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new MarshalError(this.label, 'expected a valid Date');
    }
    return { S: formatDateTime(value) };
  }

  deserialize(value: AttributeValue): Date {
    if (value.S === undefined) {
      throw new UnmarshalError(this.label, 'S', tagOf(value));
    }
    const date = parseDateTime(value.S);
    if (date === undefined) {
      throw new UnmarshalError(this.label, 'YYYY-MM-DDTHH:MM:SS.ffffff+0000', JSON.stringify(value.S));
    }
    return date;
  }
}

export function formatDateTime(value: Date): string {
  const iso = value.toISOString();
  // 2024-01-02T03:04:05.678Z -> 2024-01-02T03:04:05.678000+0000
  return `${iso.slice(0, 23)}000+0000`;
}

export function parseDateTime(text: string): Date | undefined {
  const match = DATETIME_PATTERN.exec(text);
  if (match === null) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second, micros] = match;
  const millis = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    Math.floor(Number(micros) / 1000)
  );
  return new Date(millis);
}

/**
 * Expiry time stored as epoch seconds, for the table's TTL setting
 */
export class TTLAttribute<N extends boolean = true> extends Attribute<Date, N> {
  readonly wireType = 'N' as const;

  protected override get nullableByDefault(): boolean {
    return true;
  }

  serialize(value: Date): AttributeValue {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new MarshalError(this.label, 'expected a valid Date');
    }
    return { N: String(Math.floor(value.getTime() / 1000)) };
  }

  deserialize(value: AttributeValue): Date {
    if (value.N === undefined) {
      throw new UnmarshalError(this.label, 'N', tagOf(value));
    }
    return new Date(parseWireNumber(this.label, value.N) * 1000);
  }
}
