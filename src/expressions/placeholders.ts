/**
 * Placeholder allocation for expression attribute names and values.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

/**
 * Allocates `#aN` name aliases and `:vN` value aliases for one request.
 *
 * A context is shared by every expression of a request (key condition,
 * filter, update, condition) so aliases never collide. Repeated attribute
 * names and structurally equal values reuse their alias.
 *
 * @example
 * ```typescript
 * const attrs = new ExpressionAttributes();
 * attrs.nameFor('status'); // '#a0'
 * attrs.nameFor('status'); // '#a0'
 * attrs.valueFor({ S: 'active' }); // ':v0'
 * ```
 */
export class ExpressionAttributes {
  private readonly nameAliases = new Map<string, string>();
  private readonly valueAliases = new Map<string, string>();
  private readonly nameMap: Record<string, string> = {};
  private readonly valueMap: Record<string, AttributeValue> = {};

  nameFor(attributeName: string): string {
    const existing = this.nameAliases.get(attributeName);
    if (existing !== undefined) {
      return existing;
    }
    const alias = `#a${this.nameAliases.size}`;
    this.nameAliases.set(attributeName, alias);
    this.nameMap[alias] = attributeName;
    return alias;
  }

  valueFor(value: AttributeValue): string {
    const key = canonicalKey(value);
    const existing = this.valueAliases.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const alias = `:v${this.valueAliases.size}`;
    this.valueAliases.set(key, alias);
    this.valueMap[alias] = value;
    return alias;
  }

  /** ExpressionAttributeNames for the request; undefined when empty */
  get names(): Record<string, string> | undefined {
    return this.nameAliases.size > 0 ? { ...this.nameMap } : undefined;
  }

  /** ExpressionAttributeValues for the request; undefined when empty */
  get values(): Record<string, AttributeValue> | undefined {
    return this.valueAliases.size > 0 ? { ...this.valueMap } : undefined;
  }
}

/**
 * Stable textual form of a wire value: object keys sorted, binary as base64.
 */
export function canonicalKey(value: AttributeValue): string {
  return JSON.stringify(value, (_key: string, current: unknown) => {
    if (current instanceof Uint8Array) {
      return { $b64: Buffer.from(current).toString('base64') };
    }
    if (current !== null && typeof current === 'object' && !Array.isArray(current)) {
      const sorted: Record<string, unknown> = {};
      for (const k of Object.keys(current).sort()) {
        sorted[k] = Reflect.get(current, k);
      }
      return sorted;
    }
    return current;
  });
}
