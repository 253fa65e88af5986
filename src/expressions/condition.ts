/**
 * Condition Trees
 *
 * Immutable nodes for condition and filter expressions. Leaves are created by
 * attribute methods (`attr.eq(v)`, `attr.exists()`, ...) and combined with
 * {@link and}, {@link or} and {@link not}.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import { BuildError } from '../error/index.js';

/**
 * Wire type tags an attribute can store
 */
export type WireType = 'S' | 'N' | 'B' | 'BOOL' | 'SS' | 'NS' | 'BS' | 'L' | 'M';

/**
 * What an expression needs to know about the attribute it references
 */
export interface AttributePath {
  /** Registered attribute name; throws BuildError while unregistered */
  readonly name: string;
  readonly wireType: WireType;
}

export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=';

export type Condition =
  | {
      readonly kind: 'comparison';
      readonly operator: ComparisonOperator;
      readonly path: AttributePath;
      readonly value: AttributeValue;
    }
  | {
      readonly kind: 'between';
      readonly path: AttributePath;
      readonly lower: AttributeValue;
      readonly upper: AttributeValue;
    }
  | { readonly kind: 'in'; readonly path: AttributePath; readonly values: readonly AttributeValue[] }
  | { readonly kind: 'exists'; readonly path: AttributePath }
  | { readonly kind: 'notExists'; readonly path: AttributePath }
  | { readonly kind: 'beginsWith'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'contains'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'and'; readonly conditions: readonly Condition[] }
  | { readonly kind: 'or'; readonly conditions: readonly Condition[] }
  | { readonly kind: 'not'; readonly condition: Condition };

/**
 * Conjunction of conditions. Every operand is parenthesized when rendered.
 *
 * @example
 * ```typescript
 * and(User.attributes.status.eq('active'), User.attributes.age.gt(18));
 * // Renders: (#a0 = :v0) AND (#a1 > :v1)
 * ```
 */
export function and(...conditions: Condition[]): Condition {
  return combine('and', conditions);
}

/**
 * Disjunction of conditions
 */
export function or(...conditions: Condition[]): Condition {
  return combine('or', conditions);
}

/**
 * Negation: `NOT (condition)`
 */
export function not(condition: Condition): Condition {
  return Object.freeze({ kind: 'not', condition });
}

/**
 * Joins an optional user condition with another one. Used when the mapper
 * adds its own checks (version, key existence) to a caller's condition.
 */
export function andMaybe(first: Condition | undefined, second: Condition | undefined): Condition | undefined {
  if (first === undefined) {
    return second;
  }
  if (second === undefined) {
    return first;
  }
  return and(first, second);
}

function combine(kind: 'and' | 'or', conditions: Condition[]): Condition {
  if (conditions.length === 0) {
    throw new BuildError(`${kind.toUpperCase()} requires at least one condition`);
  }
  if (conditions.length === 1) {
    return conditions[0];
  }
  return Object.freeze({ kind, conditions: Object.freeze([...conditions]) });
}
