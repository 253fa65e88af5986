/**
 * Expression Compilation
 *
 * Renders condition trees and update actions into expression strings with
 * placeholder-safe attribute names and values.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import { BuildError } from '../error/index.js';
import type { Condition } from './condition.js';
import { ExpressionAttributes } from './placeholders.js';
import { UPDATE_CLAUSE, UPDATE_CLAUSE_ORDER } from './update.js';
import type { UpdateAction } from './update.js';

/**
 * Result of compiling an expression
 */
export interface CompiledExpression {
  /** The complete expression string */
  expression: string;
  /** Expression attribute names mapping (#aN -> attribute name) */
  names: Record<string, string>;
  /** Expression attribute values mapping (:vN -> wire value) */
  values: Record<string, AttributeValue>;
}

/**
 * Renders a condition tree into an expression string, allocating aliases in
 * the given context.
 */
export function renderCondition(condition: Condition, attributes: ExpressionAttributes): string {
  switch (condition.kind) {
    case 'comparison':
      return `${attributes.nameFor(condition.path.name)} ${condition.operator} ${attributes.valueFor(condition.value)}`;
    case 'between': {
      const name = attributes.nameFor(condition.path.name);
      return `${name} BETWEEN ${attributes.valueFor(condition.lower)} AND ${attributes.valueFor(condition.upper)}`;
    }
    case 'in': {
      const name = attributes.nameFor(condition.path.name);
      const values = condition.values.map((v) => attributes.valueFor(v));
      return `${name} IN (${values.join(', ')})`;
    }
    case 'exists':
      return `attribute_exists(${attributes.nameFor(condition.path.name)})`;
    case 'notExists':
      return `attribute_not_exists(${attributes.nameFor(condition.path.name)})`;
    case 'beginsWith':
      return `begins_with(${attributes.nameFor(condition.path.name)}, ${attributes.valueFor(condition.value)})`;
    case 'contains':
      return `contains(${attributes.nameFor(condition.path.name)}, ${attributes.valueFor(condition.value)})`;
    case 'and':
      return condition.conditions.map((c) => `(${renderCondition(c, attributes)})`).join(' AND ');
    case 'or':
      return condition.conditions.map((c) => `(${renderCondition(c, attributes)})`).join(' OR ');
    case 'not':
      return `NOT (${renderCondition(condition.condition, attributes)})`;
  }
}

/**
 * Renders update actions into an update expression.
 *
 * Clauses appear in the order SET, REMOVE, ADD, DELETE; actions keep call
 * order within a clause. An attribute may appear in one action only.
 */
export function renderUpdate(actions: readonly UpdateAction[], attributes: ExpressionAttributes): string {
  if (actions.length === 0) {
    throw new BuildError('An update requires at least one action');
  }

  const seen = new Set<string>();
  for (const action of actions) {
    const name = action.path.name;
    if (seen.has(name)) {
      throw new BuildError(`Attribute '${name}' appears in more than one update action`, { attribute: name });
    }
    seen.add(name);
  }

  const clauses: string[] = [];
  for (const clause of UPDATE_CLAUSE_ORDER) {
    const parts = actions
      .filter((action) => UPDATE_CLAUSE[action.kind] === clause)
      .map((action) => renderAction(action, attributes));
    if (parts.length > 0) {
      clauses.push(`${clause} ${parts.join(', ')}`);
    }
  }
  return clauses.join(' ');
}

function renderAction(action: UpdateAction, attributes: ExpressionAttributes): string {
  const name = attributes.nameFor(action.path.name);
  switch (action.kind) {
    case 'set':
      return `${name} = ${attributes.valueFor(action.value)}`;
    case 'setIfNotExists':
      return `${name} = if_not_exists(${name}, ${attributes.valueFor(action.value)})`;
    case 'increment':
      return `${name} = ${name} + ${attributes.valueFor(action.value)}`;
    case 'listAppend':
      return `${name} = list_append(${name}, ${attributes.valueFor(action.value)})`;
    case 'listPrepend':
      return `${name} = list_append(${attributes.valueFor(action.value)}, ${name})`;
    case 'remove':
      return name;
    case 'add':
    case 'delete':
      return `${name} ${attributes.valueFor(action.value)}`;
  }
}

/**
 * Compiles a condition on its own.
 *
 * @example
 * ```typescript
 * compileCondition(and(attrs.status.eq('active'), attrs.age.gt(18)));
 * // { expression: '(#a0 = :v0) AND (#a1 > :v1)',
 * //   names: { '#a0': 'status', '#a1': 'age' },
 * //   values: { ':v0': { S: 'active' }, ':v1': { N: '18' } } }
 * ```
 */
export function compileCondition(
  condition: Condition,
  attributes: ExpressionAttributes = new ExpressionAttributes()
): CompiledExpression {
  const expression = renderCondition(condition, attributes);
  return { expression, names: attributes.names ?? {}, values: attributes.values ?? {} };
}

/**
 * Compiles update actions on their own.
 */
export function compileUpdate(
  actions: readonly UpdateAction[],
  attributes: ExpressionAttributes = new ExpressionAttributes()
): CompiledExpression {
  const expression = renderUpdate(actions, attributes);
  return { expression, names: attributes.names ?? {}, values: attributes.values ?? {} };
}
