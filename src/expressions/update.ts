/**
 * Update Actions
 *
 * Immutable nodes for update expressions, created by attribute methods
 * (`attr.set(v)`, `attr.increment(1)`, `attr.remove()`, ...).
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

import type { AttributePath } from './condition.js';

export type UpdateAction =
  | { readonly kind: 'set'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'setIfNotExists'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'increment'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'listAppend'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'listPrepend'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'remove'; readonly path: AttributePath }
  | { readonly kind: 'add'; readonly path: AttributePath; readonly value: AttributeValue }
  | { readonly kind: 'delete'; readonly path: AttributePath; readonly value: AttributeValue };

export type UpdateClause = 'SET' | 'REMOVE' | 'ADD' | 'DELETE';

/**
 * Clause each action renders into. Clauses are emitted in the order
 * SET, REMOVE, ADD, DELETE.
 */
export const UPDATE_CLAUSE: Record<UpdateAction['kind'], UpdateClause> = {
  set: 'SET',
  setIfNotExists: 'SET',
  increment: 'SET',
  listAppend: 'SET',
  listPrepend: 'SET',
  remove: 'REMOVE',
  add: 'ADD',
  delete: 'DELETE',
};

export const UPDATE_CLAUSE_ORDER: readonly UpdateClause[] = ['SET', 'REMOVE', 'ADD', 'DELETE'];
