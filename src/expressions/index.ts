/**
 * Expression Builder
 *
 * Condition trees, update actions and their compilation into
 * placeholder-safe expressions.
 */

export { and, or, not, andMaybe } from './condition.js';
export type { Condition, ComparisonOperator, AttributePath, WireType } from './condition.js';

export { UPDATE_CLAUSE, UPDATE_CLAUSE_ORDER } from './update.js';
export type { UpdateAction, UpdateClause } from './update.js';

export { ExpressionAttributes, canonicalKey } from './placeholders.js';

export { compileCondition, compileUpdate, renderCondition, renderUpdate } from './compile.js';
export type { CompiledExpression } from './compile.js';
