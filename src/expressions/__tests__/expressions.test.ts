/**
 * Tests for condition and update expression compilation.
 */

import {
  ListAttribute,
  NumberAttribute,
  StringAttribute,
  StringSetAttribute,
} from '../../attributes/index.js';
import { BuildError } from '../../error/index.js';
import { registerSchema } from '../../schema/index.js';
import { ExpressionAttributes, and, compileCondition, compileUpdate, not, or } from '../index.js';

function userAttributes() {
  return registerSchema({
    tableName: 'User',
    attributes: {
      id: new StringAttribute({ hashKey: true }),
      status: new StringAttribute(),
      age: new NumberAttribute(),
      tags: new StringSetAttribute(),
      scores: new ListAttribute({ of: new NumberAttribute(), nullable: true }),
      nickname: new StringAttribute({ nullable: true }),
    },
  }).attributes;
}

describe('compileCondition', () => {
  it('should parenthesize every operand of AND', () => {
    const { status, age } = userAttributes();

    expect(compileCondition(and(status.eq('active'), age.gt(18)))).toEqual({
      expression: '(#a0 = :v0) AND (#a1 > :v1)',
      names: { '#a0': 'status', '#a1': 'age' },
      values: { ':v0': { S: 'active' }, ':v1': { N: '18' } },
    });
  });

  it('should reuse aliases for repeated names and equal values', () => {
    const { age } = userAttributes();

    expect(compileCondition(or(age.gt(18), age.lt(18)))).toEqual({
      expression: '(#a0 > :v0) OR (#a0 < :v0)',
      names: { '#a0': 'age' },
      values: { ':v0': { N: '18' } },
    });
  });

  it('should nest combinators', () => {
    const { status, age } = userAttributes();
    const compiled = compileCondition(and(status.eq('x'), or(age.lt(1), age.gt(9))));

    expect(compiled.expression).toBe('(#a0 = :v0) AND ((#a1 < :v1) OR (#a1 > :v2))');
  });

  it('should render NOT and existence checks', () => {
    const { nickname } = userAttributes();

    expect(compileCondition(not(nickname.exists()))).toEqual({
      expression: 'NOT (attribute_exists(#a0))',
      names: { '#a0': 'nickname' },
      values: {},
    });
    expect(compileCondition(nickname.notExists()).expression).toBe('attribute_not_exists(#a0)');
  });

  it('should render BETWEEN, IN and functions', () => {
    const { age, status, tags } = userAttributes();

    expect(compileCondition(age.between(1, 9)).expression).toBe('#a0 BETWEEN :v0 AND :v1');
    expect(compileCondition(status.isIn('a', 'b', 'a')).expression).toBe('#a0 IN (:v0, :v1, :v0)');
    expect(compileCondition(status.beginsWith('ac')).expression).toBe('begins_with(#a0, :v0)');
    expect(compileCondition(tags.contains('faq'))).toEqual({
      expression: 'contains(#a0, :v0)',
      names: { '#a0': 'tags' },
      values: { ':v0': { S: 'faq' } },
    });
  });

  it('should return a single operand unchanged', () => {
    const { age } = userAttributes();
    const condition = age.gt(1);
    expect(and(condition)).toBe(condition);
  });

  it('should reject empty combinators', () => {
    expect(() => and()).toThrow('AND requires at least one condition');
    expect(() => or()).toThrow(BuildError);
  });

  it('should reject unregistered attributes', () => {
    expect(() => compileCondition(new StringAttribute().eq('x'))).toThrow(
      'StringAttribute is not registered with a model'
    );
  });
});

describe('compileUpdate', () => {
  it('should group actions by clause in SET, REMOVE, ADD, DELETE order', () => {
    const { age, tags, nickname, status } = userAttributes();

    expect(
      compileUpdate([age.increment(), tags.add(new Set(['x'])), nickname.remove(), status.set('on')])
    ).toEqual({
      expression: 'SET #a0 = #a0 + :v0, #a1 = :v1 REMOVE #a2 ADD #a3 :v2',
      names: { '#a0': 'age', '#a1': 'status', '#a2': 'nickname', '#a3': 'tags' },
      values: { ':v0': { N: '1' }, ':v1': { S: 'on' }, ':v2': { SS: ['x'] } },
    });
  });

  it('should render list and conditional set actions', () => {
    const { scores, status } = userAttributes();

    expect(compileUpdate([scores.listAppend([1])]).expression).toBe('SET #a0 = list_append(#a0, :v0)');
    expect(compileUpdate([scores.listPrepend([1])]).expression).toBe('SET #a0 = list_append(:v0, #a0)');
    expect(compileUpdate([status.setIfNotExists('new')]).expression).toBe('SET #a0 = if_not_exists(#a0, :v0)');
  });

  it('should render DELETE from a set', () => {
    const { tags } = userAttributes();

    expect(compileUpdate([tags.delete(new Set(['old']))])).toEqual({
      expression: 'DELETE #a0 :v0',
      names: { '#a0': 'tags' },
      values: { ':v0': { SS: ['old'] } },
    });
  });

  it('should reject an attribute in more than one action', () => {
    const { age } = userAttributes();

    expect(() => compileUpdate([age.set(1), age.increment()])).toThrow(
      "Attribute 'age' appears in more than one update action"
    );
  });

  it('should reject an empty action list', () => {
    expect(() => compileUpdate([])).toThrow('An update requires at least one action');
  });
});

describe('ExpressionAttributes', () => {
  it('should share aliases across the expressions of one request', () => {
    const { age } = userAttributes();
    const attributes = new ExpressionAttributes();

    expect(compileUpdate([age.set(2)], attributes).expression).toBe('SET #a0 = :v0');
    expect(compileCondition(age.eq(1), attributes).expression).toBe('#a0 = :v1');
    expect(attributes.values).toEqual({ ':v0': { N: '2' }, ':v1': { N: '1' } });
  });

  it('should compare values structurally', () => {
    const attributes = new ExpressionAttributes();

    expect(attributes.valueFor({ M: { b: { S: '1' }, a: { S: '2' } } })).toBe(':v0');
    expect(attributes.valueFor({ M: { a: { S: '2' }, b: { S: '1' } } })).toBe(':v0');
    expect(attributes.valueFor({ B: new Uint8Array([1]) })).toBe(':v1');
    expect(attributes.valueFor({ B: new Uint8Array([1]) })).toBe(':v1');
    expect(attributes.valueFor({ B: new Uint8Array([2]) })).toBe(':v2');
  });

  it('should report no names or values while empty', () => {
    const attributes = new ExpressionAttributes();
    expect(attributes.names).toBeUndefined();
    expect(attributes.values).toBeUndefined();
  });
});
