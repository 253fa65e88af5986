/**
 * Tests for optimistic version control.
 */

import { NumberAttribute, StringAttribute, VersionAttribute } from '../../attributes/index.js';
import { compileCondition, compileUpdate } from '../../expressions/index.js';
import { registerSchema } from '../../schema/index.js';
import { applyVersion, planDelete, planSave, planUpdate, versionOf } from '../index.js';

function versionedSchema() {
  return registerSchema({
    tableName: 'Doc',
    attributes: {
      id: new StringAttribute({ hashKey: true }),
      body: new StringAttribute({ nullable: true }),
      version: new VersionAttribute(),
    },
  });
}

describe('planSave', () => {
  it('should write version 1 without a condition on first save', () => {
    expect(planSave(versionedSchema(), { id: 'a' })).toEqual({ nextVersion: 1 });
  });

  it('should require the stored version on later saves', () => {
    const plan = planSave(versionedSchema(), { id: 'a', version: 3 });

    expect(plan.expectedVersion).toBe(3);
    expect(plan.nextVersion).toBe(4);
    expect(plan.condition && compileCondition(plan.condition)).toEqual({
      expression: '(attribute_exists(#a0)) AND (#a0 = :v0)',
      names: { '#a0': 'version' },
      values: { ':v0': { N: '3' } },
    });
  });

  it('should do nothing for models without a version attribute', () => {
    const schema = registerSchema({
      tableName: 'Plain',
      attributes: { id: new StringAttribute({ hashKey: true }), count: new NumberAttribute() },
    });
    expect(planSave(schema, { id: 'a', count: 1 })).toEqual({});
  });
});

describe('planUpdate', () => {
  it('should check the held version and set the next one', () => {
    const plan = planUpdate(versionedSchema(), { id: 'a', version: 2 });

    expect(plan.condition && compileCondition(plan.condition).expression).toBe('#a0 = :v0');
    expect(plan.action && compileUpdate([plan.action])).toEqual({
      expression: 'SET #a0 = :v0',
      names: { '#a0': 'version' },
      values: { ':v0': { N: '3' } },
    });
    expect(plan.nextVersion).toBe(3);
  });

  it('should require no stored version when none is held', () => {
    const plan = planUpdate(versionedSchema(), { id: 'a' });

    expect(plan.condition && compileCondition(plan.condition).expression).toBe('attribute_not_exists(#a0)');
    expect(plan.expectedVersion).toBeUndefined();
    expect(plan.nextVersion).toBe(1);
  });
});

describe('planDelete', () => {
  it('should check the held version', () => {
    const plan = planDelete(versionedSchema(), { id: 'a', version: 5 });
    expect(plan.condition && compileCondition(plan.condition).values).toEqual({ ':v0': { N: '5' } });
    expect(plan.expectedVersion).toBe(5);
  });

  it('should be unconditional when no version is held', () => {
    expect(planDelete(versionedSchema(), { id: 'a' })).toEqual({});
  });
});

describe('applyVersion', () => {
  it('should advance the version strictly on every successful save', () => {
    const schema = versionedSchema();
    const item: { id: string; version?: number } = { id: 'a' };
    const seen: number[] = [];

    for (let i = 0; i < 5; i++) {
      applyVersion(schema, item, planSave(schema, item));
      seen.push(versionOf(schema, item) ?? 0);
    }

    expect(seen).toEqual([1, 2, 3, 4, 5]);
  });
});
